import type { RaglineConfig } from './types.js';

export const DEFAULT_CONFIG: RaglineConfig = {
  embedding: {
    baseUrl: 'https://api.mistral.ai/v1',
    model: 'mistral-embed',
    dimension: 1024,
    batchSize: 5,
    delayMs: 1000,
    maxAttempts: 3,
    jitterMs: 1000,
  },
  llm: {
    baseUrl: 'https://api.mistral.ai/v1',
    model: 'mistral-small-2506',
    temperature: 0.3,
    timeoutMs: 30000,
  },
  chunking: {
    chunkSize: 1000,
    chunkOverlap: 200,
    separator: '\n\n',
  },
  retrieval: {
    topK: 3,
    upsertBatchSize: 100,
  },
  storage: {
    dbPath: '.ragline/ragline.db',
  },
  log: {
    level: 'info',
  },
};
