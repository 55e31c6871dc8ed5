import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadConfig, CONFIG_FILE_NAME } from '../../../src/config/ConfigLoader.js';

describe('ConfigLoader', () => {
  const tmpDir = path.join(os.tmpdir(), 'ragline-config-' + Date.now());

  beforeEach(() => {
    fs.mkdirSync(tmpDir, { recursive: true });
    vi.stubEnv('MISTRAL_API_KEY', '');
    vi.stubEnv('RAGLINE_BASE_URL', '');
    vi.stubEnv('RAGLINE_LOG_LEVEL', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should return default config when no file exists', () => {
    const config = loadConfig('/nonexistent/path');
    expect(config.embedding.model).toBe('mistral-embed');
    expect(config.embedding.dimension).toBe(1024);
    expect(config.embedding.batchSize).toBe(5);
    expect(config.embedding.delayMs).toBe(1000);
    expect(config.llm.model).toBe('mistral-small-2506');
    expect(config.retrieval.topK).toBe(3);
    expect(config.embedding.apiKey).toBeUndefined();
  });

  it('should merge partial config over defaults', () => {
    const config = loadConfig('/nonexistent/path', {
      embedding: { dimension: 384, batchSize: undefined },
    });
    expect(config.embedding.dimension).toBe(384);
    // undefined 不覆蓋預設值
    expect(config.embedding.batchSize).toBe(5);
    expect(config.chunking.chunkSize).toBe(1000);
  });

  it('should read the config file and let overrides win', () => {
    fs.writeFileSync(path.join(tmpDir, CONFIG_FILE_NAME), JSON.stringify({
      embedding: { batchSize: 8, delayMs: 250 },
      storage: { dbPath: 'data/index.db' },
    }));

    const config = loadConfig(tmpDir, { embedding: { batchSize: 2 } });

    expect(config.embedding.batchSize).toBe(2);
    expect(config.embedding.delayMs).toBe(250);
    expect(config.storage.dbPath).toBe('data/index.db');
  });

  it('should reject unknown sections in the config file', () => {
    fs.writeFileSync(path.join(tmpDir, CONFIG_FILE_NAME), JSON.stringify({ search: {} }));
    expect(() => loadConfig(tmpDir)).toThrow(/^Invalid \.ragline\.json: /);
  });

  it('should apply environment overrides', () => {
    vi.stubEnv('MISTRAL_API_KEY', 'test-secret');
    vi.stubEnv('RAGLINE_BASE_URL', 'http://localhost:8080/v1');
    vi.stubEnv('RAGLINE_LOG_LEVEL', 'debug');

    const config = loadConfig('/nonexistent/path');

    expect(config.embedding.apiKey).toBe('test-secret');
    expect(config.llm.apiKey).toBe('test-secret');
    expect(config.embedding.baseUrl).toBe('http://localhost:8080/v1');
    expect(config.llm.baseUrl).toBe('http://localhost:8080/v1');
    expect(config.log.level).toBe('debug');
  });

  it('should keep an explicit api key over the environment', () => {
    vi.stubEnv('MISTRAL_API_KEY', 'test-secret');
    const config = loadConfig('/nonexistent/path', { llm: { apiKey: 'other-secret' } });
    expect(config.llm.apiKey).toBe('other-secret');
    expect(config.embedding.apiKey).toBe('test-secret');
  });

  it('should validate dimension is positive integer', () => {
    expect(() =>
      loadConfig('/nonexistent', { embedding: { dimension: -1 } })
    ).toThrow('dimension must be a positive integer');
  });

  it('should validate batch size and attempts', () => {
    expect(() => loadConfig('/nonexistent', { embedding: { batchSize: 0 } }))
      .toThrow('batchSize must be a positive integer');
    expect(() => loadConfig('/nonexistent', { embedding: { maxAttempts: 1.5 } }))
      .toThrow('maxAttempts must be a positive integer');
  });

  it('should validate chunk overlap and topK', () => {
    expect(() => loadConfig('/nonexistent', { chunking: { chunkSize: 100, chunkOverlap: 100 } }))
      .toThrow('chunkOverlap must be smaller than chunkSize');
    expect(() => loadConfig('/nonexistent', { retrieval: { topK: 0 } }))
      .toThrow('topK must be a positive integer');
  });
});
