import path from 'node:path';
import { loadConfig } from '../config/ConfigLoader.js';
import type { PartialConfig, RaglineConfig } from '../config/ConfigLoader.js';
import { DatabaseManager } from '../infrastructure/sqlite/DatabaseManager.js';
import { SqliteVecAdapter } from '../infrastructure/sqlite/SqliteVecAdapter.js';
import { HttpEmbeddingAdapter } from '../infrastructure/embedding/HttpEmbeddingAdapter.js';
import { EmbeddingBatcher } from '../infrastructure/embedding/EmbeddingBatcher.js';
import { HttpLLMAdapter } from '../infrastructure/llm/HttpLLMAdapter.js';
import { FileSystemDocumentLoader } from '../infrastructure/documents/FileSystemDocumentLoader.js';
import { TextSplitter } from '../infrastructure/documents/TextSplitter.js';
import { ConversationUseCase } from '../application/ConversationUseCase.js';
import { IngestUseCase } from '../application/IngestUseCase.js';
import { AskUseCase } from '../application/AskUseCase.js';
import { HealthCheckUseCase } from '../application/HealthCheckUseCase.js';
import { setDefaultLogLevel } from '../shared/Logger.js';

export interface Services {
  root: string;
  config: RaglineConfig;
  conversations: ConversationUseCase;
  ingest: IngestUseCase;
  ask: AskUseCase;
  health: HealthCheckUseCase;
  close(): void;
}

/**
 * 組裝所有 adapter 與 use case
 *
 * 每個指令呼叫一次，用完需 close() 釋放資料庫。
 */
export function createServices(root: string, overrides?: PartialConfig): Services {
  const resolvedRoot = path.resolve(root);
  const config = loadConfig(resolvedRoot, overrides);
  setDefaultLogLevel(config.log.level);

  const dbMgr = new DatabaseManager(
    path.resolve(resolvedRoot, config.storage.dbPath),
    config.embedding.dimension,
  );
  const db = dbMgr.getDb();

  const embedding = new HttpEmbeddingAdapter({
    apiKey: config.embedding.apiKey ?? '',
    baseUrl: config.embedding.baseUrl,
    model: config.embedding.model,
    dimension: config.embedding.dimension,
  });
  const llm = new HttpLLMAdapter({
    apiKey: config.llm.apiKey,
    baseUrl: config.llm.baseUrl,
    model: config.llm.model,
    temperature: config.llm.temperature,
    timeoutMs: config.llm.timeoutMs,
  });
  const index = new SqliteVecAdapter(db);
  const conversations = new ConversationUseCase(db);

  const batcher = new EmbeddingBatcher(embedding, {
    batchSize: config.embedding.batchSize,
    delayMs: config.embedding.delayMs,
    maxAttempts: config.embedding.maxAttempts,
    jitterMs: config.embedding.jitterMs,
  });

  return {
    root: resolvedRoot,
    config,
    conversations,
    ingest: new IngestUseCase(
      db,
      new FileSystemDocumentLoader(),
      new TextSplitter(config.chunking),
      batcher,
      index,
      { upsertBatchSize: config.retrieval.upsertBatchSize },
    ),
    ask: new AskUseCase(embedding, index, llm, conversations, {
      defaultTopK: config.retrieval.topK,
    }),
    health: new HealthCheckUseCase(db, { embedding, llm }),
    close: () => dbMgr.close(),
  };
}
