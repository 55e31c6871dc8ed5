import type { LogLevel } from '../shared/Logger.js';

/** Embedding 服務與批次 pipeline 設定 */
export interface EmbeddingConfig {
  /** OpenAI-compatible endpoint（預設 Mistral） */
  baseUrl: string;
  apiKey?: string;
  model: string;
  dimension: number;
  /** 每批送出的 chunk 數 */
  batchSize: number;
  /** 批次之間的等待（毫秒），也是退避的基準 */
  delayMs: number;
  /** 每批最多嘗試次數（含第一次） */
  maxAttempts: number;
  /** rate limit 退避的隨機 jitter 上限（毫秒） */
  jitterMs: number;
}

/** Chat 模型設定 */
export interface LLMConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

/** 文字切塊設定（以字元計） */
export interface ChunkingConfig {
  chunkSize: number;
  chunkOverlap: number;
  separator: string;
}

export interface RetrievalConfig {
  topK: number;
  /** 寫入向量索引時每次 upsert 的筆數 */
  upsertBatchSize: number;
}

export interface StorageConfig {
  dbPath: string;
}

export interface LogConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface RaglineConfig {
  embedding: EmbeddingConfig;
  llm: LLMConfig;
  chunking: ChunkingConfig;
  retrieval: RetrievalConfig;
  storage: StorageConfig;
  log: LogConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof RaglineConfig]?: Partial<RaglineConfig[K]>;
};
