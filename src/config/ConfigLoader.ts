import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_CONFIG } from './defaults.js';
import type { RaglineConfig, PartialConfig } from './types.js';
import { isLogLevel } from '../shared/Logger.js';

export type { RaglineConfig, PartialConfig } from './types.js';

export const CONFIG_FILE_NAME = '.ragline.json';

const positiveInt = z.number().int().positive();
const nonNegative = z.number().nonnegative();

/** .ragline.json 的結構；所有欄位皆可省略 */
const fileConfigSchema = z.object({
  embedding: z.object({
    baseUrl: z.string().url(),
    apiKey: z.string(),
    model: z.string().min(1),
    dimension: z.number(),
    batchSize: z.number(),
    delayMs: nonNegative,
    maxAttempts: z.number(),
    jitterMs: nonNegative,
  }).partial(),
  llm: z.object({
    baseUrl: z.string().url(),
    apiKey: z.string(),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2),
    timeoutMs: positiveInt,
  }).partial(),
  chunking: z.object({
    chunkSize: positiveInt,
    chunkOverlap: z.number().int().nonnegative(),
    separator: z.string(),
  }).partial(),
  retrieval: z.object({
    topK: z.number(),
    upsertBatchSize: positiveInt,
  }).partial(),
  storage: z.object({
    dbPath: z.string().min(1),
  }).partial(),
  log: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
  }).partial(),
}).partial().strict();

/** 淺層合併單一 section：略過 undefined 值 */
function mergeSection<T extends object>(base: T, partial: Partial<T> = {}): T {
  const defined = Object.fromEntries(
    Object.entries(partial).filter(([, value]) => value !== undefined),
  );
  return { ...base, ...defined };
}

function merge(base: RaglineConfig, partial: PartialConfig): RaglineConfig {
  return {
    embedding: mergeSection(base.embedding, partial.embedding),
    llm: mergeSection(base.llm, partial.llm),
    chunking: mergeSection(base.chunking, partial.chunking),
    retrieval: mergeSection(base.retrieval, partial.retrieval),
    storage: mergeSection(base.storage, partial.storage),
    log: mergeSection(base.log, partial.log),
  };
}

/** 環境變數覆蓋：MISTRAL_API_KEY、RAGLINE_BASE_URL、RAGLINE_LOG_LEVEL */
function applyEnvOverrides(config: RaglineConfig): void {
  const apiKey = process.env.MISTRAL_API_KEY;
  if (apiKey) {
    config.embedding.apiKey ??= apiKey;
    config.llm.apiKey ??= apiKey;
  }

  const baseUrl = process.env.RAGLINE_BASE_URL;
  if (baseUrl) {
    config.embedding.baseUrl = baseUrl;
    config.llm.baseUrl = baseUrl;
  }

  const level = process.env.RAGLINE_LOG_LEVEL;
  if (level && isLogLevel(level)) {
    config.log.level = level;
  }
}

/** 驗證設定值的合法性 */
function validate(config: RaglineConfig): void {
  if (!Number.isInteger(config.embedding.dimension) || config.embedding.dimension <= 0) {
    throw new Error('dimension must be a positive integer');
  }
  if (!Number.isInteger(config.embedding.batchSize) || config.embedding.batchSize <= 0) {
    throw new Error('batchSize must be a positive integer');
  }
  if (!Number.isInteger(config.embedding.maxAttempts) || config.embedding.maxAttempts <= 0) {
    throw new Error('maxAttempts must be a positive integer');
  }
  if (config.chunking.chunkOverlap >= config.chunking.chunkSize) {
    throw new Error('chunkOverlap must be smaller than chunkSize');
  }
  if (!Number.isInteger(config.retrieval.topK) || config.retrieval.topK <= 0) {
    throw new Error('topK must be a positive integer');
  }
}

function readConfigFile(configPath: string): PartialConfig {
  const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid ${CONFIG_FILE_NAME}: ${issue.path.join('.')}: ${issue.message}`);
  }
  return parsed.data;
}

/**
 * 載入設定：讀取 .ragline.json（若存在）並合併到預設值上
 * @param root - 專案根目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 */
export function loadConfig(root: string, overrides?: PartialConfig): RaglineConfig {
  const configPath = path.join(root, CONFIG_FILE_NAME);
  const fileConfig = fs.existsSync(configPath) ? readConfigFile(configPath) : {};

  // 合併順序：defaults < file config < overrides < env
  let merged = merge(DEFAULT_CONFIG, fileConfig);
  if (overrides) {
    merged = merge(merged, overrides);
  }

  applyEnvOverrides(merged);

  validate(merged);
  return merged;
}
