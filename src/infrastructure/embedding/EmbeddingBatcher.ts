import type { EmbeddingPort, EmbeddingResult } from '../../domain/ports/EmbeddingPort.js';
import { EmbeddingPipelineError } from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';
import { sleep } from '../../shared/RetryPolicy.js';
import { classifyEmbeddingError } from './classifyEmbeddingError.js';

export interface EmbeddingBatcherOptions {
  /** 每批 chunk 數，預設 5 */
  batchSize?: number;
  /** 批次間等待（毫秒），也是退避的基準，預設 1000 */
  delayMs?: number;
  /** 每批最多嘗試次數，預設 3 */
  maxAttempts?: number;
  /** rate limit 退避的 jitter 上限（毫秒），預設 1000 */
  jitterMs?: number;
  sleep?: (ms: number) => Promise<void>;
  /** 回傳 [0, 1) 的亂數來源 */
  random?: () => number;
  logger?: Logger;
}

type BatchOutcome =
  | { kind: 'embedded'; results: EmbeddingResult[] }
  | { kind: 'too_large' };

type PassOutcome =
  | { kind: 'done'; results: EmbeddingResult[] }
  | { kind: 'resize'; nextBatchSize: number };

/**
 * 將大量文字依序分批送入 EmbeddingPort
 *
 * - 批次嚴格依序處理，批次間等待 delayMs 作為 backpressure
 * - rate limit：指數退避 + jitter，最多 maxAttempts 次
 * - 批次 token 過多：批次大小減半，並對「整份輸入」從頭重跑
 * - 其他錯誤：線性退避，最多 maxAttempts 次
 *
 * 任一批次最終失敗時整體拋出 EmbeddingPipelineError，不回傳部分結果。
 */
export class EmbeddingBatcher {
  private readonly batchSize: number;
  private readonly delayMs: number;
  private readonly maxAttempts: number;
  private readonly jitterMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly provider: EmbeddingPort,
    options: EmbeddingBatcherOptions = {},
  ) {
    this.batchSize = options.batchSize ?? 5;
    this.delayMs = options.delayMs ?? 1000;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.jitterMs = options.jitterMs ?? 1000;
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? new Logger('EmbeddingBatcher');

    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new Error('batchSize must be a positive integer');
    }
    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new Error('maxAttempts must be a positive integer');
    }
  }

  async embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
    if (texts.length === 0) return [];

    let batchSize = this.batchSize;
    for (;;) {
      const outcome = await this.runPass(texts, batchSize);
      if (outcome.kind === 'done') return outcome.results;

      this.logger.warn('Too many tokens, reducing batch size', {
        from: batchSize,
        to: outcome.nextBatchSize,
      });
      batchSize = outcome.nextBatchSize;
    }
  }

  /** 以固定批次大小跑完整份輸入 */
  private async runPass(texts: string[], batchSize: number): Promise<PassOutcome> {
    const results: EmbeddingResult[] = [];
    const totalBatches = Math.ceil(texts.length / batchSize);

    for (let batchNumber = 1; batchNumber <= totalBatches; batchNumber++) {
      const start = (batchNumber - 1) * batchSize;
      const batch = texts.slice(start, start + batchSize);
      this.logger.info('Processing batch', { batch: batchNumber, totalBatches, size: batch.length });

      const outcome = await this.embedWithRetry(batch, batchNumber, batchSize);
      if (outcome.kind === 'too_large') {
        return { kind: 'resize', nextBatchSize: Math.floor(batchSize / 2) };
      }
      results.push(...outcome.results);

      if (batchNumber < totalBatches) {
        await this.sleep(this.delayMs);
      }
    }

    return { kind: 'done', results };
  }

  private async embedWithRetry(
    batch: string[],
    batchNumber: number,
    batchSize: number,
  ): Promise<BatchOutcome> {
    for (let attempt = 1; ; attempt++) {
      try {
        const results = await this.provider.embed(batch);
        this.logger.info('Batch completed', { batch: batchNumber });
        return { kind: 'embedded', results };
      } catch (err) {
        const kind = classifyEmbeddingError(err);

        if (kind === 'payload_too_large') {
          if (batchSize > 1) return { kind: 'too_large' };
          this.logger.error('Cannot reduce batch size further', { batch: batchNumber, error: err });
          throw new EmbeddingPipelineError(
            `Batch ${batchNumber} exceeds the token limit at batch size 1`,
            batchNumber, attempt, kind, { cause: err },
          );
        }

        if (attempt >= this.maxAttempts) {
          this.logger.error('Max attempts reached', { batch: batchNumber, attempts: attempt, error: err });
          throw new EmbeddingPipelineError(
            `Batch ${batchNumber} failed after ${attempt} attempts`,
            batchNumber, attempt, kind, { cause: err },
          );
        }

        const waitMs = kind === 'rate_limit'
          ? this.delayMs * 2 ** attempt + this.random() * this.jitterMs
          : this.delayMs * attempt;
        this.logger.warn(kind === 'rate_limit' ? 'Rate limit hit, backing off' : 'Batch failed, retrying', {
          batch: batchNumber,
          attempt,
          maxAttempts: this.maxAttempts,
          waitMs: Math.round(waitMs),
          error: err,
        });
        await this.sleep(waitMs);
      }
    }
  }
}
