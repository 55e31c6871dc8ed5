import OpenAI from 'openai';
import type { EmbeddingPort, EmbeddingResult } from '../../domain/ports/EmbeddingPort.js';
import {
  EmbeddingPayloadTooLargeError,
  EmbeddingRateLimitError,
  EmbeddingUnavailableError,
} from '../../domain/errors/DomainErrors.js';
import { classifyEmbeddingError } from './classifyEmbeddingError.js';

export interface HttpEmbeddingConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  dimension: number;
}

/**
 * OpenAI-compatible embedding adapter（預設指向 Mistral）
 *
 * SDK 內建重試關閉，重試與退避由 EmbeddingBatcher 負責。
 */
export class HttpEmbeddingAdapter implements EmbeddingPort {
  readonly providerId = 'openai-compatible';
  readonly dimension: number;
  readonly modelId: string;
  private readonly client: OpenAI;

  constructor(config: HttpEmbeddingConfig) {
    this.dimension = config.dimension;
    this.modelId = config.model;
    this.client = new OpenAI({
      apiKey: config.apiKey || 'not-needed',
      baseURL: config.baseUrl,
      maxRetries: 0,
    });
  }

  async embed(texts: string[]): Promise<EmbeddingResult[]> {
    if (texts.length === 0) return [];

    const response = await this.client.embeddings
      .create({
        model: this.modelId,
        input: texts,
        encoding_format: 'float',
      })
      .catch((err: unknown) => {
        throw this.toDomainError(err);
      });

    if (response.data.length !== texts.length) {
      throw new EmbeddingUnavailableError(
        `Embedding service returned ${response.data.length} vectors for ${texts.length} inputs`,
      );
    }

    const tokensPerText = Math.round((response.usage?.total_tokens ?? 0) / texts.length);
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => ({
        vector: new Float32Array(item.embedding),
        tokensUsed: tokensPerText,
      }));
  }

  async embedOne(text: string): Promise<EmbeddingResult> {
    const [result] = await this.embed([text]);
    return result;
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.embed(['health check']);
      return true;
    } catch {
      return false;
    }
  }

  private toDomainError(err: unknown): Error {
    const message = err instanceof Error ? err.message : String(err);
    switch (classifyEmbeddingError(err)) {
      case 'rate_limit':
        return new EmbeddingRateLimitError(`Rate limited by embedding service: ${message}`, { cause: err });
      case 'payload_too_large':
        return new EmbeddingPayloadTooLargeError(`Too many tokens in batch: ${message}`, { cause: err });
      default:
        return new EmbeddingUnavailableError(`Embedding request failed: ${message}`, { cause: err });
    }
  }
}
