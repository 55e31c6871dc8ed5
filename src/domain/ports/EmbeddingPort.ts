export interface EmbeddingResult {
  vector: Float32Array;
  tokensUsed: number;
}

/**
 * Embedding 服務抽象：embed(texts) 回傳與輸入等長、同順序的向量
 */
export interface EmbeddingPort {
  readonly providerId: string;
  readonly dimension: number;
  readonly modelId: string;
  embed(texts: string[]): Promise<EmbeddingResult[]>;
  embedOne(text: string): Promise<EmbeddingResult>;
  isHealthy(): Promise<boolean>;
}
