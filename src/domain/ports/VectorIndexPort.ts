export interface ChunkMetadata {
  text: string;
  source: string;
  chunkIndex: number;
  title?: string;
}

export interface VectorRecord {
  id: string;
  vector: Float32Array;
  metadata: ChunkMetadata;
}

export interface VectorMatch {
  id: string;
  /** 1 / (1 + distance)，越大越相似 */
  score: number;
  metadata: ChunkMetadata;
}

export interface VectorIndexPort {
  /** 以 id 為鍵寫入；已存在的 id 會被覆蓋 */
  upsert(records: VectorRecord[]): void;
  /** Top-k 相似度查詢，依相似度由高到低 */
  query(vector: Float32Array, topK: number): VectorMatch[];
  deleteBySource(source: string): number;
  count(): number;
}
