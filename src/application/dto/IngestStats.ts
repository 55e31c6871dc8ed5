/** 匯入操作統計 */
export interface IngestStats {
  filesProcessed: number;
  filesSkipped: number;
  chunksCreated: number;
  vectorsUpserted: number;
  upsertBatches: number;
  durationMs: number;
}
