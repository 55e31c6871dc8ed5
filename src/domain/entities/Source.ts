/** 已匯入的來源文件 */
export interface Source {
  sourceId: number;
  sourcePath: string;
  title: string;
  contentHash: string;
  chunkCount: number;
  ingestedAt: number;
}
