/** 文件切塊；身分為其在來源文件中的位置 */
export interface Chunk {
  source: string;
  chunkIndex: number;
  text: string;
  tokenEstimate: number;
}

/** 向量索引中 record 的 id 格式 */
export function chunkRecordId(source: string, chunkIndex: number): string {
  return `${source}#${chunkIndex}`;
}
