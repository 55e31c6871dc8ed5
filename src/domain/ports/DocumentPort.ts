export interface LoadedDocument {
  /** 相對於 root 的路徑，使用 '/' 分隔 */
  source: string;
  title: string;
  text: string;
  contentHash: string;
}

export interface DocumentPort {
  /** 檔案回傳自身；目錄則遞迴收集支援的文件 */
  listFiles(targetPath: string): Promise<string[]>;
  load(filePath: string, root: string): Promise<LoadedDocument>;
}
