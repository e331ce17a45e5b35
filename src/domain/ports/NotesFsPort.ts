/**
 * 檔案系統 port（同步）
 *
 * 設計意圖：核心所有 I/O 都在呼叫端執行緒上同步完成，
 * 測試可替換為記憶體實作或注入失敗。
 */
export interface NotesFsPort {
  exists(filePath: string): boolean;
  isFile(filePath: string): boolean;
  isDirectory(dirPath: string): boolean;
  /** 兩個路徑是否指向同一個檔案（例如大小寫不敏感的檔案系統上只差大小寫） */
  isSameFile(a: string, b: string): boolean;
  readText(filePath: string): string;
  writeText(filePath: string, content: string): void;
  copyFile(from: string, to: string): void;
  renameFile(from: string, to: string): void;
  removeFile(filePath: string): void;
  ensureDirectory(dirPath: string): void;
}
