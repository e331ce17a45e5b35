/** 目錄掃描篩選條件 */
export interface ScanFilter {
  /** 可辨識的筆記副檔名（小寫、不含點） */
  extensions: readonly string[];
  /** 套用在每個路徑段（檔名或資料夾名）的 glob 樣式 */
  junkPatterns: readonly string[];
}

/** 子目錄無法讀取時的回報 */
export interface ScanWarning {
  path: string;
  reason: string;
}

export interface ScanListing {
  /** 相對 root 的路徑，以 / 分隔，順序不保證 */
  files: string[];
  warnings: ScanWarning[];
}

/**
 * 可替換的目錄掃描能力
 * root 不存在時回傳空清單而非錯誤
 */
export interface DirectoryScanner {
  readonly name: string;
  listFiles(root: string, filter: ScanFilter): ScanListing;
}
