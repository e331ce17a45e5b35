export interface ContentMatch {
  /** 絕對路徑 */
  file: string;
  /** 1-based */
  lineNumber: number;
  line: string;
}

export interface ContentSearchOptions {
  caseSensitive?: boolean;
  /** 將 query 視為正規表示式（預設為字面字串） */
  regex?: boolean;
}

/**
 * 可替換的內容搜尋能力（ripgrep 或純 in-process 掃描）
 */
export interface ContentSearcher {
  readonly name: string;
  search(files: readonly string[], query: string, options?: ContentSearchOptions): ContentMatch[];
}
