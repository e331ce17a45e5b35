import type { NoteType } from '../domain/entities/NoteRecord.js';
import type { LogLevel } from '../shared/Logger.js';

/** 筆記目錄設定 */
export interface NotesConfig {
  /** notes root（相對於設定檔所在目錄，或絕對路徑；支援 ~） */
  root: string;
  /** 可辨識的筆記副檔名，小寫、不含點 */
  extensions: string[];
  /** archive 資料夾（相對 root） */
  archiveDir: string;
  /** 產生的索引筆記檔名 */
  indexFileName: string;
  /** 第一層資料夾名稱 → noteType */
  noteTypes: Record<string, NoteType>;
}

export type ScannerKind = 'walk' | 'fd';
export type SearcherKind = 'scan' | 'rg';

/** 掃描設定 */
export interface ScanConfig {
  /** 每個路徑段套用的 glob 樣式（版本控制、OS metadata、archive/template 資料夾…） */
  junkPatterns: string[];
  scanner: ScannerKind;
  searcher: SearcherKind;
}

/** 索引快取設定 */
export interface CacheConfig {
  /** TTL 秒數；0 代表每次都重建 */
  ttlSeconds: number;
}

/** 重新命名設定 */
export interface RenameConfig {
  backupByDefault: boolean;
  /** 檔案重新命名失敗時還原已改寫的內容 */
  rollbackOnFailure: boolean;
}

export interface LoggingConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface NoteLinkConfig {
  version: number;
  notes: NotesConfig;
  scan: ScanConfig;
  cache: CacheConfig;
  rename: RenameConfig;
  logging: LoggingConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof NoteLinkConfig]?: NoteLinkConfig[K] extends object ? Partial<NoteLinkConfig[K]> : NoteLinkConfig[K];
};
