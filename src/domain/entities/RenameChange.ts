import type { LinkType } from './LinkReference.js';
import type { StaleLineError, PartialApplyError } from '../errors/DomainErrors.js';

/** 一行的改寫；oldLine 必須與套用當下磁碟上的內容一致 */
export interface RenameChange {
  file: string;
  /** 1-based 行號 */
  lineNumber: number;
  oldLine: string;
  newLine: string;
  linkType: LinkType;
}

export type RenameDecision = 'apply' | 'applyWithBackup' | 'cancel';

/** applyChanges 的彙總結果 */
export interface ApplyResult {
  appliedCount: number;
  failedCount: number;
  staleChanges: StaleLineError[];
  /** 實際寫回的檔案 */
  filesWritten: string[];
  /** 建立的 .bak 檔 */
  backups: string[];
}

export type RenameOutcomeStatus = 'applied' | 'partial' | 'cancelled';

export interface RenameOutcome extends ApplyResult {
  status: RenameOutcomeStatus;
  fromPath: string;
  toPath: string;
  renamed: boolean;
  partialError?: PartialApplyError;
  /** 重新命名失敗時是否已還原內容改寫 */
  rolledBack: boolean;
}
