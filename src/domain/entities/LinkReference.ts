export type LinkType = 'wiki' | 'wikiAlias' | 'zkId' | 'orgFile' | 'markdown';

export const LINK_TYPES: readonly LinkType[] = ['wiki', 'wikiAlias', 'zkId', 'orgFile', 'markdown'];

/**
 * 單一筆記中的一個連結（尚未解析）
 * 每次操作重新計算，不快取
 */
export interface LinkReference {
  sourceFile: string;
  /** 1-based 行號 */
  lineNumber: number;
  /** 整行原文，rename 時作為比對依據 */
  rawLineText: string;
  linkType: LinkType;
  /** 連結語法中的原始目標文字 */
  targetString: string;
  /** 連結在該行的起始位置（0-based） */
  column: number;
  /** 完整連結 token，例如 [[My Note|alias]] */
  matchText: string;
  /** alias / 描述 / 連結文字 */
  label?: string;
}
