import path from 'node:path';
import { extensionOf, stripExtension, toPosixRelative } from '../../shared/PathUtils.js';

export type NoteType = 'daily' | 'quick' | 'project' | 'person' | 'reading' | 'generic';

export const NOTE_TYPES: readonly NoteType[] = ['daily', 'quick', 'project', 'person', 'reading', 'generic'];

/** 索引中的單一筆記（唯讀快照） */
export interface NoteRecord {
  /** 絕對路徑（唯一鍵） */
  readonly path: string;
  /** 相對 notes root 的路徑，以 / 分隔 */
  readonly relativePath: string;
  readonly basename: string;
  /** 小寫副檔名，不含點 */
  readonly extension: string;
  /** 相對所在資料夾，"" 代表 root */
  readonly directory: string;
  /** 僅供顯示的分類 */
  readonly noteType: NoteType;
}

/** 以第一層資料夾名稱（不分大小寫）推斷 noteType */
export function classifyNoteType(directory: string, noteTypes: Record<string, NoteType>): NoteType {
  if (directory === '') return 'generic';
  const top = directory.split('/')[0].toLowerCase();
  for (const [dir, type] of Object.entries(noteTypes)) {
    if (dir.toLowerCase() === top) return type;
  }
  return 'generic';
}

/** 由 root 與絕對路徑建立凍結的 NoteRecord */
export function createNoteRecord(
  root: string,
  absPath: string,
  noteTypes: Record<string, NoteType>,
): NoteRecord {
  const relativePath = toPosixRelative(root, absPath);
  const fileName = path.basename(absPath);
  const dir = path.posix.dirname(relativePath);
  const directory = dir === '.' ? '' : dir;

  return Object.freeze({
    path: absPath,
    relativePath,
    basename: stripExtension(fileName),
    extension: extensionOf(fileName),
    directory,
    noteType: classifyNoteType(directory, noteTypes),
  });
}

/** 選單顯示字串：[noteType] 相對路徑 */
export function formatNoteEntry(note: NoteRecord): string {
  return `[${note.noteType}] ${note.relativePath}`;
}
