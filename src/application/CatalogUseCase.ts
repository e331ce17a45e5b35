import path from 'node:path';
import type { NotesFsPort } from '../domain/ports/NotesFsPort.js';
import type { NotificationPort } from '../domain/ports/NotificationPort.js';
import type { NoteRecord, NoteType } from '../domain/entities/NoteRecord.js';
import type { NoteIndex } from './NoteIndex.js';
import { stripExtension, stripIdPrefix } from '../shared/PathUtils.js';

export interface CatalogStats {
  totalNotes: number;
  byType: Partial<Record<NoteType, number>>;
  byDirectory: Record<string, number>;
  byExtension: Record<string, number>;
  /** 索引快取年齡（毫秒） */
  snapshotAgeMs: number | null;
}

export interface IndexNoteResult {
  path: string;
  totalNotes: number;
}

/** root 層的筆記在索引筆記中的分組標題 */
export const ROOT_GROUP = '(root)';

/**
 * 目錄統計與索引筆記產生
 */
export class CatalogUseCase {
  constructor(
    private readonly fsPort: NotesFsPort,
    private readonly index: NoteIndex,
    private readonly notifier: NotificationPort,
    private readonly indexFileName: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  stats(): CatalogStats {
    const notes = this.index.getOrBuild();
    const byType: Partial<Record<NoteType, number>> = {};
    const byDirectory: Record<string, number> = {};
    const byExtension: Record<string, number> = {};

    for (const note of notes) {
      byType[note.noteType] = (byType[note.noteType] ?? 0) + 1;
      const dir = note.directory || ROOT_GROUP;
      byDirectory[dir] = (byDirectory[dir] ?? 0) + 1;
      byExtension[note.extension] = (byExtension[note.extension] ?? 0) + 1;
    }

    return {
      totalNotes: notes.length,
      byType,
      byDirectory,
      byExtension,
      snapshotAgeMs: this.index.snapshotAge(),
    };
  }

  /**
   * 在 notes root 寫入索引筆記（覆蓋既有檔案），索引筆記本身不列入
   */
  writeIndexNote(): IndexNoteResult {
    const indexPath = path.join(this.index.root, this.indexFileName);
    const notes = this.index.getOrBuild().filter((n) => n.path !== indexPath);

    const lines = [
      '# Notes Index',
      '',
      `_Updated:_ ${this.now().toISOString()}`,
      `_Total Notes:_ ${notes.length}`,
    ];

    for (const [dir, group] of groupByDirectory(notes)) {
      lines.push('', `## ${dir}`, '');
      for (const note of group) {
        lines.push(`- [[${stripExtension(note.relativePath)}|${stripIdPrefix(note.basename)}]]`);
      }
    }
    lines.push('');

    this.fsPort.writeText(indexPath, lines.join('\n'));
    this.index.invalidate();
    this.notifier.notify(`Index written: ${notes.length} notes`, 'info');
    return { path: indexPath, totalNotes: notes.length };
  }
}

/** 依資料夾分組；root 在最前，其餘依名稱排序 */
function groupByDirectory(notes: readonly NoteRecord[]): [string, NoteRecord[]][] {
  const groups = new Map<string, NoteRecord[]>();
  for (const note of notes) {
    const list = groups.get(note.directory) ?? [];
    list.push(note);
    groups.set(note.directory, list);
  }
  return [...groups.entries()]
    .sort(([a], [b]) => (a === '' ? -1 : b === '' ? 1 : a < b ? -1 : 1))
    .map(([dir, group]): [string, NoteRecord[]] => [dir || ROOT_GROUP, group]);
}
