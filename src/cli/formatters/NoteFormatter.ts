import path from 'node:path';
import { formatNoteEntry, type NoteRecord } from '../../domain/entities/NoteRecord.js';
import type { LinkReference } from '../../domain/entities/LinkReference.js';
import type { ContentMatch } from '../../domain/ports/ContentSearcher.js';
import type { BacklinkGroup } from '../../application/BacklinkUseCase.js';
import type { RenamePreview } from '../../application/RenameUseCase.js';

export type OutputFormat = 'json' | 'text';

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'json' || value === 'text';
}

/**
 * CLI 輸出格式化：json 給腳本使用，text 給人閱讀
 * 路徑一律以相對 notes root 顯示
 */
export class NoteFormatter {
  constructor(private readonly root: string) {}

  formatNotes(notes: readonly NoteRecord[], format: OutputFormat): string {
    if (format === 'json') return JSON.stringify(notes, null, 2);
    if (notes.length === 0) return 'No notes found.';
    return notes.map(formatNoteEntry).join('\n');
  }

  formatLinks(refs: readonly LinkReference[], format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(refs.map((r) => ({ ...r, sourceFile: this.relative(r.sourceFile) })), null, 2);
    }
    if (refs.length === 0) return 'No links found.';
    return refs
      .map((r) => `${this.relative(r.sourceFile)}:${r.lineNumber}:${r.column + 1}  ${r.linkType}  ${r.targetString}`)
      .join('\n');
  }

  formatBacklinks(groups: readonly BacklinkGroup[], format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(
        groups.map((g) => ({ ...g, sourceFile: this.relative(g.sourceFile) })),
        null,
        2,
      );
    }
    if (groups.length === 0) return 'No backlinks found.';

    const lines = [`${groups.length} note(s) link here:`];
    for (const group of groups) {
      lines.push('', this.relative(group.sourceFile));
      for (const ref of group.references) {
        lines.push(`  ${ref.lineNumber}: ${ref.rawLineText.trim()}`);
      }
    }
    return lines.join('\n');
  }

  formatPreview(preview: RenamePreview, format: OutputFormat): string {
    if (format === 'json') return JSON.stringify(preview, null, 2);

    const lines = [
      `Rename ${this.relative(preview.fromPath)} → ${this.relative(preview.toPath)}`,
      `${preview.totalChanges} line(s) in ${preview.perFile.length} file(s) will change.`,
    ];
    for (const change of preview.changes) {
      lines.push('', `${this.relative(change.file)}:${change.lineNumber}`);
      lines.push(`  - ${change.oldLine}`);
      lines.push(`  + ${change.newLine}`);
    }
    return lines.join('\n');
  }

  formatMatches(matches: readonly ContentMatch[], format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(matches.map((m) => ({ ...m, file: this.relative(m.file) })), null, 2);
    }
    if (matches.length === 0) return 'No matches found.';
    return matches.map((m) => `${this.relative(m.file)}:${m.lineNumber}: ${m.line}`).join('\n');
  }

  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${String(val)}`;
      })
      .join('\n');
  }

  private relative(p: string): string {
    const rel = path.relative(this.root, p);
    return rel.startsWith('..') ? p : rel.split(path.sep).join('/');
  }
}
