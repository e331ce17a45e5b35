import path from 'node:path';
import type { NotesFsPort } from '../domain/ports/NotesFsPort.js';
import type { LinkReference, LinkType } from '../domain/entities/LinkReference.js';
import { createNoteRecord, type NoteRecord, type NoteType } from '../domain/entities/NoteRecord.js';
import {
  collapseName,
  expandHome,
  hasNoteExtension,
  hasPathSeparator,
  normalizeName,
  stripAnchor,
  stripExtension,
} from '../shared/PathUtils.js';

export type ResolutionStrategy = 'exact' | 'normalized' | 'collapsed' | 'path' | 'zkId';

export interface Resolution {
  note: NoteRecord;
  strategy: ResolutionStrategy;
}

export interface ResolveContext {
  /** 連結所在檔案，用於解析相對路徑 */
  sourceFile?: string;
  linkType?: LinkType;
}

export interface LinkResolverOptions {
  root: string;
  extensions: readonly string[];
  noteTypes: Record<string, NoteType>;
}

/**
 * 連結解析器：將連結目標字串對應到一個 NoteRecord
 *
 * Fallback 順序（先命中者勝出，同層以索引順序決勝）：
 * 1. basename 不分大小寫完全相符
 * 2. 空白/底線正規化為 - 後相符
 * 3. 移除所有空白、-、_ 後的折疊比對（線性掃描，最寬鬆）
 * 4. 無副檔名時，依序補上支援的副檔名檢查 notes root 下是否有該檔
 *
 * 帶副檔名或路徑分隔符的目標先當作路徑解析（來源檔所在目錄 → notes root），
 * 找不到檔案時再以最後一段名稱走 1–3。
 * 解析不到回傳 null：連結指向尚未建立的筆記是正常情況，不是錯誤。
 */
export class LinkResolver {
  constructor(
    private readonly fsPort: NotesFsPort,
    private readonly options: LinkResolverOptions,
  ) {}

  resolve(targetString: string, index: readonly NoteRecord[], context: ResolveContext = {}): NoteRecord | null {
    return this.resolveDetailed(targetString, index, context)?.note ?? null;
  }

  /** 依 LinkReference 的類型與來源檔解析 */
  resolveReference(ref: LinkReference, index: readonly NoteRecord[]): Resolution | null {
    return this.resolveDetailed(ref.targetString, index, {
      sourceFile: ref.sourceFile,
      linkType: ref.linkType,
    });
  }

  resolveDetailed(
    targetString: string,
    index: readonly NoteRecord[],
    context: ResolveContext = {},
  ): Resolution | null {
    if (context.linkType === 'zkId') {
      return this.resolveZkId(targetString.trim(), index);
    }

    let target = stripAnchor(targetString).trim();
    if (context.linkType === 'markdown') {
      target = safeDecode(target);
    }
    if (target === '') return null;

    const hasExt = hasNoteExtension(target, this.options.extensions);
    const looksLikePath = hasExt || hasPathSeparator(target) || path.isAbsolute(expandHome(target));

    if (looksLikePath) {
      const byPath = this.resolveAsPath(target, index, context.sourceFile);
      if (byPath) return byPath;
    }

    const lastSegment = target.split(/[/\\]/).pop() ?? target;
    const name = hasExt ? stripExtension(lastSegment) : lastSegment;

    const byName = this.resolveByName(name, index);
    if (byName) return byName;

    // 4. 無副檔名：直接檢查 notes root 下的檔案
    if (!hasExt) {
      for (const ext of this.options.extensions) {
        const candidate = path.resolve(this.options.root, `${target}.${ext}`);
        if (this.fsPort.isFile(candidate)) {
          return { note: this.recordFor(candidate, index), strategy: 'path' };
        }
      }
    }

    return null;
  }

  /** fallback 1–3 */
  private resolveByName(name: string, index: readonly NoteRecord[]): Resolution | null {
    const lower = name.toLowerCase();
    const exact = index.find((n) => n.basename.toLowerCase() === lower);
    if (exact) return { note: exact, strategy: 'exact' };

    const normalized = normalizeName(name);
    const byNormalized = index.find((n) => normalizeName(n.basename) === normalized);
    if (byNormalized) return { note: byNormalized, strategy: 'normalized' };

    const collapsed = collapseName(name);
    if (collapsed === '') return null;
    const byCollapsed = index.find((n) => collapseName(n.basename) === collapsed);
    if (byCollapsed) return { note: byCollapsed, strategy: 'collapsed' };

    return null;
  }

  /** 以路徑解析：絕對路徑，或相對來源檔目錄、再相對 notes root */
  private resolveAsPath(target: string, index: readonly NoteRecord[], sourceFile?: string): Resolution | null {
    const expanded = expandHome(target);
    const bases: string[] = [];
    if (path.isAbsolute(expanded)) {
      bases.push(path.normalize(expanded));
    } else {
      if (sourceFile) bases.push(path.resolve(path.dirname(sourceFile), expanded));
      bases.push(path.resolve(this.options.root, expanded));
    }

    for (const base of bases) {
      const candidates = hasNoteExtension(base, this.options.extensions)
        ? [base]
        : this.options.extensions.map((ext) => `${base}.${ext}`);
      for (const candidate of candidates) {
        if (this.fsPort.isFile(candidate)) {
          return { note: this.recordFor(candidate, index), strategy: 'path' };
        }
      }
    }
    return null;
  }

  /** zk ID：basename 等於 ID 或以 "ID-" 開頭 */
  private resolveZkId(id: string, index: readonly NoteRecord[]): Resolution | null {
    if (!id) return null;
    const note = index.find((n) => n.basename === id || n.basename.startsWith(`${id}-`));
    return note ? { note, strategy: 'zkId' } : null;
  }

  /** 優先使用索引中的紀錄；不在索引內（例如 Archive/）則即時建立 */
  private recordFor(absPath: string, index: readonly NoteRecord[]): NoteRecord {
    return index.find((n) => n.path === absPath)
      ?? createNoteRecord(this.options.root, absPath, this.options.noteTypes);
  }
}

function safeDecode(target: string): string {
  try {
    return decodeURIComponent(target);
  } catch {
    return target;
  }
}
