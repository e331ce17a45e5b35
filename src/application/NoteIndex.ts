import path from 'node:path';
import type { DirectoryScanner } from '../domain/ports/DirectoryScanner.js';
import { createNoteRecord, type NoteRecord, type NoteType } from '../domain/entities/NoteRecord.js';
import type { Logger } from '../shared/Logger.js';

/** NoteIndex 建構設定 */
export interface NoteIndexOptions {
  root: string;
  extensions: readonly string[];
  junkPatterns: readonly string[];
  noteTypes: Record<string, NoteType>;
  /** 快取 TTL（毫秒）；0 代表不快取 */
  ttlMs: number;
}

interface Snapshot {
  root: string;
  notes: readonly NoteRecord[];
  builtAt: number;
}

/**
 * 筆記索引：遞迴掃描 notes root 並以 TTL 快取結果
 *
 * 設計意圖：快取是由宿主持有的明確物件，而非模組層級的全域狀態。
 * 重建時整份替換（不就地修改），讀者只會看到舊或新的完整快照。
 * 不監看檔案系統；任何建立、刪除、移動、重新命名筆記的程式路徑都必須呼叫 invalidate()。
 */
export class NoteIndex {
  private snapshot: Snapshot | null = null;

  constructor(
    private readonly scanner: DirectoryScanner,
    private readonly options: NoteIndexOptions,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now,
  ) {}

  get root(): string {
    return this.options.root;
  }

  get extensions(): readonly string[] {
    return this.options.extensions;
  }

  /** 掃描並取代快取；root 不存在時回傳空清單 */
  build(root: string = this.options.root): readonly NoteRecord[] {
    const started = this.now();
    const absRoot = path.resolve(root);
    const listing = this.scanner.listFiles(absRoot, {
      extensions: this.options.extensions,
      junkPatterns: this.options.junkPatterns,
    });

    for (const w of listing.warnings) {
      this.logger.warn('Skipping unreadable directory', { path: w.path, reason: w.reason });
    }

    const unique = [...new Set(listing.files)].sort();
    const notes = Object.freeze(
      unique.map((rel) => createNoteRecord(absRoot, path.join(absRoot, rel), this.options.noteTypes)),
    );

    this.snapshot = { root: absRoot, notes, builtAt: this.now() };
    this.logger.debug('Note index built', {
      root: absRoot,
      scanner: this.scanner.name,
      notes: notes.length,
      durationMs: this.now() - started,
    });
    return notes;
  }

  /** 快取仍有效時回傳快取，否則重建 */
  getOrBuild(): readonly NoteRecord[] {
    if (this.isFresh() && this.snapshot) {
      return this.snapshot.notes;
    }
    return this.build();
  }

  invalidate(): void {
    this.snapshot = null;
  }

  /** 快取年齡（毫秒）；尚未建立時為 null */
  snapshotAge(): number | null {
    return this.snapshot ? this.now() - this.snapshot.builtAt : null;
  }

  /** 在目前快照中以絕對路徑查找 */
  findByPath(notePath: string): NoteRecord | undefined {
    const abs = path.resolve(notePath);
    return this.getOrBuild().find((n) => n.path === abs);
  }

  private isFresh(): boolean {
    if (!this.snapshot || this.options.ttlMs <= 0) return false;
    if (this.snapshot.root !== path.resolve(this.options.root)) return false;
    return this.now() - this.snapshot.builtAt < this.options.ttlMs;
  }
}
