import path from 'node:path';
import type { NotesFsPort } from '../domain/ports/NotesFsPort.js';
import type { NotificationPort } from '../domain/ports/NotificationPort.js';
import { createNoteRecord, type NoteRecord, type NoteType } from '../domain/entities/NoteRecord.js';
import type { LinkType } from '../domain/entities/LinkReference.js';
import type { ApplyResult, RenameChange, RenameDecision, RenameOutcome } from '../domain/entities/RenameChange.js';
import { RenameTransaction } from '../domain/entities/RenameTransaction.js';
import {
  DestinationExistsError,
  InvalidRenameError,
  InvalidTransitionError,
  NotFoundError,
  PartialApplyError,
  StaleLineError,
  errorMessage,
} from '../domain/errors/DomainErrors.js';
import type { NoteIndex } from './NoteIndex.js';
import type { BacklinkUseCase, ResolvedBacklink } from './BacklinkUseCase.js';
import type { Logger } from '../shared/Logger.js';
import { hasNoteExtension, hasPathSeparator, stripExtension, toPosixRelative } from '../shared/PathUtils.js';

export type RenameComputation =
  | { ok: true; transaction: RenameTransaction }
  | { ok: false; error: NotFoundError | InvalidRenameError | DestinationExistsError };

/** 預覽內容：不產生任何副作用 */
export interface RenamePreview {
  fromPath: string;
  toPath: string;
  changes: readonly RenameChange[];
  totalChanges: number;
  perFile: { file: string; count: number }[];
}

export interface ApplyOptions {
  backup: boolean;
}

export interface RenameUseCaseOptions {
  extensions: readonly string[];
  noteTypes: Record<string, NoteType>;
  rollbackOnFailure: boolean;
}

/** 改寫目標時依序嘗試的寫法與其替換值 */
interface Spelling {
  spelling: string;
  replacement: string;
}

interface RenameContext {
  record: NoteRecord;
  fromPath: string;
  toPath: string;
  newBasename: string;
  newFileName: string;
  root: string;
}

interface InternalApply {
  result: ApplyResult;
  /** 改寫前的檔案內容，供 rollback 使用 */
  originals: Map<string, string>;
}

/**
 * 重新命名用例：計算 changeset → 預覽 → 套用（改寫連結 + 重新命名檔案）
 *
 * 設計意圖：compute / preview 不寫入任何檔案；apply 逐檔重新讀取並以 oldLine 比對，
 * 計算後被外部修改的行只會被跳過並計數，不會覆蓋使用者的編輯。
 * 可預期的失敗（stale 行、檔名重新命名失敗）都折疊在回傳的 outcome 中。
 */
export class RenameUseCase {
  constructor(
    private readonly fsPort: NotesFsPort,
    private readonly index: NoteIndex,
    private readonly backlinks: BacklinkUseCase,
    private readonly notifier: NotificationPort,
    private readonly logger: Logger,
    private readonly options: RenameUseCaseOptions,
  ) {}

  compute(oldPath: string, newBasename: string): RenameComputation {
    const fromPath = path.resolve(oldPath);
    if (!this.fsPort.isFile(fromPath)) {
      return { ok: false, error: new NotFoundError(fromPath) };
    }

    const notes = this.index.getOrBuild();
    const record = notes.find((n) => n.path === fromPath)
      ?? createNoteRecord(this.index.root, fromPath, this.options.noteTypes);

    let name = newBasename.trim();
    if (hasNoteExtension(name, this.options.extensions)) {
      name = stripExtension(name).trim();
    }
    if (name === '') {
      return { ok: false, error: new InvalidRenameError('New name must not be empty') };
    }
    if (hasPathSeparator(name)) {
      return { ok: false, error: new InvalidRenameError(`New name must not contain a path separator: ${name}`) };
    }
    if (LINK_SYNTAX_CHARS.test(name)) {
      return { ok: false, error: new InvalidRenameError(`New name must not contain [, ], | or #: ${name}`) };
    }
    if (name === record.basename) {
      return { ok: false, error: new InvalidRenameError(`New name is the same as the current name: ${name}`) };
    }

    const newFileName = `${name}${path.extname(fromPath)}`;
    const toPath = path.join(path.dirname(fromPath), newFileName);
    const collision = this.findCollision(fromPath, toPath, name);
    if (collision) {
      return { ok: false, error: new DestinationExistsError(collision) };
    }

    const refs = this.backlinks.backlinksFor(fromPath, notes);
    const changes = this.synthesize(refs, {
      record,
      fromPath,
      toPath,
      newBasename: name,
      newFileName,
      root: this.index.root,
    });

    this.logger.debug('Rename changeset computed', {
      from: fromPath,
      to: toPath,
      backlinks: refs.length,
      changes: changes.length,
    });
    return { ok: true, transaction: new RenameTransaction(fromPath, toPath, name, changes) };
  }

  preview(tx: RenameTransaction): RenamePreview {
    if (tx.state === 'computed') {
      tx.markPreviewed();
    } else if (tx.state !== 'previewed') {
      throw new InvalidTransitionError(tx.state, 'previewed');
    }

    return {
      fromPath: tx.fromPath,
      toPath: tx.toPath,
      changes: tx.changes,
      totalChanges: tx.changes.length,
      perFile: [...tx.changesPerFile()].map(([file, count]) => ({ file, count })),
    };
  }

  decide(tx: RenameTransaction, decision: RenameDecision): RenameOutcome {
    if (decision === 'cancel') {
      tx.cancel();
      this.notifier.notify('Rename cancelled.', 'info');
      return {
        status: 'cancelled',
        fromPath: tx.fromPath,
        toPath: tx.toPath,
        renamed: false,
        rolledBack: false,
        appliedCount: 0,
        failedCount: 0,
        staleChanges: [],
        filesWritten: [],
        backups: [],
      };
    }
    return this.apply(tx, { backup: decision === 'applyWithBackup' });
  }

  /** 只改寫連結文字，不重新命名檔案；可重複呼叫（第二次全部視為 stale） */
  applyChanges(changes: readonly RenameChange[], options: ApplyOptions): ApplyResult {
    return this.applyInternal(changes, options.backup).result;
  }

  apply(tx: RenameTransaction, options: ApplyOptions): RenameOutcome {
    if (!tx.canApply()) {
      throw new InvalidTransitionError(tx.state, 'applied');
    }

    const { result, originals } = this.applyInternal(tx.changes, options.backup);

    let renamed = false;
    let partialError: PartialApplyError | undefined;
    let rolledBack = false;
    try {
      this.fsPort.renameFile(tx.fromPath, tx.toPath);
      renamed = true;
    } catch (err) {
      partialError = new PartialApplyError(tx.fromPath, tx.toPath, result.filesWritten.length, { cause: err });
      this.logger.error('Note rename failed after links were rewritten', {
        from: tx.fromPath,
        to: tx.toPath,
        filesRewritten: result.filesWritten.length,
        error: errorMessage(err),
      });
      if (this.options.rollbackOnFailure) {
        rolledBack = this.rollback(originals);
      }
    } finally {
      this.index.invalidate();
    }

    const outcome: RenameOutcome = {
      ...result,
      status: renamed ? 'applied' : 'partial',
      fromPath: tx.fromPath,
      toPath: tx.toPath,
      renamed,
      partialError,
      rolledBack,
    };
    tx.markApplied(outcome);

    this.logger.info('Rename applied', {
      from: tx.fromPath,
      to: tx.toPath,
      status: outcome.status,
      applied: outcome.appliedCount,
      failed: outcome.failedCount,
      files: outcome.filesWritten.length,
    });
    this.report(outcome);
    return outcome;
  }

  /**
   * 目的地資料夾中任何副檔名的同名筆記都算衝突，否則連到它的連結會改指向被重新命名的筆記。
   * 只改大小寫時，大小寫不敏感的檔案系統上目的地就是來源檔本身，不算衝突。
   */
  private findCollision(fromPath: string, toPath: string, name: string): string | null {
    const dir = path.dirname(toPath);
    const candidates = [toPath, ...this.options.extensions.map((ext) => path.join(dir, `${name}.${ext}`))];
    for (const candidate of candidates) {
      if (!this.fsPort.exists(candidate)) continue;
      if (this.fsPort.isSameFile(candidate, fromPath)) continue;
      return candidate;
    }
    return null;
  }

  // --- changeset 合成 ---

  private synthesize(refs: readonly ResolvedBacklink[], ctx: RenameContext): RenameChange[] {
    const byLine = new Map<string, ResolvedBacklink[]>();
    for (const ref of refs) {
      if (ref.linkType === 'zkId') continue;
      const key = `${ref.sourceFile}\0${ref.lineNumber}`;
      const list = byLine.get(key) ?? [];
      list.push(ref);
      byLine.set(key, list);
    }

    const changes: RenameChange[] = [];
    for (const lineRefs of byLine.values()) {
      const first = lineRefs[0];
      let line = first.rawLineText;
      const substituted: LinkType[] = [];

      // 由右至左替換，前面連結的欄位不受影響
      const ordered = [...lineRefs].sort((a, b) => b.column - a.column);
      for (const ref of ordered) {
        const replacement = this.substitute(ref, ctx);
        if (replacement === null || replacement === ref.matchText) continue;
        line = line.slice(0, ref.column) + replacement + line.slice(ref.column + ref.matchText.length);
        substituted.unshift(ref.linkType);
      }

      if (line === first.rawLineText) continue;
      changes.push({
        file: first.sourceFile,
        lineNumber: first.lineNumber,
        oldLine: first.rawLineText,
        newLine: line,
        linkType: substituted[0] ?? first.linkType,
      });
    }
    return changes;
  }

  /** 回傳改寫後的連結 token；無法改寫時回傳 null */
  private substitute(ref: ResolvedBacklink, ctx: RenameContext): string | null {
    switch (ref.linkType) {
      case 'wiki':
      case 'wikiAlias': {
        const target = splitSuffix(ref.targetString, '#');
        const rewritten = replaceFinalSegment(target.head, ctx, this.options.extensions);
        return replaceTarget(ref.matchText, 2, ref.targetString, rewritten + target.tail);
      }
      case 'orgFile': {
        const target = splitSuffix(ref.targetString, '::');
        const rewritten = this.rewritePath(target.head, ctx);
        return replaceTarget(ref.matchText, '[[file:'.length, ref.targetString, rewritten + target.tail);
      }
      case 'markdown': {
        const target = splitSuffix(ref.targetString, '#');
        const decoded = safeDecode(target.head);
        // 目標原本是百分比編碼時，改寫後同樣編碼
        const rewritten = decoded !== target.head
          ? encodeURI(this.rewritePath(decoded, ctx))
          : this.rewritePath(target.head, ctx).replace(/ /g, '%20');
        const from = (ref.label ?? '').length + 2;
        return replaceTarget(ref.matchText, from, ref.targetString, rewritten + target.tail);
      }
      case 'zkId':
        return null;
    }
  }

  /** 依序嘗試各種舊路徑寫法；都不符時退回替換最後一段 */
  private rewritePath(target: string, ctx: RenameContext): string {
    const { record } = ctx;
    const oldRel = record.relativePath;
    const newRel = toPosixRelative(ctx.root, ctx.toPath);
    const spellings: Spelling[] = [
      { spelling: ctx.fromPath, replacement: ctx.toPath },
      { spelling: oldRel, replacement: newRel },
      { spelling: `${record.basename}.${record.extension}`, replacement: ctx.newFileName },
      ...this.options.extensions
        .filter((ext) => ext !== record.extension)
        .map((ext) => ({ spelling: `${record.basename}.${ext}`, replacement: ctx.newFileName })),
      { spelling: record.basename, replacement: ctx.newBasename },
    ];

    const lower = target.toLowerCase();
    for (const { spelling, replacement } of spellings) {
      if (!lower.endsWith(spelling.toLowerCase())) continue;
      const cut = target.length - spelling.length;
      if (cut > 0 && !isSeparator(target[cut - 1])) continue;
      return target.slice(0, cut) + replacement;
    }
    return replaceFinalSegment(target, ctx, this.options.extensions);
  }

  // --- 套用 ---

  private applyInternal(changes: readonly RenameChange[], backup: boolean): InternalApply {
    const result: ApplyResult = {
      appliedCount: 0,
      failedCount: 0,
      staleChanges: [],
      filesWritten: [],
      backups: [],
    };
    const originals = new Map<string, string>();

    for (const [file, fileChanges] of groupByFile(changes)) {
      let content: string;
      try {
        content = this.fsPort.readText(file);
      } catch (err) {
        this.logger.warn('Cannot read file while applying rename', { file, error: errorMessage(err) });
        result.failedCount += fileChanges.length;
        continue;
      }

      // 每行保留自己的換行字元，未改寫的行原樣寫回
      const lines = content.split(/(?<=\n)/);
      let changed = 0;

      for (const change of fileChanges) {
        const idx = change.lineNumber - 1;
        const { text, eol } = splitTerminator(lines[idx] ?? '');
        if (idx >= lines.length || text !== change.oldLine) {
          result.staleChanges.push(new StaleLineError(file, change.lineNumber));
          result.failedCount++;
          continue;
        }
        lines[idx] = change.newLine + eol;
        changed++;
      }
      if (changed === 0) continue;

      try {
        if (backup) {
          const backupPath = `${file}.bak`;
          this.fsPort.copyFile(file, backupPath);
          result.backups.push(backupPath);
        }
        this.fsPort.writeText(file, lines.join(''));
      } catch (err) {
        this.logger.error('Cannot write file while applying rename', { file, error: errorMessage(err) });
        result.failedCount += changed;
        continue;
      }

      originals.set(file, content);
      result.appliedCount += changed;
      result.filesWritten.push(file);
    }

    return { result, originals };
  }

  /** 還原已改寫的檔案；全部成功才回傳 true */
  private rollback(originals: Map<string, string>): boolean {
    let restored = true;
    for (const [file, content] of originals) {
      try {
        this.fsPort.writeText(file, content);
      } catch (err) {
        restored = false;
        this.logger.error('Cannot restore file during rollback', { file, error: errorMessage(err) });
      }
    }
    return restored;
  }

  private report(outcome: RenameOutcome): void {
    if (outcome.status === 'partial' && outcome.partialError) {
      const suffix = outcome.rolledBack ? ' Link changes were rolled back.' : '';
      this.notifier.notify(`${outcome.partialError.message}.${suffix}`, 'error');
      return;
    }

    const from = path.basename(outcome.fromPath);
    const to = path.basename(outcome.toPath);
    let message = `Renamed ${from} → ${to}; updated ${outcome.appliedCount} link line(s) in ${outcome.filesWritten.length} file(s).`;
    if (outcome.failedCount > 0) {
      message += ` ${outcome.failedCount} change(s) skipped.`;
    }
    this.notifier.notify(message, outcome.failedCount > 0 ? 'warn' : 'info');
  }
}

/** 會改變連結解析方式的字元 */
const LINK_SYNTAX_CHARS = /[[\]|#]/;

function groupByFile(changes: readonly RenameChange[]): Map<string, RenameChange[]> {
  const groups = new Map<string, RenameChange[]>();
  for (const change of changes) {
    const list = groups.get(change.file) ?? [];
    list.push(change);
    groups.set(change.file, list);
  }
  return groups;
}

/** 將一行拆成內容與結尾的 \n 或 \r\n */
function splitTerminator(line: string): { text: string; eol: string } {
  const match = /\r?\n$/.exec(line);
  return match ? { text: line.slice(0, match.index), eol: match[0] } : { text: line, eol: '' };
}

function isSeparator(ch: string): boolean {
  return ch === '/' || ch === '\\';
}

/** 以第一個 marker 切開，tail 含 marker 本身 */
function splitSuffix(target: string, marker: string): { head: string; tail: string } {
  const idx = target.indexOf(marker);
  return idx === -1 ? { head: target, tail: '' } : { head: target.slice(0, idx), tail: target.slice(idx) };
}

/** 保留目錄前綴與首尾空白，替換最後一段；原本帶副檔名則保留副檔名 */
function replaceFinalSegment(target: string, ctx: RenameContext, extensions: readonly string[]): string {
  const sep = Math.max(target.lastIndexOf('/'), target.lastIndexOf('\\'));
  const prefix = target.slice(0, sep + 1);
  const segment = target.slice(sep + 1);

  const lead = /^\s*/.exec(segment)?.[0] ?? '';
  const trail = /\s*$/.exec(segment)?.[0] ?? '';
  const core = segment.trim();
  const ext = hasNoteExtension(core, extensions) ? path.extname(core) : '';

  return `${prefix}${lead}${ctx.newBasename}${ext}${trail}`;
}

/** 在 token 中 from 位置之後替換第一個出現的目標字串 */
function replaceTarget(matchText: string, from: number, oldTarget: string, newTarget: string): string {
  const idx = matchText.indexOf(oldTarget, from);
  if (idx === -1) return matchText;
  return matchText.slice(0, idx) + newTarget + matchText.slice(idx + oldTarget.length);
}

function safeDecode(target: string): string {
  try {
    return decodeURIComponent(target);
  } catch {
    return target;
  }
}
