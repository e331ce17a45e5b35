import path from 'node:path';
import type { NotesFsPort } from '../domain/ports/NotesFsPort.js';
import type { NotificationPort } from '../domain/ports/NotificationPort.js';
import type { NoteIndex } from './NoteIndex.js';
import type { Logger } from '../shared/Logger.js';
import { DestinationExistsError, NotFoundError, errorMessage } from '../domain/errors/DomainErrors.js';

export interface ManageFailure {
  path: string;
  reason: string;
}

/** 批次檔案操作結果 */
export interface ManageResult {
  succeeded: number;
  failed: number;
  failures: ManageFailure[];
}

/**
 * 筆記管理用例：移動、封存、刪除
 *
 * 逐檔處理，單一檔案失敗不影響其他檔案；目的地已有同名檔案視為失敗，不覆蓋。
 * 任何操作結束後都會 invalidate 索引。
 */
export class NoteManageUseCase {
  constructor(
    private readonly fsPort: NotesFsPort,
    private readonly index: NoteIndex,
    private readonly notifier: NotificationPort,
    private readonly logger: Logger,
    private readonly archiveDir: string,
  ) {}

  moveNotes(notePaths: readonly string[], destDir: string): ManageResult {
    return this.moveInto(notePaths, path.resolve(this.index.root, destDir), 'Moved');
  }

  /** 移到設定的 archive 資料夾（相對 notes root） */
  archiveNotes(notePaths: readonly string[]): ManageResult {
    return this.moveInto(notePaths, path.resolve(this.index.root, this.archiveDir), 'Archived');
  }

  deleteNotes(notePaths: readonly string[]): ManageResult {
    const result = this.forEach(notePaths, (source) => {
      this.fsPort.removeFile(source);
    });
    this.finish('Deleted', result);
    return result;
  }

  private moveInto(notePaths: readonly string[], target: string, verb: string): ManageResult {
    const result = this.forEach(notePaths, (source) => {
      const dest = path.join(target, path.basename(source));
      if (this.fsPort.exists(dest)) {
        throw new DestinationExistsError(dest);
      }
      this.fsPort.ensureDirectory(target);
      this.fsPort.renameFile(source, dest);
    });
    this.finish(verb, result);
    return result;
  }

  private forEach(notePaths: readonly string[], action: (source: string) => void): ManageResult {
    const result: ManageResult = { succeeded: 0, failed: 0, failures: [] };

    for (const notePath of notePaths) {
      const source = path.resolve(this.index.root, notePath);
      try {
        if (!this.fsPort.isFile(source)) {
          throw new NotFoundError(source);
        }
        action(source);
        result.succeeded++;
      } catch (err) {
        result.failed++;
        result.failures.push({ path: source, reason: errorMessage(err) });
        this.logger.warn('File operation failed', { path: source, error: errorMessage(err) });
      }
    }

    return result;
  }

  private finish(verb: string, result: ManageResult): void {
    this.index.invalidate();
    this.notifier.notify(
      `${verb} ${result.succeeded} file(s), ${result.failed} failed.`,
      result.failed > 0 ? 'warn' : 'info',
    );
  }
}
