import { execFileSync } from 'node:child_process';
import fs from 'node:fs';
import type { DirectoryScanner, ScanFilter, ScanListing } from '../../domain/ports/DirectoryScanner.js';
import type { Logger } from '../../shared/Logger.js';
import { hasNoteExtension, matchesJunkPattern } from '../../shared/PathUtils.js';
import { errorMessage } from '../../domain/errors/DomainErrors.js';

/**
 * 以外部 fd 加速掃描
 *
 * 設計意圖：大型筆記庫時比 in-process 走訪快；
 * fd 不存在或執行失敗時退回 fallback scanner，對呼叫端仍是同步結果。
 */
export class FdDirectoryScanner implements DirectoryScanner {
  readonly name = 'fd';

  constructor(
    private readonly fallback: DirectoryScanner,
    private readonly logger: Logger,
    private readonly binary: string = 'fd',
  ) {}

  listFiles(root: string, filter: ScanFilter): ScanListing {
    if (!fs.existsSync(root)) return { files: [], warnings: [] };

    const args = ['--type', 'f', '--hidden', '--no-ignore', '--color', 'never'];
    for (const ext of filter.extensions) args.push('--extension', ext);
    for (const pattern of filter.junkPatterns) args.push('--exclude', pattern);
    args.push('.', '.');

    let output: string;
    try {
      output = execFileSync(this.binary, args, {
        cwd: root,
        encoding: 'utf-8',
        maxBuffer: 64 * 1024 * 1024,
        stdio: ['ignore', 'pipe', 'ignore'],
      });
    } catch (err) {
      this.logger.warn('fd unavailable, falling back', { scanner: this.fallback.name, error: errorMessage(err) });
      return this.fallback.listFiles(root, filter);
    }

    // fd 的 --exclude 比對整段路徑；逐段再過濾一次以與 walk 結果一致
    const files = output
      .split('\n')
      .map((line) => line.trim().replace(/^\.\//, ''))
      .filter((rel) => rel !== '')
      .filter((rel) => !rel.split('/').some((seg) => matchesJunkPattern(seg, filter.junkPatterns)))
      .filter((rel) => hasNoteExtension(rel, filter.extensions));

    return { files, warnings: [] };
  }
}
