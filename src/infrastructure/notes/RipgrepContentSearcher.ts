import { execFileSync } from 'node:child_process';
import type { ContentMatch, ContentSearcher, ContentSearchOptions } from '../../domain/ports/ContentSearcher.js';
import type { Logger } from '../../shared/Logger.js';
import { errorMessage } from '../../domain/errors/DomainErrors.js';

/** rg 找不到任何結果時 exit code 為 1，不是錯誤 */
function isNoMatchExit(err: unknown): boolean {
  return err instanceof Error && 'status' in err && err.status === 1;
}

/**
 * 以 ripgrep 搜尋內容，失敗時退回 fallback searcher
 */
export class RipgrepContentSearcher implements ContentSearcher {
  readonly name = 'rg';

  constructor(
    private readonly fallback: ContentSearcher,
    private readonly logger: Logger,
    private readonly binary: string = 'rg',
  ) {}

  search(files: readonly string[], query: string, options: ContentSearchOptions = {}): ContentMatch[] {
    if (files.length === 0) return [];

    const args = ['--line-number', '--with-filename', '--no-heading', '--color', 'never', '--null'];
    if (!options.caseSensitive) args.push('--ignore-case');
    if (!options.regex) args.push('--fixed-strings');
    args.push('--', query, ...files);

    let output: string;
    try {
      output = execFileSync(this.binary, args, {
        encoding: 'utf-8',
        maxBuffer: 64 * 1024 * 1024,
        stdio: ['ignore', 'pipe', 'ignore'],
      });
    } catch (err) {
      if (isNoMatchExit(err)) return [];
      this.logger.warn('rg unavailable, falling back', { searcher: this.fallback.name, error: errorMessage(err) });
      return this.fallback.search(files, query, options);
    }

    return parseRipgrepOutput(output);
  }
}

/** 解析 `file\0line:text` 格式（--null 讓含冒號的路徑也能正確切分） */
export function parseRipgrepOutput(output: string): ContentMatch[] {
  const matches: ContentMatch[] = [];
  for (const raw of output.split('\n')) {
    if (raw === '') continue;
    const nul = raw.indexOf('\0');
    if (nul === -1) continue;
    const file = raw.slice(0, nul);
    const rest = raw.slice(nul + 1);
    const colon = rest.indexOf(':');
    if (colon === -1) continue;
    const lineNumber = Number.parseInt(rest.slice(0, colon), 10);
    if (Number.isNaN(lineNumber)) continue;
    matches.push({ file, lineNumber, line: rest.slice(colon + 1).replace(/\r$/, '') });
  }
  return matches;
}
