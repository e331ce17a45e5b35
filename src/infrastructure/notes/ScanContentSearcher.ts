import type { ContentMatch, ContentSearcher, ContentSearchOptions } from '../../domain/ports/ContentSearcher.js';
import type { NotesFsPort } from '../../domain/ports/NotesFsPort.js';
import type { Logger } from '../../shared/Logger.js';
import { escapeRegex } from '../../shared/PathUtils.js';
import { InvalidQueryError, errorMessage } from '../../domain/errors/DomainErrors.js';

/** 建立逐行比對用的 RegExp */
export function buildMatcher(query: string, options: ContentSearchOptions = {}): RegExp {
  const source = options.regex ? query : escapeRegex(query);
  try {
    return new RegExp(source, options.caseSensitive ? '' : 'i');
  } catch (err) {
    throw new InvalidQueryError(`Invalid regular expression: ${query}`, { cause: err });
  }
}

/** 純 in-process 逐行掃描 */
export class ScanContentSearcher implements ContentSearcher {
  readonly name = 'scan';

  constructor(
    private readonly fsPort: NotesFsPort,
    private readonly logger: Logger,
  ) {}

  search(files: readonly string[], query: string, options: ContentSearchOptions = {}): ContentMatch[] {
    const matcher = buildMatcher(query, options);
    const matches: ContentMatch[] = [];

    for (const file of files) {
      let content: string;
      try {
        content = this.fsPort.readText(file);
      } catch (err) {
        this.logger.warn('Skipping unreadable note', { file, error: errorMessage(err) });
        continue;
      }
      content.split(/\r?\n/).forEach((line, i) => {
        if (matcher.test(line)) {
          matches.push({ file, lineNumber: i + 1, line });
        }
      });
    }

    return matches;
  }
}
