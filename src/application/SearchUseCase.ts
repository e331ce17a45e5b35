import type { ContentMatch, ContentSearcher, ContentSearchOptions } from '../domain/ports/ContentSearcher.js';
import type { NotesFsPort } from '../domain/ports/NotesFsPort.js';
import type { NoteRecord } from '../domain/entities/NoteRecord.js';
import type { TagExtractor } from '../infrastructure/notes/TagExtractor.js';
import type { NoteIndex } from './NoteIndex.js';
import type { Logger } from '../shared/Logger.js';
import { errorMessage } from '../domain/errors/DomainErrors.js';

export interface TagCount {
  tag: string;
  count: number;
}

/**
 * 全文搜尋與標籤彙整
 *
 * 設計意圖：搜尋範圍限定在索引內的筆記檔（已排除垃圾檔與 archive），
 * 實際比對交給可替換的 ContentSearcher（rg 或 in-process 掃描）。
 */
export class SearchUseCase {
  constructor(
    private readonly fsPort: NotesFsPort,
    private readonly index: NoteIndex,
    private readonly searcher: ContentSearcher,
    private readonly tagExtractor: TagExtractor,
    private readonly logger: Logger,
  ) {}

  searchText(query: string, options: ContentSearchOptions = {}): ContentMatch[] {
    if (query.trim() === '') return [];
    const files = this.index.getOrBuild().map((n) => n.path);
    const start = Date.now();
    const matches = this.searcher.search(files, query, options);

    this.logger.debug('Content search finished', {
      searcher: this.searcher.name,
      files: files.length,
      matches: matches.length,
      durationMs: Date.now() - start,
    });
    return matches.sort((a, b) => (a.file === b.file ? a.lineNumber - b.lineNumber : a.file < b.file ? -1 : 1));
  }

  /** 依出現的筆記數遞減排序，同數量依名稱排序 */
  listTags(): TagCount[] {
    const counts = new Map<string, TagCount>();
    for (const [, tags] of this.tagsByNote()) {
      for (const tag of tags) {
        const key = tag.toLowerCase();
        const entry = counts.get(key);
        if (entry) entry.count++;
        else counts.set(key, { tag, count: 1 });
      }
    }
    return [...counts.values()].sort(
      (a, b) => b.count - a.count || (a.tag.toLowerCase() < b.tag.toLowerCase() ? -1 : 1),
    );
  }

  /** 不分大小寫；可帶或不帶開頭的 # */
  notesWithTag(tag: string): NoteRecord[] {
    const wanted = tag.replace(/^#/, '').toLowerCase();
    if (!wanted) return [];
    return this.tagsByNote()
      .filter(([, tags]) => tags.some((t) => t.toLowerCase() === wanted))
      .map(([note]) => note);
  }

  private tagsByNote(): [NoteRecord, string[]][] {
    const result: [NoteRecord, string[]][] = [];
    for (const note of this.index.getOrBuild()) {
      try {
        result.push([note, this.tagExtractor.extract(this.fsPort.readText(note.path))]);
      } catch (err) {
        this.logger.warn('Skipping unreadable note', { file: note.path, error: errorMessage(err) });
      }
    }
    return result;
  }
}
