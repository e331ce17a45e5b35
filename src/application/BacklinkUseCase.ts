import path from 'node:path';
import type { NotesFsPort } from '../domain/ports/NotesFsPort.js';
import type { NoteRecord } from '../domain/entities/NoteRecord.js';
import type { LinkReference } from '../domain/entities/LinkReference.js';
import type { LinkExtractor } from '../infrastructure/notes/LinkExtractor.js';
import type { LinkResolver, ResolutionStrategy } from './LinkResolver.js';
import type { Logger } from '../shared/Logger.js';
import { errorMessage } from '../domain/errors/DomainErrors.js';

/** 帶解析方式的 backlink */
export interface ResolvedBacklink extends LinkReference {
  strategy: ResolutionStrategy;
}

/** 依來源筆記分組的 backlink */
export interface BacklinkGroup {
  sourceFile: string;
  references: ResolvedBacklink[];
}

/**
 * Backlink 用例：找出所有解析結果指向目標筆記的連結
 *
 * 設計意圖：每次查詢都重新讀取並解析所有筆記（O(筆記數 × 平均連結數)），
 * 不維護持久的反向索引：筆記常被外部編輯器修改，沒有檔案監看就無法保證反向索引正確。
 * 結果順序依索引順序（相對路徑排序），同一檔案內依行號與欄位。
 */
export class BacklinkUseCase {
  constructor(
    private readonly fsPort: NotesFsPort,
    private readonly extractor: LinkExtractor,
    private readonly resolver: LinkResolver,
    private readonly logger: Logger,
  ) {}

  backlinksFor(targetPath: string, index: readonly NoteRecord[]): ResolvedBacklink[] {
    const target = path.resolve(targetPath);
    const results: ResolvedBacklink[] = [];

    for (const note of index) {
      if (note.path === target) continue;

      let content: string;
      try {
        content = this.fsPort.readText(note.path);
      } catch (err) {
        this.logger.warn('Skipping unreadable note', { file: note.path, error: errorMessage(err) });
        continue;
      }

      for (const ref of this.extractor.extract(content, note.path)) {
        const resolution = this.resolver.resolveReference(ref, index);
        if (resolution && resolution.note.path === target) {
          results.push({ ...ref, strategy: resolution.strategy });
        }
      }
    }

    return results;
  }

  /** 依來源檔分組，保留原始順序 */
  groupBySource(refs: readonly ResolvedBacklink[]): BacklinkGroup[] {
    const groups = new Map<string, ResolvedBacklink[]>();
    for (const ref of refs) {
      const list = groups.get(ref.sourceFile) ?? [];
      list.push(ref);
      groups.set(ref.sourceFile, list);
    }
    return [...groups.entries()].map(([sourceFile, references]) => ({ sourceFile, references }));
  }
}
