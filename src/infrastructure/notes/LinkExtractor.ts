import type { LinkReference, LinkType } from '../../domain/entities/LinkReference.js';
import { isExternalTarget } from '../../shared/PathUtils.js';

/** [[inner]] 或 org 的 [[inner][desc]] */
const DOUBLE_BRACKET = /\[\[([^[\]]+)\](?:\[([^[\]]*)\])?\]/g;

/** [text](path "title")，path 不含空白與括號 */
const MARKDOWN_LINK = /\[([^[\]]*)\]\(\s*([^()\s]+)(?:\s+"[^"]*")?\s*\)/g;

interface Span {
  start: number;
  end: number;
}

interface Classified {
  linkType: LinkType;
  targetString: string;
  label?: string;
}

/**
 * 連結擷取器：將一份筆記的內容拆成 LinkReference 清單
 *
 * 支援語法：
 * - [[target]] → wiki
 * - [[target|alias]] → wikiAlias
 * - [[zk:ID]] → zkId
 * - [[file:path][desc]] / [[file:path]] → orgFile
 * - [text](path) → markdown（排除 http(s)://、mailto:、#錨點）
 *
 * 同一行先比對雙中括號語法，markdown 連結若與其重疊則忽略，避免重複計算。
 */
export class LinkExtractor {
  extract(contents: string | readonly string[], sourceFile: string): LinkReference[] {
    const lines = typeof contents === 'string' ? contents.split(/\r?\n/) : contents;
    const refs: LinkReference[] = [];

    lines.forEach((line, i) => {
      refs.push(...this.extractLine(line, i + 1, sourceFile));
    });

    return refs;
  }

  /** 擷取單行中的所有不重疊連結，依欄位排序 */
  extractLine(line: string, lineNumber: number, sourceFile: string): LinkReference[] {
    if (!line.includes('[')) return [];

    const refs: LinkReference[] = [];
    const consumed: Span[] = [];

    for (const m of line.matchAll(DOUBLE_BRACKET)) {
      const start = m.index ?? 0;
      consumed.push({ start, end: start + m[0].length });

      const classified = this.classifyBracket(m[1], m[2]);
      if (!classified) continue;
      refs.push({
        sourceFile,
        lineNumber,
        rawLineText: line,
        column: start,
        matchText: m[0],
        ...classified,
      });
    }

    for (const m of line.matchAll(MARKDOWN_LINK)) {
      const start = m.index ?? 0;
      const end = start + m[0].length;
      if (consumed.some((s) => start < s.end && end > s.start)) continue;

      const target = m[2];
      if (isExternalTarget(target) || target.startsWith('#')) continue;
      refs.push({
        sourceFile,
        lineNumber,
        rawLineText: line,
        column: start,
        matchText: m[0],
        linkType: 'markdown',
        targetString: target,
        label: m[1],
      });
    }

    return refs.sort((a, b) => a.column - b.column);
  }

  /** 判斷雙中括號連結的類型；非筆記參照回傳 null */
  private classifyBracket(inner: string, description: string | undefined): Classified | null {
    if (/^zk:/i.test(inner)) {
      const id = inner.slice(3).split('|')[0].trim();
      return id ? { linkType: 'zkId', targetString: id } : null;
    }

    if (/^file:/i.test(inner)) {
      const target = inner.slice(5);
      if (!target.trim()) return null;
      return { linkType: 'orgFile', targetString: target, label: description };
    }

    // URL 或 org 的其他描述型連結（[[https://x][y]]、[[*Heading][y]]）不是筆記參照
    if (isExternalTarget(inner) || description !== undefined) return null;

    const pipe = inner.indexOf('|');
    if (pipe !== -1) {
      const target = inner.slice(0, pipe);
      if (!target.trim()) return null;
      return { linkType: 'wikiAlias', targetString: target, label: inner.slice(pipe + 1) };
    }

    if (!inner.trim()) return null;
    return { linkType: 'wiki', targetString: inner };
  }
}
