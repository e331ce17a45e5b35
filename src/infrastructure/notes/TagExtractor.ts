import { MarkdownParser } from './MarkdownParser.js';

/** 行內 #tag（前面須為行首或空白，排除 markdown 標題的 "# "） */
const INLINE_TAG = /(?:^|\s)#([\p{L}\p{N}_][\p{L}\p{N}_/-]*)/gu;

/** org 標題尾端的 :tag1:tag2: */
const ORG_HEADING_TAGS = /^\*+\s.*?\s(:[\p{L}\p{N}_@#%:]+:)\s*$/u;

/**
 * 標籤擷取：行內 #tag、org 標題標籤、frontmatter tags
 * 回傳去重後的標籤（保留第一次出現的大小寫）
 */
export class TagExtractor {
  constructor(private readonly markdownParser: MarkdownParser = new MarkdownParser()) {}

  extract(content: string): string[] {
    const seen = new Map<string, string>();
    const add = (tag: string) => {
      const clean = tag.replace(/^#/, '');
      if (!clean) return;
      const key = clean.toLowerCase();
      if (!seen.has(key)) seen.set(key, clean);
    };

    const { frontmatter, body } = this.markdownParser.parse(content);
    for (const t of this.markdownParser.stringList(frontmatter, 'tags')) add(t);

    let inFence = false;
    for (const line of body.split(/\r?\n/)) {
      if (/^\s*(```|~~~)/.test(line)) {
        inFence = !inFence;
        continue;
      }
      if (inFence) continue;

      for (const m of line.matchAll(INLINE_TAG)) {
        // 純數字（#1、#2024）多半是編號而非標籤
        if (!/^\d+$/.test(m[1])) add(m[1]);
      }

      const org = ORG_HEADING_TAGS.exec(line);
      if (org) {
        for (const t of org[1].split(':')) add(t);
      }
    }

    return [...seen.values()];
  }
}
