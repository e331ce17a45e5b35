import matter from 'gray-matter';

export interface ParsedMarkdown {
  frontmatter: Record<string, unknown>;
  body: string;
}

export class MarkdownParser {
  /** 解析 YAML frontmatter；格式錯誤時視為沒有 frontmatter */
  parse(rawMarkdown: string): ParsedMarkdown {
    if (!rawMarkdown.trim() || !rawMarkdown.startsWith('---')) {
      return { frontmatter: {}, body: rawMarkdown };
    }
    try {
      const { data, content } = matter(rawMarkdown);
      return {
        frontmatter: data ?? {},
        body: content ?? '',
      };
    } catch {
      return { frontmatter: {}, body: rawMarkdown };
    }
  }

  /** 由 frontmatter 取出字串清單欄位（接受陣列或逗號/空白分隔字串） */
  stringList(frontmatter: Record<string, unknown>, key: string): string[] {
    const value = frontmatter[key];
    if (Array.isArray(value)) {
      return value.filter((v): v is string => typeof v === 'string' && v.trim() !== '').map((v) => v.trim());
    }
    if (typeof value === 'string') {
      return value.split(/[,\s]+/).map((v) => v.trim()).filter(Boolean);
    }
    return [];
  }
}
