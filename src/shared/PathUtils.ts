import path from 'node:path';
import os from 'node:os';

/**
 * 路徑與檔名工具（純函式）
 *
 * 設計意圖：集中處理副檔名、slug、名稱正規化與垃圾檔比對，
 * 讓 NoteIndex / LinkResolver / RenameUseCase 使用同一套規則。
 */

/** 取得小寫副檔名（不含點），無副檔名回傳空字串 */
export function extensionOf(fileName: string): string {
  const ext = path.extname(fileName);
  return ext ? ext.slice(1).toLowerCase() : '';
}

/** 移除最後一段副檔名 */
export function stripExtension(fileName: string): string {
  const ext = path.extname(fileName);
  return ext ? fileName.slice(0, -ext.length) : fileName;
}

/** 是否帶有可辨識的筆記副檔名 */
export function hasNoteExtension(fileName: string, extensions: readonly string[]): boolean {
  const ext = extensionOf(fileName);
  return ext !== '' && extensions.includes(ext);
}

/** 轉為以 / 分隔的相對路徑 */
export function toPosixRelative(root: string, absPath: string): string {
  return path.relative(root, absPath).split(path.sep).join('/');
}

/** 展開開頭的 ~ */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

/**
 * 標題轉檔名 slug，保留 Unicode 字元
 * 非法檔名字元與空白序列轉為 -，去除首尾 -，空字串回傳 "note"
 */
export function slugify(title: string, lowercase = false): string {
  let s = title
    .replace(/[/\\:*?"<>|]/g, '-')
    .replace(/\s+/g, '-')
    .replace(/^-+/, '')
    .replace(/-+$/, '');
  if (lowercase) s = s.toLowerCase();
  return s === '' ? 'note' : s;
}

/** 名稱正規化：trim、小寫、空白與底線序列轉為 - */
export function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/[\s_]+/g, '-');
}

/** 折疊比對用：移除所有空白、- 與 _ */
export function collapseName(name: string): string {
  return name.toLowerCase().replace(/[\s\-_]+/g, '');
}

const URL_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

/** 外部連結（http(s)://、其他 scheme://、mailto:） */
export function isExternalTarget(target: string): boolean {
  const t = target.trim();
  return URL_SCHEME.test(t) || /^mailto:/i.test(t);
}

/** 移除 #heading 錨點；純錨點回傳空字串 */
export function stripAnchor(target: string): string {
  const idx = target.indexOf('#');
  return idx === -1 ? target : target.slice(0, idx);
}

/** 移除 zettel ID 前綴（202501010000-title → title） */
export function stripIdPrefix(basename: string): string {
  return basename.replace(/^\d+-/, '');
}

/** 目標字串是否含路徑分隔符 */
export function hasPathSeparator(target: string): boolean {
  return target.includes('/') || target.includes('\\');
}

/** 跳脫正規表示式特殊字元 */
export function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const globCache = new Map<string, RegExp>();

function globToRegex(pattern: string): RegExp {
  const cached = globCache.get(pattern);
  if (cached) return cached;
  const source = pattern
    .split('')
    .map((ch) => {
      if (ch === '*') return '.*';
      if (ch === '?') return '.';
      return escapeRegex(ch);
    })
    .join('');
  const re = new RegExp(`^${source}$`);
  globCache.set(pattern, re);
  return re;
}

/** 單一路徑段是否符合任一垃圾檔樣式（支援 * 與 ?） */
export function matchesJunkPattern(name: string, patterns: readonly string[]): boolean {
  return patterns.some((p) => globToRegex(p).test(name));
}
