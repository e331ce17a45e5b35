import { describe, it, expect, afterEach } from 'vitest';
import { ScanContentSearcher, buildMatcher } from '../../../src/infrastructure/notes/ScanContentSearcher.js';
import { RipgrepContentSearcher, parseRipgrepOutput } from '../../../src/infrastructure/notes/RipgrepContentSearcher.js';
import { FileSystemNotesAdapter } from '../../../src/infrastructure/notes/FileSystemNotesAdapter.js';
import { Logger, silentLogger } from '../../../src/shared/Logger.js';
import { InvalidQueryError } from '../../../src/domain/errors/DomainErrors.js';
import { createNotesFixture, type NotesFixture } from '../../helpers/notesFixture.js';

describe('buildMatcher', () => {
  it('should escape the query unless regex is requested', () => {
    expect(buildMatcher('a.b').test('axb')).toBe(false);
    expect(buildMatcher('a.b', { regex: true }).test('axb')).toBe(true);
  });

  it('should report an invalid regular expression as a domain error', () => {
    expect(() => buildMatcher('(', { regex: true })).toThrow(InvalidQueryError);
    expect(() => buildMatcher('(', { regex: true })).toThrow('Invalid regular expression: (');
    expect(buildMatcher('(').test('f(x)')).toBe(true);
  });

  it('should ignore case unless case-sensitive', () => {
    expect(buildMatcher('Note').test('note')).toBe(true);
    expect(buildMatcher('Note', { caseSensitive: true }).test('note')).toBe(false);
  });
});

describe('parseRipgrepOutput', () => {
  it('should split NUL-separated file names from line numbers', () => {
    const output = '/notes/a:b.md\u00003:has: colon\r\n/notes/c.md\u000010:plain\n';

    expect(parseRipgrepOutput(output)).toEqual([
      { file: '/notes/a:b.md', lineNumber: 3, line: 'has: colon' },
      { file: '/notes/c.md', lineNumber: 10, line: 'plain' },
    ]);
  });

  it('should skip malformed lines', () => {
    expect(parseRipgrepOutput('no separator\n/x.md\u0000nope\n/y.md\u0000abc:text\n')).toEqual([]);
  });
});

describe('Content searchers', () => {
  let fx: NotesFixture | undefined;

  afterEach(() => {
    fx?.cleanup();
    fx = undefined;
  });

  it('should scan files line by line and skip unreadable ones', () => {
    fx = createNotesFixture('scan');
    const a = fx.write('a.md', 'one\ntwo needle\nthree');
    const lines: string[] = [];
    const searcher = new ScanContentSearcher(new FileSystemNotesAdapter(), new Logger('test', 'warn', (l) => lines.push(l)));

    const matches = searcher.search([a, fx.abs('missing.md')], 'needle');

    expect(matches).toEqual([{ file: a, lineNumber: 2, line: 'two needle' }]);
    expect(lines).toHaveLength(1);
  });

  /**
   * Scenario: 外部 rg 不存在
   * Given 指向不存在執行檔的 RipgrepContentSearcher
   * When 搜尋
   * Then 退回 in-process 掃描並得到相同結果
   */
  it('should fall back to scanning when the rg binary is missing', () => {
    fx = createNotesFixture('rg');
    const a = fx.write('a.md', 'needle here');
    const scan = new ScanContentSearcher(new FileSystemNotesAdapter(), silentLogger());
    const rg = new RipgrepContentSearcher(scan, silentLogger(), 'notelink-missing-rg-binary');

    expect(rg.search([a], 'needle')).toEqual([{ file: a, lineNumber: 1, line: 'needle here' }]);
    expect(rg.search([], 'needle')).toEqual([]);
  });
});
