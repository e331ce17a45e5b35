import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createNoteLinkCore, type NoteLinkCore } from '../../src/NoteLinkCore.js';
import { silentLogger } from '../../src/shared/Logger.js';
import { InvalidQueryError } from '../../src/domain/errors/DomainErrors.js';
import { createNotesFixture, fixtureConfig, type NotesFixture } from '../helpers/notesFixture.js';

describe('SearchUseCase', () => {
  let fx: NotesFixture;
  let core: NoteLinkCore;

  beforeEach(() => {
    fx = createNotesFixture('search');
    core = createNoteLinkCore(fixtureConfig(fx.root), { logger: silentLogger() });
  });

  afterEach(() => {
    fx.cleanup();
  });

  describe('searchText', () => {
    beforeEach(() => {
      fx.write('b.md', 'nothing\nalpha again\n');
      fx.write('a.md', 'Alpha line\nsecond ALPHA\n');
      fx.write('Archive/c.md', 'alpha archived\n');
    });

    it('should match case-insensitively across indexed notes in file order', () => {
      expect(core.search.searchText('alpha')).toEqual([
        { file: fx.abs('a.md'), lineNumber: 1, line: 'Alpha line' },
        { file: fx.abs('a.md'), lineNumber: 2, line: 'second ALPHA' },
        { file: fx.abs('b.md'), lineNumber: 2, line: 'alpha again' },
      ]);
    });

    it('should honour case-sensitive and regex options', () => {
      expect(core.search.searchText('alpha', { caseSensitive: true }).map((m) => m.line)).toEqual(['alpha again']);
      expect(core.search.searchText('^second', { regex: true }).map((m) => m.line)).toEqual(['second ALPHA']);
    });

    it('should treat the query literally by default', () => {
      expect(core.search.searchText('a(')).toEqual([]);
    });

    it('should reject a regex query that does not compile', () => {
      expect(() => core.search.searchText('a(', { regex: true })).toThrow(InvalidQueryError);
    });

    it('should return nothing for a blank query', () => {
      expect(core.search.searchText('   ')).toEqual([]);
    });
  });

  describe('tags', () => {
    beforeEach(() => {
      fx.write('a.md', '---\ntags: [Work, ideas]\n---\nBody #work and #todo\n');
      fx.write('b.md', '#todo first\n#Ideas\n');
      fx.write('c.org', '* Heading :work:org:\n');
    });

    it('should count each tag once per note, most used first', () => {
      expect(core.search.listTags()).toEqual([
        { tag: 'ideas', count: 2 },
        { tag: 'todo', count: 2 },
        { tag: 'Work', count: 2 },
        { tag: 'org', count: 1 },
      ]);
    });

    it('should find notes by tag with or without the leading #', () => {
      expect(core.search.notesWithTag('#WORK').map((n) => n.relativePath)).toEqual(['a.md', 'c.org']);
      expect(core.search.notesWithTag('todo').map((n) => n.relativePath)).toEqual(['a.md', 'b.md']);
      expect(core.search.notesWithTag('#')).toEqual([]);
    });
  });
});
