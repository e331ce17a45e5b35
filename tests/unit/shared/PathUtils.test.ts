import { describe, it, expect } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import {
  collapseName,
  expandHome,
  extensionOf,
  hasNoteExtension,
  isExternalTarget,
  matchesJunkPattern,
  normalizeName,
  slugify,
  stripAnchor,
  stripExtension,
  stripIdPrefix,
  toPosixRelative,
} from '../../../src/shared/PathUtils.js';

describe('PathUtils', () => {
  describe('extensions', () => {
    it('should return the lower-case extension without the dot', () => {
      expect(extensionOf('Note.MD')).toBe('md');
      expect(extensionOf('README')).toBe('');
    });

    it('should strip only the last extension', () => {
      expect(stripExtension('a.b.md')).toBe('a.b');
      expect(stripExtension('plain')).toBe('plain');
    });

    it('should recognise note extensions only', () => {
      expect(hasNoteExtension('x.org', ['md', 'org'])).toBe(true);
      expect(hasNoteExtension('x.png', ['md', 'org'])).toBe(false);
      expect(hasNoteExtension('x', ['md'])).toBe(false);
    });
  });

  describe('slugify', () => {
    it('should turn whitespace runs into single hyphens and trim them', () => {
      expect(slugify('  Hello World  ')).toBe('Hello-World');
    });

    it('should lower-case on request', () => {
      expect(slugify('Hello World', true)).toBe('hello-world');
    });

    it('should fall back to "note" when nothing is left', () => {
      expect(slugify('???')).toBe('note');
    });
  });

  describe('name comparison', () => {
    it('normalizeName trims, lower-cases and hyphenates whitespace and underscores', () => {
      expect(normalizeName('  My_Note here ')).toBe('my-note-here');
    });

    it('collapseName removes whitespace, hyphens and underscores', () => {
      expect(collapseName('My - Note_x')).toBe('mynotex');
    });
  });

  describe('link targets', () => {
    it('should detect external targets', () => {
      expect(isExternalTarget('https://example.com')).toBe(true);
      expect(isExternalTarget('mailto:someone@example.com')).toBe(true);
      expect(isExternalTarget('notes/x.md')).toBe(false);
      expect(isExternalTarget('file:x.org')).toBe(false);
    });

    it('should strip anchors', () => {
      expect(stripAnchor('Note#Heading')).toBe('Note');
      expect(stripAnchor('#only')).toBe('');
      expect(stripAnchor('Note')).toBe('Note');
    });

    it('should strip a leading numeric id', () => {
      expect(stripIdPrefix('202501010000-title')).toBe('title');
      expect(stripIdPrefix('title')).toBe('title');
    });
  });

  describe('paths', () => {
    it('should produce posix relative paths', () => {
      expect(toPosixRelative('/a/b', '/a/b/c/d.md')).toBe('c/d.md');
    });

    it('should expand a leading tilde', () => {
      expect(expandHome('~/notes')).toBe(path.join(os.homedir(), 'notes'));
      expect(expandHome('/abs/notes')).toBe('/abs/notes');
    });
  });

  describe('matchesJunkPattern', () => {
    it('should match glob patterns against a single segment', () => {
      expect(matchesJunkPattern('._foo', ['._*'])).toBe(true);
      expect(matchesJunkPattern('.Trash-1000', ['.Trash*'])).toBe(true);
      expect(matchesJunkPattern('a.tmp', ['*.tmp'])).toBe(true);
      expect(matchesJunkPattern('notes.md', ['*.tmp'])).toBe(false);
      expect(matchesJunkPattern('draft~', ['*~'])).toBe(true);
    });

    it('should treat regex characters literally', () => {
      expect(matchesJunkPattern('aXtmp', ['a.tmp'])).toBe(false);
    });
  });
});
