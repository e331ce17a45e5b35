import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createNoteLinkCore, type NoteLinkCore } from '../../../src/NoteLinkCore.js';
import type { ResolveContext } from '../../../src/application/LinkResolver.js';
import { silentLogger } from '../../../src/shared/Logger.js';
import { createNotesFixture, fixtureConfig, type NotesFixture } from '../../helpers/notesFixture.js';

/**
 * Feature: 連結解析
 *
 * 作為使用者，我寫下的連結目標可能大小寫、空白或分隔符號不一致，
 * 解析器需要依序嘗試 exact → normalized → collapsed → 路徑，找到對應的筆記。
 */
describe('LinkResolver', () => {
  let fx: NotesFixture;
  let core: NoteLinkCore;

  beforeEach(() => {
    fx = createNotesFixture('resolver');
    fx.write('My-Note.md', '# My Note');
    fx.write('projects/Roadmap.md', '# Roadmap');
    fx.write('projects/x.org', '* X');
    fx.write('refs/source.md', 'source');
    fx.write('202501010000-zettel.md', 'zettel');
    fx.write('Spaced Name.md', 'spaced');
    fx.write('Archive/old.md', 'archived');
    fx.write('._hidden.md', 'metadata');
    core = createNoteLinkCore(fixtureConfig(fx.root), { logger: silentLogger() });
  });

  afterEach(() => {
    fx.cleanup();
  });

  function resolve(target: string, context: ResolveContext = {}) {
    return core.resolver.resolveDetailed(target, core.index.getOrBuild(), context);
  }

  it('should match basenames case-insensitively', () => {
    expect(resolve('my-note')).toMatchObject({ strategy: 'exact', note: { path: fx.abs('My-Note.md') } });
  });

  /**
   * Scenario: 空白與連字號視為相同
   * Given 筆記 My-Note.md
   * When 解析 "My Note" 與 "my note"
   * Then 兩者都經 normalized 解析到同一份筆記
   */
  it('should resolve [[My Note]] and [[my note]] to the same note', () => {
    const upper = resolve('My Note');
    const lower = resolve('my note');

    expect(upper?.strategy).toBe('normalized');
    expect(upper?.note.path).toBe(fx.abs('My-Note.md'));
    expect(lower?.note.path).toBe(upper?.note.path);
  });

  it('should ignore an #anchor suffix', () => {
    expect(resolve('Roadmap#Goals')?.note.relativePath).toBe('projects/Roadmap.md');
  });

  it('should resolve a path relative to the notes root', () => {
    expect(resolve('projects/Roadmap')).toMatchObject({ strategy: 'path', note: { basename: 'Roadmap' } });
  });

  it('should resolve a path relative to the source note first', () => {
    const result = resolve('../projects/x.org', { sourceFile: fx.abs('refs/source.md'), linkType: 'orgFile' });
    expect(result).toMatchObject({ strategy: 'path', note: { path: fx.abs('projects/x.org') } });
  });

  it('should fall back to the basename when a path with an extension does not exist', () => {
    expect(resolve('x.org')).toMatchObject({ strategy: 'exact', note: { relativePath: 'projects/x.org' } });
  });

  it('should return notes outside the index that exist on disk', () => {
    expect(resolve('Archive/old')).toMatchObject({
      strategy: 'path',
      note: { relativePath: 'Archive/old.md', directory: 'Archive' },
    });
  });

  it('should check the notes root directly when name matching fails', () => {
    expect(resolve('._hidden')).toMatchObject({ strategy: 'path', note: { path: fx.abs('._hidden.md') } });
  });

  it('should percent-decode markdown targets', () => {
    const result = resolve('Spaced%20Name.md', { sourceFile: fx.abs('My-Note.md'), linkType: 'markdown' });
    expect(result?.note.path).toBe(fx.abs('Spaced Name.md'));
  });

  it('should resolve zk ids by basename prefix', () => {
    expect(resolve('202501010000', { linkType: 'zkId' })).toMatchObject({
      strategy: 'zkId',
      note: { basename: '202501010000-zettel' },
    });
    expect(resolve('999', { linkType: 'zkId' })).toBeNull();
  });

  it('should return null for unresolved targets', () => {
    expect(resolve('Nothing Here')).toBeNull();
    expect(resolve('#only-anchor')).toBeNull();
    expect(core.resolver.resolve('Nothing Here', core.index.getOrBuild())).toBeNull();
  });

  it('should pick the first note in index order when basenames collide', () => {
    fx.write('a/dup.md', 'first');
    fx.write('b/dup.md', 'second');
    core.index.invalidate();

    expect(resolve('dup')?.note.relativePath).toBe('a/dup.md');
  });

  it('should resolve [[basename]] of every indexed note back to that note', () => {
    const index = core.index.getOrBuild();
    for (const note of index) {
      const [ref] = core.extractor.extract(`[[${note.basename}]]`, fx.abs('refs/source.md'));
      expect(core.resolver.resolveReference(ref, index)?.note.path).toBe(note.path);
    }
  });
});

describe('LinkResolver fallback strategies', () => {
  let fx: NotesFixture;
  let core: NoteLinkCore;

  beforeEach(() => {
    fx = createNotesFixture('resolver-fallback');
    fx.write('my-note.md', '# my note');
    core = createNoteLinkCore(fixtureConfig(fx.root), { logger: silentLogger() });
  });

  afterEach(() => {
    fx.cleanup();
  });

  it('should resolve "  my_note  " through normalization', () => {
    const result = core.resolver.resolveDetailed('  my_note  ', core.index.getOrBuild());
    expect(result).toMatchObject({ strategy: 'normalized', note: { path: fx.abs('my-note.md') } });
  });

  it('should resolve "mynote" only through the collapsed comparison', () => {
    const result = core.resolver.resolveDetailed('mynote', core.index.getOrBuild());
    expect(result).toMatchObject({ strategy: 'collapsed', note: { path: fx.abs('my-note.md') } });
  });
});
