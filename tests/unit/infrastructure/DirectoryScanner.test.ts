import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import { WalkDirectoryScanner } from '../../../src/infrastructure/notes/WalkDirectoryScanner.js';
import { FdDirectoryScanner } from '../../../src/infrastructure/notes/FdDirectoryScanner.js';
import { Logger } from '../../../src/shared/Logger.js';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { createNotesFixture, type NotesFixture } from '../../helpers/notesFixture.js';

const filter = {
  extensions: DEFAULT_CONFIG.notes.extensions,
  junkPatterns: DEFAULT_CONFIG.scan.junkPatterns,
};

describe('Directory scanners', () => {
  let fx: NotesFixture;

  beforeEach(() => {
    fx = createNotesFixture('scanner');
    fx.write('top.md', '');
    fx.write('deep/nested/note.org', '');
    fx.write('plain.txt', '');
    fx.write('image.png', '');
    fx.write('draft.md~', '');
    fx.write('Archive/old.md', '');
    fx.write('.git/HEAD.md', '');
    fx.write('Templates/t.md', '');
  });

  afterEach(() => {
    fx.cleanup();
  });

  it('should walk recursively and skip junk segments', () => {
    const listing = new WalkDirectoryScanner().listFiles(fx.root, filter);

    expect(listing.files.sort()).toEqual(['deep/nested/note.org', 'plain.txt', 'top.md']);
    expect(listing.warnings).toEqual([]);
  });

  /**
   * Scenario: 子目錄無法讀取
   * Given locked/ 在讀取時拋出權限錯誤
   * When 走訪 notes root
   * Then locked/ 記錄為 warning，其他目錄照常列出
   */
  it('should record unreadable subdirectories as warnings and keep walking', () => {
    fx.write('locked/secret.md', '');
    const scanner = new WalkDirectoryScanner((dir) => {
      if (dir === fx.abs('locked')) throw new Error('EACCES: permission denied');
      return fs.readdirSync(dir, { withFileTypes: true });
    });

    const listing = scanner.listFiles(fx.root, filter);

    expect(listing.files.sort()).toEqual(['deep/nested/note.org', 'plain.txt', 'top.md']);
    expect(listing.warnings).toEqual([{ path: fx.abs('locked'), reason: 'EACCES: permission denied' }]);
  });

  it('should return an empty listing for a missing root', () => {
    expect(new WalkDirectoryScanner().listFiles(fx.abs('nope'), filter)).toEqual({ files: [], warnings: [] });
  });

  it('should fall back to walking when the fd binary is missing', () => {
    const lines: string[] = [];
    const fd = new FdDirectoryScanner(
      new WalkDirectoryScanner(),
      new Logger('test', 'warn', (l) => lines.push(l)),
      'notelink-missing-fd-binary',
    );

    expect(fd.listFiles(fx.root, filter).files.sort()).toEqual(['deep/nested/note.org', 'plain.txt', 'top.md']);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('fd unavailable, falling back');
  });
});
