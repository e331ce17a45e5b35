import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createNoteLinkCore, type NoteLinkCore } from '../../src/NoteLinkCore.js';
import { CollectingNotificationSink } from '../../src/infrastructure/notification/ConsoleNotificationSink.js';
import { silentLogger } from '../../src/shared/Logger.js';
import { createNotesFixture, fixtureConfig, type NotesFixture } from '../helpers/notesFixture.js';

/**
 * Feature: 筆記管理
 *
 * 作為使用者，我想批次移動、封存或刪除筆記；
 * 單一檔案失敗時其他檔案照常處理，並回報成功與失敗數。
 */
describe('NoteManageUseCase', () => {
  let fx: NotesFixture;
  let sink: CollectingNotificationSink;
  let core: NoteLinkCore;

  beforeEach(() => {
    fx = createNotesFixture('manage');
    fx.write('a.md', '# a\n');
    fx.write('b.md', '# b\n');
    sink = new CollectingNotificationSink();
    core = createNoteLinkCore(fixtureConfig(fx.root, { ttlSeconds: 300 }), {
      notifier: sink,
      logger: silentLogger(),
    });
  });

  afterEach(() => {
    fx.cleanup();
  });

  /**
   * Scenario: 部分檔案無法移動
   * Given dest/ 已有 b.md
   * When 移動 a.md、b.md 與不存在的 missing.md 到 dest/
   * Then a.md 被移動，其餘兩筆以失敗回報，既有的 dest/b.md 不被覆蓋
   */
  it('should move notes and report per-file failures', () => {
    fx.write('dest/b.md', 'keep me');

    const result = core.manage.moveNotes(['a.md', 'b.md', 'missing.md'], 'dest');

    expect(result).toEqual({
      succeeded: 1,
      failed: 2,
      failures: [
        { path: fx.abs('b.md'), reason: `Destination already exists: ${fx.abs('dest/b.md')}` },
        { path: fx.abs('missing.md'), reason: `Note not found: ${fx.abs('missing.md')}` },
      ],
    });
    expect(fx.exists('dest/a.md')).toBe(true);
    expect(fx.exists('a.md')).toBe(false);
    expect(fx.read('dest/b.md')).toBe('keep me');
    expect(sink.messages).toEqual([{ message: 'Moved 1 file(s), 2 failed.', level: 'warn' }]);
  });

  it('should refresh the cached index after moving', () => {
    expect(core.index.getOrBuild().map((n) => n.relativePath)).toEqual(['a.md', 'b.md']);

    core.manage.moveNotes(['a.md'], 'dest');

    expect(core.index.getOrBuild().map((n) => n.relativePath)).toEqual(['b.md', 'dest/a.md']);
  });

  it('should archive notes out of the index', () => {
    const result = core.manage.archiveNotes([fx.abs('a.md')]);

    expect(result).toEqual({ succeeded: 1, failed: 0, failures: [] });
    expect(fx.read('Archive/a.md')).toBe('# a\n');
    expect(core.index.getOrBuild().map((n) => n.relativePath)).toEqual(['b.md']);
    expect(sink.messages).toEqual([{ message: 'Archived 1 file(s), 0 failed.', level: 'info' }]);
  });

  it('should delete notes', () => {
    const result = core.manage.deleteNotes(['a.md', 'b.md']);

    expect(result.succeeded).toBe(2);
    expect(fx.exists('a.md')).toBe(false);
    expect(fx.exists('b.md')).toBe(false);
    expect(core.index.getOrBuild()).toEqual([]);
    expect(sink.messages).toEqual([{ message: 'Deleted 2 file(s), 0 failed.', level: 'info' }]);
  });
});
