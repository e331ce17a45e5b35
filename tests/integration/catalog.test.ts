import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createNoteLinkCore, type NoteLinkCore } from '../../src/NoteLinkCore.js';
import { CatalogUseCase } from '../../src/application/CatalogUseCase.js';
import { CollectingNotificationSink } from '../../src/infrastructure/notification/ConsoleNotificationSink.js';
import { silentLogger } from '../../src/shared/Logger.js';
import { createNotesFixture, fixtureConfig, type NotesFixture } from '../helpers/notesFixture.js';

describe('CatalogUseCase', () => {
  let fx: NotesFixture;
  let sink: CollectingNotificationSink;
  let core: NoteLinkCore;

  beforeEach(() => {
    fx = createNotesFixture('catalog');
    fx.write('Inbox.md', '');
    fx.write('INDEX.md', 'stale index');
    fx.write('daily/monday.md', '');
    fx.write('projects/202501010000-alpha.md', '');
    fx.write('projects/beta.org', '');
    sink = new CollectingNotificationSink();
    core = createNoteLinkCore(fixtureConfig(fx.root), { notifier: sink, logger: silentLogger() });
  });

  afterEach(() => {
    fx.cleanup();
  });

  it('should count notes by type, directory and extension', () => {
    const stats = core.catalog.stats();

    expect(stats).toMatchObject({
      totalNotes: 5,
      byType: { generic: 2, daily: 1, project: 2 },
      byDirectory: { '(root)': 2, daily: 1, projects: 2 },
      byExtension: { md: 4, org: 1 },
    });
    expect(stats.snapshotAgeMs).not.toBeNull();
  });

  /**
   * Scenario: 產生索引筆記
   * Given 分散在 root、daily/、projects/ 的筆記與一份舊的 INDEX.md
   * When 寫入索引筆記
   * Then INDEX.md 依資料夾分組列出其他筆記，root 在最前，zettel ID 前綴不顯示
   */
  it('should write a grouped index note that excludes itself', () => {
    const catalog = new CatalogUseCase(
      core.fsPort,
      core.index,
      sink,
      'INDEX.md',
      () => new Date('2025-01-02T03:04:05.000Z'),
    );

    const result = catalog.writeIndexNote();

    expect(result).toEqual({ path: fx.abs('INDEX.md'), totalNotes: 4 });
    expect(fx.read('INDEX.md')).toBe(
      [
        '# Notes Index',
        '',
        '_Updated:_ 2025-01-02T03:04:05.000Z',
        '_Total Notes:_ 4',
        '',
        '## (root)',
        '',
        '- [[Inbox|Inbox]]',
        '',
        '## daily',
        '',
        '- [[daily/monday|monday]]',
        '',
        '## projects',
        '',
        '- [[projects/202501010000-alpha|alpha]]',
        '- [[projects/beta|beta]]',
        '',
      ].join('\n'),
    );
    expect(sink.messages).toEqual([{ message: 'Index written: 4 notes', level: 'info' }]);
  });
});
