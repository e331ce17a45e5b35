import path from 'node:path';
import type { NoteLinkConfig } from './config/types.js';
import type { NotesFsPort } from './domain/ports/NotesFsPort.js';
import type { DirectoryScanner } from './domain/ports/DirectoryScanner.js';
import type { ContentSearcher } from './domain/ports/ContentSearcher.js';
import type { NotificationPort } from './domain/ports/NotificationPort.js';
import { FileSystemNotesAdapter } from './infrastructure/notes/FileSystemNotesAdapter.js';
import { WalkDirectoryScanner } from './infrastructure/notes/WalkDirectoryScanner.js';
import { FdDirectoryScanner } from './infrastructure/notes/FdDirectoryScanner.js';
import { ScanContentSearcher } from './infrastructure/notes/ScanContentSearcher.js';
import { RipgrepContentSearcher } from './infrastructure/notes/RipgrepContentSearcher.js';
import { LinkExtractor } from './infrastructure/notes/LinkExtractor.js';
import { TagExtractor } from './infrastructure/notes/TagExtractor.js';
import { LoggerNotificationSink } from './infrastructure/notification/LoggerNotificationSink.js';
import { NoteIndex } from './application/NoteIndex.js';
import { LinkResolver } from './application/LinkResolver.js';
import { BacklinkUseCase } from './application/BacklinkUseCase.js';
import { RenameUseCase } from './application/RenameUseCase.js';
import { NoteManageUseCase } from './application/NoteManageUseCase.js';
import { CatalogUseCase } from './application/CatalogUseCase.js';
import { SearchUseCase } from './application/SearchUseCase.js';
import { Logger } from './shared/Logger.js';
import { NotFoundError } from './domain/errors/DomainErrors.js';
import { expandHome } from './shared/PathUtils.js';

/** 可替換的外部依賴；未提供時使用預設實作 */
export interface NoteLinkCoreOverrides {
  fsPort?: NotesFsPort;
  scanner?: DirectoryScanner;
  searcher?: ContentSearcher;
  notifier?: NotificationPort;
  logger?: Logger;
  /** 索引快取用的時鐘（毫秒） */
  now?: () => number;
}

/** 一個宿主行程持有的完整核心物件 */
export interface NoteLinkCore {
  config: NoteLinkConfig;
  logger: Logger;
  fsPort: NotesFsPort;
  index: NoteIndex;
  extractor: LinkExtractor;
  resolver: LinkResolver;
  backlinks: BacklinkUseCase;
  rename: RenameUseCase;
  manage: NoteManageUseCase;
  catalog: CatalogUseCase;
  search: SearchUseCase;
}

/**
 * 組裝核心
 *
 * 設計意圖：NoteIndex 快取由這裡建立並交給所有用例共用，
 * CLI 每次執行建立一份，MCP server 則在行程存活期間持有同一份。
 */
export function createNoteLinkCore(config: NoteLinkConfig, overrides: NoteLinkCoreOverrides = {}): NoteLinkCore {
  const logger = overrides.logger ?? new Logger('notelink', config.logging.level);
  const fsPort = overrides.fsPort ?? new FileSystemNotesAdapter();
  const notifier = overrides.notifier ?? new LoggerNotificationSink(logger.child('notify'));
  const scanner = overrides.scanner ?? createScanner(config, logger);
  const searcher = overrides.searcher ?? createSearcher(config, fsPort, logger);

  const index = new NoteIndex(
    scanner,
    {
      root: config.notes.root,
      extensions: config.notes.extensions,
      junkPatterns: config.scan.junkPatterns,
      noteTypes: config.notes.noteTypes,
      ttlMs: config.cache.ttlSeconds * 1000,
    },
    logger.child('index'),
    overrides.now,
  );

  const extractor = new LinkExtractor();
  const resolver = new LinkResolver(fsPort, {
    root: config.notes.root,
    extensions: config.notes.extensions,
    noteTypes: config.notes.noteTypes,
  });
  const backlinks = new BacklinkUseCase(fsPort, extractor, resolver, logger.child('backlinks'));

  return {
    config,
    logger,
    fsPort,
    index,
    extractor,
    resolver,
    backlinks,
    rename: new RenameUseCase(fsPort, index, backlinks, notifier, logger.child('rename'), {
      extensions: config.notes.extensions,
      noteTypes: config.notes.noteTypes,
      rollbackOnFailure: config.rename.rollbackOnFailure,
    }),
    manage: new NoteManageUseCase(fsPort, index, notifier, logger.child('manage'), config.notes.archiveDir),
    catalog: new CatalogUseCase(fsPort, index, notifier, config.notes.indexFileName),
    search: new SearchUseCase(fsPort, index, searcher, new TagExtractor(), logger.child('search')),
  };
}

/**
 * 將使用者輸入對應到筆記檔案：
 * 先當作路徑（相對目前目錄、再相對 notes root），否則當作連結目標解析
 */
export function locateNote(core: NoteLinkCore, arg: string): string {
  const candidates = [path.resolve(expandHome(arg)), path.resolve(core.index.root, arg)];
  for (const candidate of candidates) {
    if (core.fsPort.isFile(candidate)) return candidate;
  }

  const note = core.resolver.resolve(arg, core.index.getOrBuild());
  if (!note) throw new NotFoundError(arg);
  return note.path;
}

function createScanner(config: NoteLinkConfig, logger: Logger): DirectoryScanner {
  const walk = new WalkDirectoryScanner();
  return config.scan.scanner === 'fd' ? new FdDirectoryScanner(walk, logger.child('scan')) : walk;
}

function createSearcher(config: NoteLinkConfig, fsPort: NotesFsPort, logger: Logger): ContentSearcher {
  const scan = new ScanContentSearcher(fsPort, logger.child('search'));
  return config.scan.searcher === 'rg' ? new RipgrepContentSearcher(scan, logger.child('search')) : scan;
}
