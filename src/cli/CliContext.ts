import path from 'node:path';
import type { Command } from 'commander';
import { loadConfig } from '../config/ConfigLoader.js';
import type { NoteLinkConfig } from '../config/types.js';
import { createNoteLinkCore, locateNote, type NoteLinkCore } from '../NoteLinkCore.js';
import { ConsoleNotificationSink } from '../infrastructure/notification/ConsoleNotificationSink.js';
import { expandHome } from '../shared/PathUtils.js';
import { NoteFormatter, isOutputFormat, type OutputFormat } from './formatters/NoteFormatter.js';

export interface CliContext {
  core: NoteLinkCore;
  formatter: NoteFormatter;
  format: OutputFormat;
}

/**
 * 由全域選項載入設定
 * 設定檔從目前工作目錄讀取；--root 優先於設定檔與環境變數
 */
export function loadCliConfig(cmd: Command): { config: NoteLinkConfig; format: OutputFormat } {
  const globals = cmd.optsWithGlobals();
  const config = loadConfig(process.cwd());
  if (typeof globals.root === 'string' && globals.root !== '') {
    config.notes.root = path.resolve(expandHome(globals.root));
  }
  const format: OutputFormat = isOutputFormat(globals.format) ? globals.format : 'text';
  return { config, format };
}

/** 建立一次執行所需的核心物件 */
export function createCliContext(cmd: Command): CliContext {
  const { config, format } = loadCliConfig(cmd);
  // json 模式下 stdout 只輸出資料，通知改走 log
  const notifier = format === 'json' ? undefined : new ConsoleNotificationSink();
  const core = createNoteLinkCore(config, { notifier });
  return { core, formatter: new NoteFormatter(config.notes.root), format };
}

/** 指令參數可以是路徑或連結目標 */
export const resolveNoteArgument = locateNote;

export function write(text: string): void {
  process.stdout.write(text + '\n');
}
