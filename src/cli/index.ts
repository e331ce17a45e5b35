#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { registerNotesCommands } from './commands/notes.js';
import { registerRenameCommand } from './commands/rename.js';
import { registerManageCommands } from './commands/manage.js';
import { registerCatalogCommands } from './commands/catalog.js';
import { registerSearchCommands } from './commands/search.js';
import { registerMcpCommand } from './commands/mcp.js';
import { errorMessage } from '../domain/errors/DomainErrors.js';

// 從 package.json 動態讀取版本號，避免硬編碼導致版本不同步
const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

const program = new Command();

program
  .name('notelink')
  .description('Plain-text note index with typed links, backlinks and link-rewriting renames')
  .version(version)
  .option('--root <path>', 'Notes root directory (overrides .notelink.json)')
  .option('--format <format>', 'Output format: json or text', 'text');

registerNotesCommands(program);
registerRenameCommand(program);
registerManageCommands(program);
registerCatalogCommands(program);
registerSearchCommands(program);
registerMcpCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        process.exit(0);
      }
      process.exit(err.exitCode);
    }
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    process.exit(1);
  }
}

void main();
