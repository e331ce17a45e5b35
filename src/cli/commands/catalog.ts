import type { Command } from 'commander';
import { createCliContext, write } from '../CliContext.js';

/** 註冊 stats / write-index 指令 */
export function registerCatalogCommands(program: Command): void {
  program
    .command('stats')
    .description('Show note counts by type, directory and extension')
    .action((_opts: unknown, cmd: Command) => {
      const { core, formatter, format } = createCliContext(cmd);
      write(formatter.formatObject(core.catalog.stats(), format));
    });

  program
    .command('write-index')
    .description('Write an index note listing every note, grouped by directory')
    .action((_opts: unknown, cmd: Command) => {
      const { core, formatter, format } = createCliContext(cmd);
      const result = core.catalog.writeIndexNote();
      if (format === 'json') write(formatter.formatObject(result, format));
    });
}
