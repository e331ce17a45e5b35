import type { Command } from 'commander';
import type { ManageResult } from '../../application/NoteManageUseCase.js';
import { createCliContext, write, type CliContext } from '../CliContext.js';

interface DeleteOptions {
  yes?: boolean;
}

function report(ctx: CliContext, result: ManageResult): void {
  if (ctx.format === 'json') {
    write(ctx.formatter.formatObject(result, ctx.format));
  } else {
    for (const failure of result.failures) {
      process.stderr.write(`  ${failure.path}: ${failure.reason}\n`);
    }
  }
  if (result.failed > 0) process.exitCode = 1;
}

/** 註冊 move / archive / delete 指令 */
export function registerManageCommands(program: Command): void {
  program
    .command('move <dest> <notes...>')
    .description('Move notes into a directory (relative to the notes root)')
    .action((dest: string, notes: string[], _opts: unknown, cmd: Command) => {
      const ctx = createCliContext(cmd);
      report(ctx, ctx.core.manage.moveNotes(notes, dest));
    });

  program
    .command('archive <notes...>')
    .description('Move notes into the archive directory')
    .action((notes: string[], _opts: unknown, cmd: Command) => {
      const ctx = createCliContext(cmd);
      report(ctx, ctx.core.manage.archiveNotes(notes));
    });

  program
    .command('delete <notes...>')
    .description('Delete notes (requires --yes)')
    .option('-y, --yes', 'Confirm deletion')
    .action((notes: string[], opts: DeleteOptions, cmd: Command) => {
      if (!opts.yes) {
        throw new Error('Refusing to delete without --yes');
      }
      const ctx = createCliContext(cmd);
      report(ctx, ctx.core.manage.deleteNotes(notes));
    });
}
