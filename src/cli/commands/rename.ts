import type { Command } from 'commander';
import { createInterface } from 'node:readline/promises';
import type { RenameDecision } from '../../domain/entities/RenameChange.js';
import { createCliContext, resolveNoteArgument, write } from '../CliContext.js';

interface RenameOptions {
  dryRun?: boolean;
  backup?: boolean;
  yes?: boolean;
}

/** 互動式詢問：a = 套用、b = 套用並備份、其他 = 取消 */
async function askDecision(): Promise<RenameDecision> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    const answer = (await rl.question('[a]pply, apply with [b]ackup, or [c]ancel? ')).trim().toLowerCase();
    if (answer === 'a' || answer === 'apply') return 'apply';
    if (answer === 'b' || answer === 'backup') return 'applyWithBackup';
    return 'cancel';
  } finally {
    rl.close();
  }
}

/**
 * 註冊 rename 指令
 *
 * 用法：
 *   notelink rename <note> <newName> [--dry-run] [--backup] [--yes]
 */
export function registerRenameCommand(program: Command): void {
  program
    .command('rename <note> <newName>')
    .description('Rename a note and rewrite every link that points to it')
    .option('--dry-run', 'Show the changeset without writing anything')
    .option('--backup', 'Write <file>.bak before rewriting each file')
    .option('-y, --yes', 'Apply without asking')
    .action(async (note: string, newName: string, opts: RenameOptions, cmd: Command) => {
      const { core, formatter, format } = createCliContext(cmd);
      const notePath = resolveNoteArgument(core, note);

      const computation = core.rename.compute(notePath, newName);
      if (!computation.ok) {
        throw computation.error;
      }
      const tx = computation.transaction;
      const preview = core.rename.preview(tx);
      write(formatter.formatPreview(preview, format));

      if (opts.dryRun) return;

      const backup = opts.backup ?? core.config.rename.backupByDefault;
      let decision: RenameDecision;
      if (opts.yes || preview.totalChanges === 0) {
        decision = backup ? 'applyWithBackup' : 'apply';
      } else if (process.stdin.isTTY) {
        decision = await askDecision();
      } else {
        throw new Error('Refusing to rewrite links without confirmation; pass --yes or --dry-run');
      }

      const outcome = core.rename.decide(tx, decision);
      if (format === 'json') {
        write(formatter.formatObject(outcome, format));
      }
      if (outcome.status === 'partial') {
        process.exitCode = 1;
      }
    });
}
