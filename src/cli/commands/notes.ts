import type { Command } from 'commander';
import { NOTE_TYPES, type NoteType } from '../../domain/entities/NoteRecord.js';
import { createCliContext, resolveNoteArgument, write } from '../CliContext.js';

interface ListOptions {
  type?: string;
  dir?: string;
}

interface ResolveOptions {
  from?: string;
}

function isNoteType(value: string): value is NoteType {
  return NOTE_TYPES.some((t) => t === value);
}

/** 註冊 list / links / resolve / backlinks 指令 */
export function registerNotesCommands(program: Command): void {
  program
    .command('list')
    .description('List indexed notes')
    .option('--type <type>', `Filter by note type: ${NOTE_TYPES.join(', ')}`)
    .option('--dir <directory>', 'Filter by directory (relative to the notes root)')
    .action((opts: ListOptions, cmd: Command) => {
      const { core, formatter, format } = createCliContext(cmd);
      const type = opts.type;
      if (type !== undefined && !isNoteType(type)) {
        throw new Error(`Unknown note type: ${type}`);
      }

      const notes = core.index.getOrBuild().filter((n) => {
        if (type && n.noteType !== type) return false;
        if (opts.dir !== undefined && n.directory !== opts.dir.replace(/\/+$/, '')) return false;
        return true;
      });
      write(formatter.formatNotes(notes, format));
    });

  program
    .command('links <note>')
    .description('List the links found in a note')
    .action((note: string, _opts: unknown, cmd: Command) => {
      const { core, formatter, format } = createCliContext(cmd);
      const notePath = resolveNoteArgument(core, note);
      const refs = core.extractor.extract(core.fsPort.readText(notePath), notePath);
      write(formatter.formatLinks(refs, format));
    });

  program
    .command('resolve <target>')
    .description('Resolve a link target to a note')
    .option('--from <note>', 'Note the link appears in (for relative paths)')
    .action((target: string, opts: ResolveOptions, cmd: Command) => {
      const { core, formatter, format } = createCliContext(cmd);
      const sourceFile = opts.from ? resolveNoteArgument(core, opts.from) : undefined;
      const resolution = core.resolver.resolveDetailed(target, core.index.getOrBuild(), { sourceFile });

      if (!resolution) {
        process.stderr.write(`Unresolved: ${target}\n`);
        process.exitCode = 1;
        return;
      }
      if (format === 'json') {
        write(formatter.formatObject(resolution, format));
      } else {
        write(`${resolution.note.relativePath} (${resolution.strategy})`);
      }
    });

  program
    .command('backlinks <note>')
    .description('Show every note that links to the given note')
    .action((note: string, _opts: unknown, cmd: Command) => {
      const { core, formatter, format } = createCliContext(cmd);
      const notePath = resolveNoteArgument(core, note);
      const refs = core.backlinks.backlinksFor(notePath, core.index.getOrBuild());
      write(formatter.formatBacklinks(core.backlinks.groupBySource(refs), format));
    });
}
