import type { Command } from 'commander';
import { createCliContext, write } from '../CliContext.js';

interface SearchOptions {
  caseSensitive?: boolean;
  regex?: boolean;
}

interface TagsOptions {
  tag?: string;
}

/** 註冊 search / tags 指令 */
export function registerSearchCommands(program: Command): void {
  program
    .command('search <query>')
    .description('Search note contents line by line')
    .option('--case-sensitive', 'Match case exactly')
    .option('--regex', 'Treat the query as a regular expression')
    .action((query: string, opts: SearchOptions, cmd: Command) => {
      const { core, formatter, format } = createCliContext(cmd);
      const matches = core.search.searchText(query, {
        caseSensitive: opts.caseSensitive ?? false,
        regex: opts.regex ?? false,
      });
      write(formatter.formatMatches(matches, format));
    });

  program
    .command('tags')
    .description('List tags with note counts, or the notes carrying one tag')
    .option('--tag <tag>', 'List the notes tagged with <tag>')
    .action((opts: TagsOptions, cmd: Command) => {
      const { core, formatter, format } = createCliContext(cmd);
      if (opts.tag) {
        write(formatter.formatNotes(core.search.notesWithTag(opts.tag), format));
        return;
      }

      const tags = core.search.listTags();
      if (format === 'json') {
        write(formatter.formatObject(tags, format));
      } else {
        write(tags.length === 0 ? 'No tags found.' : tags.map((t) => `#${t.tag} (${t.count})`).join('\n'));
      }
    });
}
