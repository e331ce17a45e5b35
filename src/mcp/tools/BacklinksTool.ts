import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { locateNote } from '../../NoteLinkCore.js';
import { toPosixRelative } from '../../shared/PathUtils.js';
import { errorResult, textResult } from './ToolResult.js';

/**
 * MCP Tool: notelink_backlinks
 * 對應 CLI: notelink backlinks <note>
 */
export function registerBacklinksTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'notelink_backlinks',
    'Find every note that links to the given note',
    {
      note: z.string().describe('Note path (absolute or relative to the notes root) or link target'),
    },
    async ({ note }) => {
      try {
        const { core } = deps;
        const notePath = locateNote(core, note);
        const refs = core.backlinks.backlinksFor(notePath, core.index.getOrBuild());
        const groups = core.backlinks.groupBySource(refs);

        if (groups.length === 0) return textResult('No backlinks found.');

        const lines = [`${groups.length} note(s) link here:`];
        for (const group of groups) {
          lines.push('', toPosixRelative(core.index.root, group.sourceFile));
          for (const ref of group.references) {
            lines.push(`  L${ref.lineNumber}: ${ref.rawLineText.trim()}`);
          }
        }
        return textResult(lines.join('\n'));
      } catch (err) {
        return errorResult('Backlinks failed', err);
      }
    },
  );
}
