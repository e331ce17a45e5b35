import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { locateNote } from '../../NoteLinkCore.js';
import { errorResult, textResult } from './ToolResult.js';

/**
 * MCP Tool: notelink_links
 * 對應 CLI: notelink links <note>
 * 列出筆記中的連結，並標示各自解析到的筆記。
 */
export function registerLinksTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'notelink_links',
    'List the links inside a note with the note each one resolves to',
    {
      note: z.string().describe('Note path (absolute or relative to the notes root) or link target'),
    },
    async ({ note }) => {
      try {
        const { core } = deps;
        const notePath = locateNote(core, note);
        const index = core.index.getOrBuild();
        const refs = core.extractor.extract(core.fsPort.readText(notePath), notePath);

        if (refs.length === 0) return textResult('No links found.');

        const lines = refs.map((ref) => {
          const resolution = core.resolver.resolveReference(ref, index);
          const target = resolution ? `${resolution.note.relativePath} (${resolution.strategy})` : 'unresolved';
          return `L${ref.lineNumber} ${ref.linkType} ${ref.matchText} → ${target}`;
        });
        return textResult(lines.join('\n'));
      } catch (err) {
        return errorResult('Links failed', err);
      }
    },
  );
}
