import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { locateNote } from '../../NoteLinkCore.js';
import { errorResult, textResult } from './ToolResult.js';

/**
 * MCP Tool: notelink_resolve
 * 對應 CLI: notelink resolve <target>
 */
export function registerResolveTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'notelink_resolve',
    'Resolve a link target (as written inside [[...]] or (...)) to a note',
    {
      target: z.string().describe('Link target text, e.g. "My Note" or "../projects/x.org"'),
      from: z.string().optional().describe('Note the link appears in, for relative paths'),
      zk: z.boolean().optional().default(false).describe('Treat the target as a zk:ID'),
    },
    async ({ target, from, zk }) => {
      try {
        const { core } = deps;
        const sourceFile = from ? locateNote(core, from) : undefined;
        const resolution = core.resolver.resolveDetailed(target, core.index.getOrBuild(), {
          sourceFile,
          linkType: zk ? 'zkId' : undefined,
        });

        if (!resolution) return textResult(`Unresolved: ${target}`);
        return textResult(`${resolution.note.path}\nstrategy: ${resolution.strategy}`);
      } catch (err) {
        return errorResult('Resolve failed', err);
      }
    },
  );
}
