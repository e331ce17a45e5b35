import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { toPosixRelative } from '../../shared/PathUtils.js';
import { errorResult, textResult } from './ToolResult.js';

/**
 * MCP Tool: notelink_search
 * 對應 CLI: notelink search <query>
 */
export function registerSearchTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'notelink_search',
    'Line-by-line search across note contents',
    {
      query: z.string().describe('Search text (or a regular expression with regex: true)'),
      caseSensitive: z.boolean().optional().default(false).describe('Match case exactly'),
      regex: z.boolean().optional().default(false).describe('Treat the query as a regular expression'),
      limit: z.number().int().positive().optional().default(50).describe('Maximum number of matching lines'),
    },
    async ({ query, caseSensitive, regex, limit }) => {
      try {
        const matches = deps.core.search.searchText(query, { caseSensitive, regex });
        const lines = [`Found ${matches.length} matching line(s)`, ''];
        for (const m of matches.slice(0, limit)) {
          lines.push(`${toPosixRelative(deps.core.index.root, m.file)}:${m.lineNumber}: ${m.line.trim()}`);
        }
        return textResult(lines.join('\n'));
      } catch (err) {
        return errorResult('Search failed', err);
      }
    },
  );
}
