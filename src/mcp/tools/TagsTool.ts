import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { errorResult, textResult } from './ToolResult.js';

/**
 * MCP Tool: notelink_tags
 * 對應 CLI: notelink tags [--tag <tag>]
 */
export function registerTagsTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'notelink_tags',
    'List tags with note counts, or the notes carrying one tag',
    {
      tag: z.string().optional().describe('Tag to look up (with or without #)'),
    },
    async ({ tag }) => {
      try {
        if (tag) {
          const notes = deps.core.search.notesWithTag(tag);
          if (notes.length === 0) return textResult(`No notes tagged #${tag.replace(/^#/, '')}.`);
          return textResult(notes.map((n) => n.relativePath).join('\n'));
        }

        const tags = deps.core.search.listTags();
        if (tags.length === 0) return textResult('No tags found.');
        return textResult(tags.map((t) => `#${t.tag} (${t.count})`).join('\n'));
      } catch (err) {
        return errorResult('Tags failed', err);
      }
    },
  );
}
