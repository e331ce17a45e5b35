import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { NOTE_TYPES, formatNoteEntry } from '../../domain/entities/NoteRecord.js';
import { errorResult, textResult } from './ToolResult.js';

/**
 * MCP Tool: notelink_list
 * 對應 CLI: notelink list
 */
export function registerListTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'notelink_list',
    'List indexed notes, optionally filtered by note type or directory',
    {
      type: z.enum(['daily', 'quick', 'project', 'person', 'reading', 'generic']).optional()
        .describe(`Note type filter: ${NOTE_TYPES.join(', ')}`),
      directory: z.string().optional().describe('Directory relative to the notes root'),
      limit: z.number().int().positive().optional().default(200).describe('Maximum number of notes'),
    },
    async ({ type, directory, limit }) => {
      try {
        const notes = deps.core.index.getOrBuild().filter((n) => {
          if (type && n.noteType !== type) return false;
          if (directory !== undefined && n.directory !== directory.replace(/\/+$/, '')) return false;
          return true;
        });

        const shown = notes.slice(0, limit);
        const lines = [`${notes.length} note(s)`, '', ...shown.map(formatNoteEntry)];
        if (notes.length > shown.length) {
          lines.push('', `… ${notes.length - shown.length} more`);
        }
        return textResult(lines.join('\n'));
      } catch (err) {
        return errorResult('List failed', err);
      }
    },
  );
}
