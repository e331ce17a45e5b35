import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpDependencies } from '../McpServer.js';
import { errorResult, textResult } from './ToolResult.js';

/**
 * MCP Tool: notelink_stats
 * 對應 CLI: notelink stats
 */
export function registerStatsTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'notelink_stats',
    'Show note counts by type, directory and extension',
    {},
    async () => {
      try {
        const stats = deps.core.catalog.stats();
        const lines: string[] = [
          '# Notes Status',
          '',
          `Notes root: ${deps.core.index.root}`,
          `Total notes: ${stats.totalNotes}`,
          '',
          '## By Type',
        ];
        for (const [type, count] of Object.entries(stats.byType)) {
          lines.push(`  ${type}: ${count}`);
        }
        lines.push('', '## By Directory');
        for (const [dir, count] of Object.entries(stats.byDirectory)) {
          lines.push(`  ${dir}: ${count}`);
        }
        lines.push('', '## By Extension');
        for (const [ext, count] of Object.entries(stats.byExtension)) {
          lines.push(`  .${ext}: ${count}`);
        }
        return textResult(lines.join('\n'));
      } catch (err) {
        return errorResult('Stats failed', err);
      }
    },
  );
}
