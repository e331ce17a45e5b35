import { McpServer as SDKMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { NoteLinkCore } from '../NoteLinkCore.js';
import { registerListTool } from './tools/ListTool.js';
import { registerLinksTool } from './tools/LinksTool.js';
import { registerResolveTool } from './tools/ResolveTool.js';
import { registerBacklinksTool } from './tools/BacklinksTool.js';
import { registerRenameTool } from './tools/RenameTool.js';
import { registerStatsTool } from './tools/StatsTool.js';
import { registerSearchTool } from './tools/SearchTool.js';
import { registerTagsTool } from './tools/TagsTool.js';

/**
 * MCP Server Factory
 *
 * 設計意圖：建立 MCP server 實例並註冊所有工具。
 * 工具與 CLI 指令對應；server 存活期間共用同一份 NoteLinkCore（含索引快取）。
 */

export interface McpDependencies {
  core: NoteLinkCore;
}

export function createMcpServer(deps: McpDependencies): SDKMcpServer {
  const server = new SDKMcpServer(
    { name: 'notelink', version: '0.4.0' },
    { instructions: buildInstructions(deps.core.index.root) },
  );

  // === 查詢 tools ===
  registerListTool(server, deps);
  registerLinksTool(server, deps);
  registerResolveTool(server, deps);
  registerBacklinksTool(server, deps);
  registerSearchTool(server, deps);
  registerTagsTool(server, deps);
  registerStatsTool(server, deps);

  // === 寫入 tools ===
  registerRenameTool(server, deps);

  return server;
}

/** 建構 MCP server 的 instructions 文字 */
export function buildInstructions(notesRoot: string): string {
  return [
    'notelink: plain-text notes with typed links, backlinks and link-rewriting renames.',
    '',
    'Available tools:',
    '',
    '## Notes & Links',
    '- notelink_list: List indexed notes (optionally filtered by type or directory)',
    '- notelink_links: List the links inside one note',
    '- notelink_resolve: Resolve a link target to a note and report the strategy used',
    '- notelink_backlinks: Find every note that links to a note',
    '',
    '## Search',
    '- notelink_search: Line-by-line content search',
    '- notelink_tags: Tag counts, or the notes carrying a tag',
    '- notelink_stats: Note counts by type, directory and extension',
    '',
    '## Rename',
    '- notelink_rename: Preview (default) or apply a rename that rewrites every backlink',
    '',
    'Recommended rename workflow:',
    '1. notelink_rename with apply: false to review the changeset',
    '2. notelink_rename with apply: true (and backup: true for .bak copies)',
    '',
    'Links using zk:ID are never rewritten; they keep resolving through the ID prefix.',
    '',
    `Notes root: ${notesRoot}`,
  ].join('\n');
}
