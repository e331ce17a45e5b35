import type { Command } from 'commander';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createNoteLinkCore } from '../../NoteLinkCore.js';
import { createMcpServer } from '../../mcp/McpServer.js';
import { loadCliConfig } from '../CliContext.js';

/**
 * 註冊 mcp 指令
 *
 * 用法：
 *   notelink mcp [--root ~/Documents/Notes]
 */
export function registerMcpCommand(program: Command): void {
  program
    .command('mcp')
    .description('Start MCP server for LLM tool integration (stdio)')
    .action(async (_opts: unknown, cmd: Command) => {
      const { config } = loadCliConfig(cmd);

      // 通知走 LoggerNotificationSink（stderr），stdout 保留給 MCP 協定
      const core = createNoteLinkCore(config);
      const server = createMcpServer({ core });

      // stdio 模式：stdout 專供 MCP 協定，持續執行直到 stdin 關閉
      await server.connect(new StdioServerTransport());
      core.logger.info('MCP server listening on stdio', { root: core.index.root });

      process.on('SIGINT', () => {
        process.exit(0);
      });
    });
}
