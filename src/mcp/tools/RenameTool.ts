import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { locateNote } from '../../NoteLinkCore.js';
import { toPosixRelative } from '../../shared/PathUtils.js';
import { errorResult, textResult } from './ToolResult.js';

/**
 * MCP Tool: notelink_rename
 * 對應 CLI: notelink rename <note> <newName>
 *
 * 預設只回傳預覽；apply: true 才會改寫連結並重新命名檔案。
 */
export function registerRenameTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'notelink_rename',
    'Rename a note and rewrite every link pointing to it (preview unless apply is true)',
    {
      note: z.string().describe('Note path (absolute or relative to the notes root) or link target'),
      newName: z.string().describe('New basename, without directory'),
      apply: z.boolean().optional().default(false).describe('Apply the changeset instead of previewing it'),
      backup: z.boolean().optional().describe('Write <file>.bak before rewriting (defaults to config)'),
    },
    async ({ note, newName, apply, backup }) => {
      try {
        const { core } = deps;
        const computation = core.rename.compute(locateNote(core, note), newName);
        if (!computation.ok) {
          return errorResult('Rename failed', computation.error);
        }

        const tx = computation.transaction;
        const preview = core.rename.preview(tx);
        const rel = (p: string) => toPosixRelative(core.index.root, p);
        const lines = [
          `Rename ${rel(preview.fromPath)} → ${rel(preview.toPath)}`,
          `${preview.totalChanges} line(s) in ${preview.perFile.length} file(s)`,
        ];
        for (const change of preview.changes) {
          lines.push('', `${rel(change.file)}:${change.lineNumber}`, `- ${change.oldLine}`, `+ ${change.newLine}`);
        }

        if (!apply) {
          core.rename.decide(tx, 'cancel');
          lines.push('', 'Preview only. Call again with apply: true to rename.');
          return textResult(lines.join('\n'));
        }

        const useBackup = backup ?? core.config.rename.backupByDefault;
        const outcome = core.rename.decide(tx, useBackup ? 'applyWithBackup' : 'apply');
        lines.push(
          '',
          `Status: ${outcome.status}`,
          `Applied: ${outcome.appliedCount}, skipped: ${outcome.failedCount}`,
        );
        if (outcome.backups.length > 0) lines.push(`Backups: ${outcome.backups.map(rel).join(', ')}`);
        if (outcome.partialError) {
          lines.push(outcome.partialError.message);
          if (outcome.rolledBack) lines.push('Link changes were rolled back.');
          return { ...textResult(lines.join('\n')), isError: true };
        }
        return textResult(lines.join('\n'));
      } catch (err) {
        return errorResult('Rename failed', err);
      }
    },
  );
}
