import { errorMessage } from '../../domain/errors/DomainErrors.js';

/** MCP tool 回傳的文字內容 */
export function textResult(text: string) {
  return {
    content: [{ type: 'text' as const, text }],
  };
}

/** 失敗時以 isError 回傳，不讓例外中斷 MCP 連線 */
export function errorResult(prefix: string, err: unknown) {
  return {
    content: [{ type: 'text' as const, text: `${prefix}: ${errorMessage(err)}` }],
    isError: true,
  };
}
