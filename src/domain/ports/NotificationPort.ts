export type NotificationLevel = 'info' | 'warn' | 'error';

/**
 * 通知出口：核心回報結果（成功/失敗計數、找不到 backlink 等），
 * 實際呈現方式（status line、popup、stdout）由宿主決定
 */
export interface NotificationPort {
  notify(message: string, level?: NotificationLevel): void;
}
