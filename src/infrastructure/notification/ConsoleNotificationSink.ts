import type { NotificationLevel, NotificationPort } from '../../domain/ports/NotificationPort.js';

const PREFIX: Record<NotificationLevel, string> = {
  info: '',
  warn: 'Warning: ',
  error: 'Error: ',
};

/** CLI 用：info 寫到 stdout，warn/error 寫到 stderr */
export class ConsoleNotificationSink implements NotificationPort {
  constructor(
    private readonly out: NodeJS.WritableStream = process.stdout,
    private readonly err: NodeJS.WritableStream = process.stderr,
  ) {}

  notify(message: string, level: NotificationLevel = 'info'): void {
    const stream = level === 'info' ? this.out : this.err;
    stream.write(`${PREFIX[level]}${message}\n`);
  }
}

/** 收集通知的 sink，供測試斷言與 MCP 回應組裝 */
export class CollectingNotificationSink implements NotificationPort {
  readonly messages: Array<{ message: string; level: NotificationLevel }> = [];

  notify(message: string, level: NotificationLevel = 'info'): void {
    this.messages.push({ message, level });
  }
}
