import type { NotificationLevel, NotificationPort } from '../../domain/ports/NotificationPort.js';
import type { Logger } from '../../shared/Logger.js';

/** 將通知寫入結構化 log（MCP 模式下 stdout 保留給協定使用） */
export class LoggerNotificationSink implements NotificationPort {
  constructor(private readonly logger: Logger) {}

  notify(message: string, level: NotificationLevel = 'info'): void {
    this.logger[level](message, { notification: true });
  }
}
