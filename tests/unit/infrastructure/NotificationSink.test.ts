import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import {
  CollectingNotificationSink,
  ConsoleNotificationSink,
} from '../../../src/infrastructure/notification/ConsoleNotificationSink.js';
import { LoggerNotificationSink } from '../../../src/infrastructure/notification/LoggerNotificationSink.js';
import { Logger } from '../../../src/shared/Logger.js';

/** 同步收集寫入內容的 stream */
function capture(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf-8'));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

describe('Notification sinks', () => {
  it('should write info to stdout and prefixed warnings to stderr', () => {
    const out = capture();
    const err = capture();
    const sink = new ConsoleNotificationSink(out.stream, err.stream);

    sink.notify('Index written: 3 notes');
    sink.notify('Moved 1 file(s), 1 failed.', 'warn');
    sink.notify('boom', 'error');

    expect(out.text()).toBe('Index written: 3 notes\n');
    expect(err.text()).toBe('Warning: Moved 1 file(s), 1 failed.\nError: boom\n');
  });

  it('should forward notifications to the logger at the same level', () => {
    const lines: string[] = [];
    const sink = new LoggerNotificationSink(new Logger('notify', 'info', (l) => lines.push(l)));

    sink.notify('Rename cancelled.', 'warn');

    const entry: unknown = JSON.parse(lines[0]);
    expect(entry).toMatchObject({ level: 'warn', context: 'notify', message: 'Rename cancelled.', notification: true });
  });

  it('should collect notifications in order', () => {
    const sink = new CollectingNotificationSink();
    sink.notify('first');
    sink.notify('second', 'error');

    expect(sink.messages).toEqual([
      { message: 'first', level: 'info' },
      { message: 'second', level: 'error' },
    ]);
  });
});
