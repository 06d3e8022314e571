/**
 * JSON Formatter - Compact JSON log format
 */

import type { LogEntry, MessageEntry } from '../logger.js';
import type { LogFormatter } from './types.js';

/**
 * Formats log entries as compact JSON.
 *
 * @example
 * {"level":"info","timestamp":"2025-04-01T09:00:00.000Z","pid":3784,"progname":"order-desk","index":0,"requestId":"...","step":"ResolveItemsStep","status":"success"}
 */
export class JsonFormatter implements LogFormatter {
  private pretty: boolean;

  constructor(options?: { pretty?: boolean }) {
    this.pretty = options?.pretty ?? false;
  }

  format(entry: LogEntry): string {
    const { level, timestamp, pid, progname, result, tags } = entry;

    const obj: Record<string, unknown> = {
      level,
      timestamp: timestamp.toISOString(),
      pid,
      progname,
      index: result.index,
      requestId: result.requestId,
      step: result.step,
      stepId: result.stepId,
      state: result.state,
      status: result.status,
      outcome: result.outcome,
    };

    if (tags && tags.length > 0) {
      obj.tags = tags;
    }

    if (Object.keys(result.metadata).length > 0) {
      obj.metadata = result.metadata;
    }

    if (result.reason) {
      obj.reason = result.reason;
    }

    return this.stringify(obj);
  }

  formatMessage(entry: MessageEntry): string {
    return this.stringify({
      level: entry.level,
      timestamp: entry.timestamp.toISOString(),
      pid: entry.pid,
      progname: entry.progname,
      msg: entry.message,
      ...entry.data,
    });
  }

  private stringify(obj: Record<string, unknown>): string {
    return JSON.stringify(obj, null, this.pretty ? 2 : undefined);
  }
}
