/**
 * Line Formatter - Traditional single-line log format
 */

import type { LogEntry, MessageEntry } from '../logger.js';
import type { LogFormatter } from './types.js';

/**
 * Formats log entries as traditional single-line format.
 *
 * @example
 * I, [2025-04-01T09:00:00.000Z #3784] INFO -- order-desk: index=2 request_id="..." step="RecordSalesStep" state="complete" status="success" outcome="success"
 */
export class LineFormatter implements LogFormatter {
  format(entry: LogEntry): string {
    const { result, tags } = entry;

    const parts: string[] = [
      `index=${result.index}`,
      `request_id="${result.requestId}"`,
      `step="${result.step}"`,
    ];

    if (tags && tags.length > 0) {
      parts.push(`tags=[${tags.map((t) => `"${t}"`).join(', ')}]`);
    }

    parts.push(`id="${result.stepId}"`);
    parts.push(`state="${result.state}"`);
    parts.push(`status="${result.status}"`);
    parts.push(`outcome="${result.outcome}"`);

    if (Object.keys(result.metadata).length > 0) {
      parts.push(`metadata=${formatMetadata(result.metadata)}`);
    }

    if (result.reason) {
      parts.push(`reason="${escapeString(result.reason)}"`);
    }

    return prefix(entry) + parts.join(' ');
  }

  formatMessage(entry: MessageEntry): string {
    const data = entry.data && Object.keys(entry.data).length > 0
      ? ` ${formatMetadata(entry.data)}`
      : '';
    return prefix(entry) + entry.message + data;
  }
}

function prefix(entry: { level: string; timestamp: Date; pid: number; progname: string }): string {
  const levelChar = entry.level.charAt(0).toUpperCase();
  return `${levelChar}, [${entry.timestamp.toISOString()} #${entry.pid}] ${entry.level.toUpperCase()} -- ${entry.progname}: `;
}

function formatMetadata(metadata: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(metadata)) {
    if (value === undefined) continue;
    parts.push(`${key}: ${formatValue(value)}`);
  }
  return `{${parts.join(', ')}}`;
}

function formatValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return `"${escapeString(value)}"`;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) return `[${value.map(formatValue).join(', ')}]`;
  if (isRecord(value)) return formatMetadata(value);
  return String(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function escapeString(str: string): string {
  return str.replace(/"/g, '\\"').replace(/\n/g, '\\n');
}
