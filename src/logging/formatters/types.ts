/**
 * Log Formatter Types
 */

import type { LogEntry, MessageEntry } from '../logger.js';

export interface LogFormatter {
  /**
   * Format a step result entry into a string
   */
  format(entry: LogEntry): string;

  /**
   * Format a free-form message entry into a string
   */
  formatMessage(entry: MessageEntry): string;
}
