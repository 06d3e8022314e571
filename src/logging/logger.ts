/**
 * Structured Logger for order-desk
 */

import type { StepResult, ResultJSON } from '../result.js';
import type { LogFormatter } from './formatters/types.js';
import { LineFormatter } from './formatters/line.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry for a step result
 */
export interface LogEntry {
  level: LogLevel;
  timestamp: Date;
  pid: number;
  progname: string;
  result: ResultJSON;
  tags?: string[];
}

/**
 * Log entry for a free-form message
 */
export interface MessageEntry {
  level: LogLevel;
  timestamp: Date;
  pid: number;
  progname: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LoggerOptions {
  /** Output stream (default: process.stdout) */
  output?: NodeJS.WritableStream;
  /** Log formatter (default: LineFormatter) */
  formatter?: LogFormatter;
  /** Program name (default: 'order-desk') */
  progname?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  enabled?: boolean;
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private output: NodeJS.WritableStream;
  private formatter: LogFormatter;
  private progname: string;
  private level: LogLevel;
  private enabled: boolean;

  constructor(options: LoggerOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.formatter = options.formatter ?? new LineFormatter();
    this.progname = options.progname ?? 'order-desk';
    this.level = options.level ?? 'info';
    this.enabled = options.enabled ?? true;
  }

  /**
   * Log a step result at the level its status implies
   */
  log(result: StepResult, options?: { level?: LogLevel; tags?: string[] }): void {
    if (!this.enabled) return;

    const level = options?.level ?? this.inferLevel(result);
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      level,
      timestamp: new Date(),
      pid: process.pid,
      progname: this.progname,
      result: result.toJSON(),
      tags: options?.tags,
    };

    this.output.write(this.formatter.format(entry) + '\n');
  }

  debug(message: string | (() => string), data?: Record<string, unknown>): void {
    this.logMessage('debug', message, data);
  }

  info(message: string | (() => string), data?: Record<string, unknown>): void {
    this.logMessage('info', message, data);
  }

  warn(message: string | (() => string), data?: Record<string, unknown>): void {
    this.logMessage('warn', message, data);
  }

  error(message: string | (() => string), data?: Record<string, unknown>): void {
    this.logMessage('error', message, data);
  }

  private logMessage(
    level: LogLevel,
    message: string | (() => string),
    data?: Record<string, unknown>
  ): void {
    if (!this.enabled || !this.shouldLog(level)) return;

    const entry: MessageEntry = {
      level,
      timestamp: new Date(),
      pid: process.pid,
      progname: this.progname,
      message: typeof message === 'function' ? message() : message,
      data,
    };

    this.output.write(this.formatter.formatMessage(entry) + '\n');
  }

  private inferLevel(result: StepResult): LogLevel {
    if (result.failed) return 'error';
    if (result.skipped) return 'warn';
    return 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.level];
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setFormatter(formatter: LogFormatter): void {
    this.formatter = formatter;
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }
}

export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}
