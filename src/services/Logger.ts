/**
 * Logger - Level-gated diagnostics on stderr
 *
 * stdout is reserved for the agent's answer. Every message, shown or not, is
 * also kept in a bounded in-memory buffer so the CLI can print the recent
 * history when a turn fails unexpectedly.
 */

import { BUFFER_SIZES } from '../config/constants.js';

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  VERBOSE = 2,
  DEBUG = 3,
}

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  message: string;
}

const LEVEL_LABELS: Record<LogLevel, string> = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.VERBOSE]: 'VERBOSE',
  [LogLevel.DEBUG]: 'DEBUG',
};

function renderArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.message;
  }
  if (typeof arg === 'object' && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return '[Circular]';
    }
  }
  return String(arg);
}

export class Logger {
  private static instance: Logger | null = null;

  private level: LogLevel = LogLevel.WARN;
  private buffer: LogEntry[] = [];

  private constructor(private readonly maxEntries: number = BUFFER_SIZES.MAX_LOG_BUFFER_SIZE) {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * A logger that is not the process-wide one (tests)
   */
  static create(maxEntries?: number): Logger {
    return new Logger(maxEntries);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Set the level from CLI flags; debug wins over verbose, verbose over quiet
   */
  configure(options: { verbose?: boolean; debug?: boolean; quiet?: boolean }): void {
    if (options.debug) {
      this.level = LogLevel.DEBUG;
    } else if (options.verbose) {
      this.level = LogLevel.VERBOSE;
    } else if (options.quiet) {
      this.level = LogLevel.ERROR;
    } else {
      this.level = LogLevel.WARN;
    }
  }

  error(...args: unknown[]): void {
    this.log(LogLevel.ERROR, args);
  }

  warn(...args: unknown[]): void {
    this.log(LogLevel.WARN, args);
  }

  verbose(...args: unknown[]): void {
    this.log(LogLevel.VERBOSE, args);
  }

  debug(...args: unknown[]): void {
    this.log(LogLevel.DEBUG, args);
  }

  /**
   * The last `limit` buffered entries at `level` or more severe, oldest first
   */
  getRecentLogs(limit: number, level: LogLevel = LogLevel.DEBUG): LogEntry[] {
    const matching = this.buffer.filter(entry => entry.level <= level);
    return limit > 0 ? matching.slice(-limit) : [];
  }

  clearLogs(): void {
    this.buffer = [];
  }

  static formatEntry(entry: LogEntry): string {
    return `${new Date(entry.timestamp).toISOString()} ${LEVEL_LABELS[entry.level]} ${entry.message}`;
  }

  private log(level: LogLevel, args: unknown[]): void {
    this.store(level, args);
    if (this.level >= level) {
      console.error(...args);
    }
  }

  // Serialized at once: the buffer never holds live objects
  private store(level: LogLevel, args: unknown[]): void {
    let message = args.map(renderArg).join(' ');
    if (message.length > BUFFER_SIZES.MAX_LOG_MESSAGE_LENGTH) {
      message = `${message.slice(0, BUFFER_SIZES.MAX_LOG_MESSAGE_LENGTH)}... [truncated]`;
    }

    this.buffer.push({ timestamp: Date.now(), level, message });
    if (this.buffer.length > this.maxEntries) {
      this.buffer.shift();
    }
  }
}

export const logger = Logger.getInstance();
