import type { LogLevel } from '../types/index.js';

type EmittingLevel = Exclude<LogLevel, 'silent'>;

/**
 * Log entry with metadata.
 */
export interface LogEntry {
  level: EmittingLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  timestamp: Date;
}

/**
 * Receives entries that pass the level filter.
 */
export type LogWriter = (entry: LogEntry) => void;

/**
 * Logger interface for the conversion pipeline.
 */
export interface ILogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(context: string): ILogger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Formats an entry as a single console line.
 */
export function formatLogEntry(entry: LogEntry): string {
  const prefix = entry.context ? ` [${entry.context}]` : '';
  return `${entry.timestamp.toISOString()} ${entry.level.toUpperCase().padEnd(5)}${prefix} ${entry.message}`;
}

/**
 * Default writer: one console call per entry, routed by level.
 */
export const consoleLogWriter: LogWriter = (entry) => {
  const line = formatLogEntry(entry);
  const write =
    entry.level === 'debug'
      ? console.debug
      : entry.level === 'info'
        ? console.info
        : entry.level === 'warn'
          ? console.warn
          : console.error;

  if (entry.data) {
    write(line, entry.data);
  } else {
    write(line);
  }
};

/**
 * Level-filtered logger. Writes to the console unless another writer is supplied.
 */
export class Logger implements ILogger {
  private readonly levelPriority: number;

  constructor(
    private readonly level: LogLevel = 'warn',
    private readonly context?: string,
    private readonly writer: LogWriter = consoleLogWriter
  ) {
    this.levelPriority = LOG_LEVEL_PRIORITY[level];
  }

  /**
   * Creates a child logger with additional context.
   */
  child(context: string): ILogger {
    const fullContext = this.context ? `${this.context}:${context}` : context;
    return new Logger(this.level, fullContext, this.writer);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: EmittingLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < this.levelPriority) {
      return;
    }

    this.writer({
      level,
      message,
      context: this.context,
      data,
      timestamp: new Date(),
    });
  }
}

/**
 * Creates a logger instance based on the log level.
 * 'silent' filters out every entry.
 */
export function createLogger(level: LogLevel = 'warn', context?: string, writer?: LogWriter): ILogger {
  return new Logger(level, context, writer);
}
