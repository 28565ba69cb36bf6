import type { LogLevel, Logger, LoggerMeta } from './types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50,
};

/**
 * Logs to console.debug, console.info, console.warn and console.error,
 * dropping records below the configured level.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel = 'error') {}

  debug(message: string, meta?: LoggerMeta): void {
    if (this.enabled('debug')) this.write(console.debug, message, meta);
  }

  info(message: string, meta?: LoggerMeta): void {
    if (this.enabled('info')) this.write(console.info, message, meta);
  }

  warn(message: string, meta?: LoggerMeta): void {
    if (this.enabled('warn')) this.write(console.warn, message, meta);
  }

  error(message: string, meta?: LoggerMeta): void {
    if (this.enabled('error')) this.write(console.error, message, meta);
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private write(fn: (...args: unknown[]) => void, message: string, meta?: LoggerMeta): void {
    if (meta) {
      fn(message, meta);
    } else {
      fn(message);
    }
  }
}

export const noopLogger: Logger = {
  debug: () => {
    /* no-op */
  },
  info: () => {
    /* no-op */
  },
  warn: () => {
    /* no-op */
  },
  error: () => {
    /* no-op */
  },
};
