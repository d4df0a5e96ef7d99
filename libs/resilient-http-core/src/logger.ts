import type { Logger, LoggerMeta } from './types';

/**
 * Console logger used by `createDefaultHttpClient`.
 * Writes to console.debug, console.info, console.warn and console.error.
 */
class ConsoleLogger implements Logger {
  constructor(private readonly minLevel: LogLevel) {}

  debug(message: string, meta?: LoggerMeta): void {
    if (this.enabled('debug')) console.debug(message, meta ?? {});
  }
  info(message: string, meta?: LoggerMeta): void {
    if (this.enabled('info')) console.info(message, meta ?? {});
  }
  warn(message: string, meta?: LoggerMeta): void {
    if (this.enabled('warn')) console.warn(message, meta ?? {});
  }
  error(message: string, meta?: LoggerMeta): void {
    if (this.enabled('error')) console.error(message, meta ?? {});
  }

  private enabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel);
  }
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
  return new ConsoleLogger(minLevel);
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
