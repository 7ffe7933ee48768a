export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log sink. The host may pass its own; the default writes to the console.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface ConsoleLoggerOptions {
  /** Lowest level written (default: 'info') */
  level?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * Console logger that prefixes each line with `[tag]`.
 *
 * ```typescript
 * const log = createConsoleLogger('Orchestrator');
 * log.info('Step completed', { step: 'WEB_VIEW' });
 * // [Orchestrator] Step completed { step: 'WEB_VIEW' }
 * ```
 */
export function createConsoleLogger(tag: string, options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];

  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    const line = `[${tag}] ${message}`;
    const args: unknown[] = meta === undefined ? [line] : [line, meta];
    switch (level) {
      case 'debug': console.debug(...args); break;
      case 'info': console.log(...args); break;
      case 'warn': console.warn(...args); break;
      case 'error': console.error(...args); break;
    }
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
}

/** Discards everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
