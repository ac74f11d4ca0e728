import type { Logger } from './types.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ConsoleLoggerOptions {
  /**
   * Entries below this level are dropped.
   * @default "info"
   */
  level?: LogLevel;
  /** Fields merged into every entry, e.g. `{ component: 'orchestrator' }`. */
  bindings?: Record<string, unknown>;
}

/**
 * A {@link Logger} that writes one JSON object per entry to the console
 * method matching its level.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: 'debug' });
 * logger.info('saga:start', { sagaId });
 * // {"level":"info","message":"saga:start","timestamp":"…","sagaId":"…"}
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const bindings = options.bindings ?? {};

  const log = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (LOG_LEVELS.indexOf(level) < threshold) {
      return;
    }
    const line = JSON.stringify({
      level,
      message,
      timestamp: new Date().toISOString(),
      ...bindings,
      ...meta,
    });
    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  };

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
  };
}
