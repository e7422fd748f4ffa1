import { getLogger, type Logger } from '@volley/logger';

import type { HttpEffects, LogLevel } from '../core/types.js';

function writeLog(logger: Logger, level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
  switch (level) {
    case 'debug':
      return metadata ? logger.debug(metadata, message) : logger.debug(message);
    case 'info':
      return metadata ? logger.info(metadata, message) : logger.info(message);
    case 'warn':
      return metadata ? logger.warn(metadata, message) : logger.warn(message);
    case 'error':
      return metadata ? logger.error(metadata, message) : logger.error(message);
  }
}

/**
 * Production effects: real timers, wall clock, and a category logger.
 */
export function createDefaultEffects(category: string, overrides?: Partial<HttpEffects>): HttpEffects {
  const logger = getLogger(category);

  return {
    delay: (ms: number, signal?: AbortSignal) =>
      new Promise<void>((resolve) => {
        if (signal?.aborted) {
          resolve();
          return;
        }
        const onAbort = () => {
          clearTimeout(timer);
          resolve();
        };
        const timer = setTimeout(() => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
      }),
    log: (level, message, metadata) => writeLog(logger, level, message, metadata),
    now: () => Date.now(),
    ...overrides,
  };
}
