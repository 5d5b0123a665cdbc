/**
 * core/logger.ts
 *
 * Singleton pino logger. Every module does:
 *     const log = scopedLogger('clipboard/wayland');
 *
 * Logs go to stderr so stdout only carries the messages meant for the user.
 */

import pino from 'pino';
import { LogLevel, SaveCbConfig } from './types';

let instance: pino.Logger | null = null;

function createLogger(level: LogLevel): pino.Logger {
  return pino({ level }, pino.destination({ dest: 2, sync: true }));
}

/**
 * Child loggers copy the root level when they are created, so this must run
 * before any module that calls scopedLogger() at import time is loaded.
 */
export function initLogger(config: Pick<SaveCbConfig, 'logLevel'>): pino.Logger {
  instance = createLogger(config.logLevel);
  return instance;
}

export function getLogger(): pino.Logger {
  if (!instance) {
    // Fallback for module-level scopedLogger() calls that run before initLogger
    instance = createLogger('warn');
  }
  return instance;
}

/**
 * Returns a child logger scoped to a specific module.
 * Usage:  const log = scopedLogger('persist/image_writer');
 */
export function scopedLogger(moduleName: string): pino.Logger {
  return getLogger().child({ module: moduleName });
}
