/**
 * Loggers for loading-kit packages.
 *
 * The same pino instance works under Node and in a page: `browser.asObject`
 * keeps structured fields when pino falls back to the console.
 *
 * Note: reads the level through `loadEnv` at call time so tests can change
 * `LOADING_KIT_LOG_LEVEL` between loggers.
 */

import pino from 'pino';
import { type LogLevel, loadEnv, sharedConfigSchema } from './config.js';

export type Logger = pino.Logger;

export interface CreateLoggerOptions {
  /** Overrides `LOADING_KIT_LOG_LEVEL` */
  level?: LogLevel;
}

export function createLogger(name: string, options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? loadEnv(sharedConfigSchema).LOADING_KIT_LOG_LEVEL;

  return pino({
    name,
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    browser: { asObject: true },
  });
}
