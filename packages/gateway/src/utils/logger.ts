/**
 * Structured logger.
 *
 * Thin factory over pino. Call sites use `logger.info(context, message)`.
 * Output is JSON on stdout; pipe through pino-pretty for local reading.
 */

import { pino, stdSerializers } from 'pino';
import type { Logger as PinoLogger } from 'pino';

export type Logger = PinoLogger;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LoggerOptions {
  level: LogLevel;
  service: string;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(options: LoggerOptions): Logger {
  // Silent under the test runner
  const enabled = process.env.VITEST !== 'true' && process.env.NODE_ENV !== 'test';

  return pino({
    level: options.level,
    enabled,
    base: { service: options.service },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: { error: stdSerializers.err },
  });
}

/**
 * For tests: preserves the Logger type, emits nothing.
 */
export function createNoopLogger(): Logger {
  return pino({ enabled: false });
}
