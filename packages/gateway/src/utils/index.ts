export { createLogger, createNoopLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel, LoggerOptions } from './logger.js';
export { decodeHex } from './hex.js';
