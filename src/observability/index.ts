// Structured logging
export type { LogContext, LogLevel } from './types.js';

export type { CreateLoggerOptions, Logger } from './logger.js';
export { createLogger } from './logger.js';
