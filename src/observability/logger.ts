import pino from 'pino';
import type { LogContext, LogLevel } from './types.js';

/** Structured logger interface for error-adapter. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

export interface CreateLoggerOptions {
  level?: LogLevel;
  name?: string;
  /** Write to this stream instead of stdout. Disables the pretty transport. */
  destination?: pino.DestinationStream;
}

// pino takes the merge object first and the message second.
function fromPino(instance: pino.Logger): Logger {
  return {
    debug: (msg, context) => instance.debug(context ?? {}, msg),
    info: (msg, context) => instance.info(context ?? {}, msg),
    warn: (msg, context) => instance.warn(context ?? {}, msg),
    error: (msg, context) => instance.error(context ?? {}, msg),
    fatal: (msg, context) => instance.fatal(context ?? {}, msg),
    child: (bindings) => fromPino(instance.child(bindings)),
  };
}

/** Create a structured pino logger instance. */
export function createLogger(options?: CreateLoggerOptions): Logger {
  const destination = options?.destination;
  const pinoOptions: pino.LoggerOptions = {
    name: options?.name ?? 'error-adapter',
    level: options?.level ?? process.env['LOG_LEVEL'] ?? 'info',
    transport:
      destination === undefined && process.env['NODE_ENV'] === 'development'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        'apiKey',
        'authorization',
        'password',
        'secret',
        '*.apiKey',
        '*.password',
        '*.authorization',
      ],
      censor: '[REDACTED]',
    },
  };

  return fromPino(destination === undefined ? pino(pinoOptions) : pino(pinoOptions, destination));
}
