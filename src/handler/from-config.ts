import type { ErrorHandlerConfig } from '@/config/schema.js';
import { createLogger } from '@/observability/logger.js';
import type { Logger } from '@/observability/logger.js';
import { captureCallStack, noDiagnostics } from './diagnostics.js';
import { createErrorHandler } from './error-handler.js';
import { createConsoleSink, createLoggerSink } from './sinks.js';
import type { ErrorHandler } from './types.js';

/**
 * Build an ErrorHandler from validated configuration.
 * A logger is created from `logLevel`/`loggerName` unless one is passed in.
 * The console sink ignores `message`, `logLevel` and `loggerName`.
 */
export function createErrorHandlerFromConfig(
  config: ErrorHandlerConfig,
  logger?: Logger,
): ErrorHandler {
  const sink =
    config.sink === 'console'
      ? createConsoleSink()
      : createLoggerSink(logger ?? createLogger({ level: config.logLevel, name: config.loggerName }), {
          message: config.message,
        });

  return createErrorHandler({
    sink,
    diagnostics: config.captureStackTrace ? captureCallStack : noDiagnostics,
  });
}
