// Public API
export type {
  AsyncOperation,
  DiagnosticContextProvider,
  ErrorHandler,
  ErrorHandlerOptions,
  FailureRecord,
  LoggerSinkOptions,
  LogSink,
  Operation,
  StackBoundary,
} from './handler/index.js';
export {
  captureCallStack,
  createCompositeSink,
  createConsoleSink,
  createErrorHandler,
  createErrorHandlerFromConfig,
  createFailureRecord,
  createLoggerSink,
  describeError,
  formatFailureLine,
  noDiagnostics,
} from './handler/index.js';

export type { ErrorHandlerConfig } from './config/index.js';
export { errorHandlerConfigSchema, loadErrorHandlerConfigFromEnv } from './config/index.js';

export type { CreateLoggerOptions, LogContext, Logger, LogLevel } from './observability/index.js';
export { createLogger } from './observability/index.js';

export type { Result } from './core/index.js';
export { AdapterError, ConfigError, err, isErr, isOk, ok, toOptional } from './core/index.js';
