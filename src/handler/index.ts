// Swallow-and-log adapter, sinks and diagnostics
export type {
  AsyncOperation,
  DiagnosticContextProvider,
  ErrorHandler,
  ErrorHandlerOptions,
  FailureRecord,
  LogSink,
  Operation,
  StackBoundary,
} from './types.js';

export { createErrorHandler } from './error-handler.js';
export { createErrorHandlerFromConfig } from './from-config.js';
export { createFailureRecord, describeError } from './failure-record.js';
export { captureCallStack, noDiagnostics } from './diagnostics.js';
export type { LoggerSinkOptions } from './sinks.js';
export {
  createCompositeSink,
  createConsoleSink,
  createLoggerSink,
  formatFailureLine,
} from './sinks.js';
