/**
 * ErrorHandler — the swallow-and-log adapter.
 *
 * Every failure is downgraded to "absent value + one sink emission".
 * There is no retry, no classification and no rethrow path; callers that
 * need to tell a failure from a legitimate `undefined` use `attempt`.
 */
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { captureCallStack } from './diagnostics.js';
import { createFailureRecord } from './failure-record.js';
import { createConsoleSink } from './sinks.js';
import type {
  AsyncOperation,
  ErrorHandler,
  ErrorHandlerOptions,
  FailureRecord,
  Operation,
  StackBoundary,
} from './types.js';

// ─── Factory ────────────────────────────────────────────────────

/** Create an ErrorHandler writing to the given sink (stdout by default). */
export function createErrorHandler(options?: ErrorHandlerOptions): ErrorHandler {
  const sink = options?.sink ?? createConsoleSink();
  const diagnostics = options?.diagnostics ?? captureCallStack;
  const now = options?.now ?? ((): Date => new Date());

  const toRecord = (error: unknown, boundary: StackBoundary): FailureRecord =>
    createFailureRecord(error, diagnostics, now, boundary);

  const record = (error: unknown, boundary: StackBoundary): void => {
    sink.record(toRecord(error, boundary));
  };

  // Each entry point passes itself as the stack boundary, so traces start
  // at the caller rather than inside the handler.

  function wrap<T>(operation: Operation<T>): T | undefined {
    try {
      return operation();
    } catch (error) {
      record(error, wrap);
      return undefined;
    }
  }

  async function wrapAsync<T>(operation: AsyncOperation<T>): Promise<T | undefined> {
    try {
      return await operation();
    } catch (error) {
      record(error, wrapAsync);
      return undefined;
    }
  }

  function attempt<T>(operation: () => T): Result<T, FailureRecord> {
    try {
      return ok(operation());
    } catch (error) {
      return err(toRecord(error, attempt));
    }
  }

  function logError(error: unknown): void {
    record(error, logError);
  }

  return { wrap, wrapAsync, attempt, logError };
}
