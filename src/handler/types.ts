import type { Result } from '@/core/result.js';

// ─── Operations ─────────────────────────────────────────────────

/** A deferred, argument-less computation that may throw instead of returning. */
export type Operation<T> = () => T | undefined;

/** Asynchronous counterpart of {@link Operation}. */
export type AsyncOperation<T> = () => Promise<T | undefined>;

// ─── Failures ───────────────────────────────────────────────────

/** The thrown value plus the diagnostic context captured when it was caught. */
export interface FailureRecord {
  readonly error: unknown;
  readonly description: string;
  readonly stackTrace?: readonly string[];
  readonly occurredAt: Date;
}

/** Destination for suppressed failures: console, structured logs, crash analytics. */
export interface LogSink {
  record(failure: FailureRecord): void;
}

/** Function whose frame, and every frame it called, is left out of a trace. */
export type StackBoundary = (...args: never[]) => unknown;

/** Supplies the diagnostic snapshot attached to each FailureRecord. */
export type DiagnosticContextProvider = (
  boundary?: StackBoundary,
) => readonly string[] | undefined;

// ─── Handler ────────────────────────────────────────────────────

export interface ErrorHandlerOptions {
  /** Defaults to the console sink. */
  sink?: LogSink;
  /** Defaults to capturing the current call stack. */
  diagnostics?: DiagnosticContextProvider;
  now?: () => Date;
}

/** Adapter between fallible operations and optional results. */
export interface ErrorHandler {
  /**
   * Run `operation` once. Returns its result, or `undefined` after logging
   * if it throws. A legitimately absent result and a suppressed failure
   * look the same to the caller.
   */
  wrap<T>(operation: Operation<T>): T | undefined;
  /** Same contract as `wrap`, awaiting the operation. Never rejects. */
  wrapAsync<T>(operation: AsyncOperation<T>): Promise<T | undefined>;
  /** Run `operation` once and report the outcome as a Result. Logs nothing. */
  attempt<T>(operation: () => T): Result<T, FailureRecord>;
  /** Record a failure caught elsewhere through this handler's sink. */
  logError(error: unknown): void;
}
