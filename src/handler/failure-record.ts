import type { DiagnosticContextProvider, FailureRecord, StackBoundary } from './types.js';

// String() throws for values with no usable toString/valueOf (null-prototype objects).
function toPrimitiveString(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/**
 * Human-readable description of a thrown value.
 * `Error` → "<name>: <message>", string → itself, anything else → JSON,
 * or `String(value)` when it cannot be serialized. Never throws.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  if (typeof error === 'string') {
    return error;
  }

  let json: string | undefined;
  try {
    json = JSON.stringify(error);
  } catch {
    // circular structures and bigints
    json = undefined;
  }
  return json ?? toPrimitiveString(error);
}

/**
 * Build the record handed to a LogSink for one suppressed failure.
 * `boundary` is forwarded to the diagnostics provider so frames from the
 * entry point inward are left out of the trace.
 */
export function createFailureRecord(
  error: unknown,
  diagnostics: DiagnosticContextProvider,
  now: () => Date = () => new Date(),
  boundary?: StackBoundary,
): FailureRecord {
  const stackTrace = diagnostics(boundary);
  return {
    error,
    description: describeError(error),
    ...(stackTrace === undefined ? {} : { stackTrace }),
    occurredAt: now(),
  };
}
