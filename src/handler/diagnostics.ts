/**
 * Diagnostic-context providers for FailureRecords.
 */
import type { DiagnosticContextProvider, StackBoundary } from './types.js';

function framesFrom(stack: string | undefined): string[] {
  if (stack === undefined) return [];
  return stack
    .split('\n')
    .slice(1)
    .map((frame) => frame.trim())
    .filter((frame) => frame.length > 0);
}

function capture(boundary: StackBoundary): string[] {
  const holder = new Error();
  Error.captureStackTrace(holder, boundary);
  return framesFrom(holder.stack);
}

/**
 * Snapshot of the current call stack, one trimmed frame per entry.
 *
 * Frames from `boundary` inward are omitted, so the trace starts at the
 * caller of the adapter entry point. When `boundary` is not on the
 * synchronous stack (after an `await`), the trace starts at the caller of
 * this provider instead.
 */
export const captureCallStack: DiagnosticContextProvider = (boundary) => {
  if (boundary !== undefined) {
    const frames = capture(boundary);
    if (frames.length > 0) return frames;
  }
  return capture(captureCallStack);
};

/** Provider used when stack capture is turned off. */
export const noDiagnostics: DiagnosticContextProvider = () => undefined;
