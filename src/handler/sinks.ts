/**
 * LogSink implementations.
 *
 * The console sink is the plain stdout format; the logger sink is what
 * production wiring uses; the composite sink fans a record out to several
 * collaborators (e.g. structured logs plus a crash-analytics client).
 */
import type { Logger } from '@/observability/logger.js';
import type { FailureRecord, LogSink } from './types.js';

// ─── Console ────────────────────────────────────────────────────

/** Format a record as the single stdout line written by the console sink. */
export function formatFailureLine(failure: FailureRecord): string {
  const frames = failure.stackTrace ?? [];
  return `Error: ${failure.description} \n Stack Symbols: [${frames.join(', ')}]`;
}

/** Sink that writes one line per failure to stdout (or `write`). */
export function createConsoleSink(
  write: (line: string) => void = (line) => {
    process.stdout.write(`${line}\n`);
  },
): LogSink {
  return {
    record(failure) {
      write(formatFailureLine(failure));
    },
  };
}

// ─── Logger ─────────────────────────────────────────────────────

export interface LoggerSinkOptions {
  /** Prefix of the log message. Defaults to "Suppressed failure". */
  message?: string;
}

/** Sink that emits one `logger.error` entry per failure. */
export function createLoggerSink(logger: Logger, options?: LoggerSinkOptions): LogSink {
  const message = options?.message ?? 'Suppressed failure';

  return {
    record(failure) {
      logger.error(`${message}: ${failure.description}`, {
        component: 'error-handler',
        description: failure.description,
        stackTrace: failure.stackTrace,
        occurredAt: failure.occurredAt.toISOString(),
        ...(failure.error instanceof Error ? { err: failure.error } : {}),
      });
    },
  };
}

// ─── Composite ──────────────────────────────────────────────────

/** Forward each record to every sink, in order. */
export function createCompositeSink(sinks: readonly LogSink[]): LogSink {
  return {
    record(failure) {
      for (const sink of sinks) {
        sink.record(failure);
      }
    },
  };
}
