/**
 * Shared test doubles for the error handler and its collaborators.
 */
import { vi } from 'vitest';
import type { Logger } from '@/observability/logger.js';
import type { FailureRecord, LogSink } from '@/handler/types.js';

/** Logger whose methods are all spies. */
export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn().mockReturnThis(),
  };
}

/** Sink that keeps every record it receives, in order. */
export function createRecordingSink(): LogSink & { records: FailureRecord[] } {
  const records: FailureRecord[] = [];
  return {
    records,
    record(failure) {
      records.push(failure);
    },
  };
}

/** Fixed clock for deterministic `occurredAt` values. */
export const FIXED_NOW = new Date('2024-03-01T12:00:00.000Z');

export function fixedClock(): Date {
  return FIXED_NOW;
}
