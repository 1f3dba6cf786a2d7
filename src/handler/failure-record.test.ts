import { describe, expect, it, vi } from 'vitest';
import { createFailureRecord, describeError } from './failure-record.js';
import { FIXED_NOW, fixedClock } from '@/testing/fixtures/handler.js';

describe('describeError', () => {
  it('uses name and message for Error instances', () => {
    expect(describeError(new Error('file not found'))).toBe('Error: file not found');
    expect(describeError(new SyntaxError('unexpected token'))).toBe(
      'SyntaxError: unexpected token',
    );
  });

  it('keeps custom error names', () => {
    class DiskFullError extends Error {
      constructor() {
        super('no space left');
        this.name = 'DiskFullError';
      }
    }
    expect(describeError(new DiskFullError())).toBe('DiskFullError: no space left');
  });

  it('returns thrown strings as-is', () => {
    expect(describeError('file not found')).toBe('file not found');
  });

  it('serializes plain values as JSON', () => {
    expect(describeError({ status: 404 })).toBe('{"status":404}');
    expect(describeError(7)).toBe('7');
    expect(describeError(null)).toBe('null');
  });

  it('falls back to String() when JSON cannot represent the value', () => {
    const circular: Record<string, unknown> = {};
    circular['self'] = circular;

    expect(describeError(circular)).toBe('[object Object]');
    expect(describeError(10n)).toBe('10');
    expect(describeError(undefined)).toBe('undefined');
  });

  it('does not throw for circular objects without a prototype', () => {
    const bare: Record<string, unknown> = Object.create(null);
    bare['self'] = bare;

    expect(describeError(bare)).toBe('[object Object]');
  });

  it('does not throw when the value refuses conversion to a primitive', () => {
    const hostile: Record<string, unknown> = {
      toString(): string {
        throw new Error('no string form');
      },
    };
    hostile['self'] = hostile;

    expect(describeError(hostile)).toBe('[object Object]');
  });
});

describe('createFailureRecord', () => {
  it('combines the error, its description, the diagnostics and the clock', () => {
    const error = new Error('boom');

    const record = createFailureRecord(error, () => ['at a', 'at b'], fixedClock);

    expect(record).toEqual({
      error,
      description: 'Error: boom',
      stackTrace: ['at a', 'at b'],
      occurredAt: FIXED_NOW,
    });
  });

  it('hands the boundary to the diagnostics provider', () => {
    const diagnostics = vi.fn(() => ['at caller']);
    function boundary(): void {}

    createFailureRecord(new Error('boom'), diagnostics, fixedClock, boundary);

    expect(diagnostics).toHaveBeenCalledWith(boundary);
  });

  it('leaves out stackTrace when the provider returns undefined', () => {
    const record = createFailureRecord('boom', () => undefined, fixedClock);

    expect(record).toEqual({ error: 'boom', description: 'boom', occurredAt: FIXED_NOW });
    expect('stackTrace' in record).toBe(false);
  });
});
