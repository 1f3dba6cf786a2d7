import { describe, expect, it } from 'vitest';
import { err, isErr, isOk, ok, toOptional } from './result.js';
import { AdapterError, ConfigError } from './errors.js';

describe('Result', () => {
  it('narrows with isOk and isErr', () => {
    const success = ok(5);
    const failure = err(new ConfigError('bad'));

    expect(isOk(success)).toBe(true);
    expect(isErr(success)).toBe(false);
    expect(isOk(failure)).toBe(false);
    expect(isErr(failure)).toBe(true);
  });

  it('collapses to an optional value with toOptional', () => {
    expect(toOptional(ok('hello'))).toBe('hello');
    expect(toOptional(err('file not found'))).toBeUndefined();
  });
});

describe('ConfigError', () => {
  it('carries the config error code and context', () => {
    const error = new ConfigError('Missing sink', { filePath: '/config.json' });

    expect(error).toBeInstanceOf(AdapterError);
    expect(error.name).toBe('ConfigError');
    expect(error.code).toBe('CONFIG_ERROR');
    expect(error.context).toEqual({ filePath: '/config.json' });
    expect(error.isOperational).toBe(true);
  });
});

describe('AdapterError', () => {
  it('keeps the cause', () => {
    const cause = new Error('root');
    const error = new AdapterError({ message: 'wrapped', code: 'WRAPPED', cause, isOperational: false });

    expect(error.cause).toBe(cause);
    expect(error.isOperational).toBe(false);
    expect(error.message).toBe('wrapped');
  });
});
