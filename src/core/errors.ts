/**
 * Base error class for all error-adapter errors.
 * Extends Error with a machine-readable code and structured context.
 */
export class AdapterError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    cause?: unknown;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'AdapterError';
    this.code = params.code;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Thrown (or returned in a Result) when configuration loading or validation fails. */
export class ConfigError extends AdapterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      context,
    });
    this.name = 'ConfigError';
  }
}
