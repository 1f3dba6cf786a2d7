/**
 * Configuration loader — reads the error handler settings from
 * environment variables and validates them with Zod.
 */
import type { z } from 'zod';

import { ConfigError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import { errorHandlerConfigSchema } from './schema.js';
import type { ErrorHandlerConfig } from './schema.js';

function formatIssues(error: z.ZodError): { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

function parseBoolean(value: string | undefined): boolean | string | undefined {
  if (value === 'true') return true;
  if (value === 'false') return false;
  // left as-is so the schema reports it
  return value;
}

/**
 * Builds the configuration from `ERROR_HANDLER_*` variables and `LOG_LEVEL`.
 * Unset variables fall back to the schema defaults.
 *
 * @returns A Result containing either the validated config or a ConfigError
 */
export function loadErrorHandlerConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Result<ErrorHandlerConfig, ConfigError> {
  const validation = errorHandlerConfigSchema.safeParse({
    sink: env['ERROR_HANDLER_SINK'],
    captureStackTrace: parseBoolean(env['ERROR_HANDLER_CAPTURE_STACK']),
    message: env['ERROR_HANDLER_MESSAGE'],
    logLevel: env['LOG_LEVEL'],
    loggerName: env['ERROR_HANDLER_LOGGER_NAME'],
  });

  if (!validation.success) {
    return err(
      new ConfigError('Configuration validation failed', {
        source: 'env',
        issues: formatIssues(validation.error),
      }),
    );
  }

  return ok(validation.data);
}
