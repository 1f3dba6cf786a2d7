/**
 * Zod schema for validating error handler configuration,
 * whether it comes from a JSON file or the environment.
 */
import { z } from 'zod';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

/**
 * Error handler settings. `message`, `logLevel` and `loggerName` only
 * shape the logger sink; with `sink: 'console'` they are accepted and
 * have no effect.
 */
export const errorHandlerConfigSchema = z.object({
  sink: z.enum(['logger', 'console']).default('logger'),
  captureStackTrace: z.boolean().default(true),
  message: z.string().min(1, 'Message cannot be empty').default('Suppressed failure'),
  logLevel: logLevelSchema.default('info'),
  loggerName: z.string().min(1, 'Logger name cannot be empty').default('error-adapter'),
});

export type ErrorHandlerConfig = z.infer<typeof errorHandlerConfigSchema>;
