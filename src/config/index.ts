// ─── Schemas ────────────────────────────────────────────────────
export type { ErrorHandlerConfig } from './schema.js';
export { errorHandlerConfigSchema, logLevelSchema } from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export { loadErrorHandlerConfigFromEnv } from './loader.js';
