// Core module — shared Result type and base errors
export type { Result } from './result.js';
export { ok, err, isOk, isErr, toOptional } from './result.js';

export { AdapterError, ConfigError } from './errors.js';
