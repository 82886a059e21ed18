/**
 * @tokenpulse/core
 * Shared records, schemas and error types for TokenPulse
 */

export * from './types.js';
export * from './errors.js';
export * from './result.js';
export * from './schemas.js';
