/**
 * Result type
 *
 * Distinguishes a computed value, a documented fallback value and a failure.
 */

import type { TokenPulseError } from './errors.js';

export type Result<T, E extends TokenPulseError = TokenPulseError> =
  | { ok: true; value: T; fallback?: undefined }
  | { ok: true; value: T; fallback: E }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * A usable value produced in place of a failed computation
 */
export function fallback<T, E extends TokenPulseError>(value: T, reason: E): Result<T, E> {
  return { ok: true, value, fallback: reason };
}

export function err<E extends TokenPulseError>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function isFallback<T, E extends TokenPulseError>(
  result: Result<T, E>
): result is { ok: true; value: T; fallback: E } {
  return result.ok && result.fallback !== undefined;
}
