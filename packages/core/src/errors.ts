/**
 * Error taxonomy
 *
 * SOURCE_UNAVAILABLE and CACHE_UNAVAILABLE are recovered inside the engine.
 * RATE_LIMITED and INVALID_INPUT reach the caller as explicit rejections.
 */

import type { RateLimitStats } from './types.js';

export type ErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'CACHE_UNAVAILABLE'
  | 'RATE_LIMITED'
  | 'INVALID_INPUT'
  | 'INTERNAL_ERROR';

export class TokenPulseError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }

  toJSON(): { code: ErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}

export class SourceUnavailableError extends TokenPulseError {
  constructor(
    readonly source: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('SOURCE_UNAVAILABLE', `${source}: ${message}`, options);
  }
}

export class TimeoutError extends SourceUnavailableError {
  constructor(source: string, readonly timeoutMs: number) {
    super(source, `timed out after ${timeoutMs}ms`);
  }
}

export class CacheUnavailableError extends TokenPulseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CACHE_UNAVAILABLE', message, options);
  }
}

export class RateLimitExceededError extends TokenPulseError {
  constructor(readonly stats: RateLimitStats) {
    super('RATE_LIMITED', 'Too many requests. Please try again later.');
  }

  override toJSON() {
    return { ...super.toJSON(), ...this.stats };
  }
}

export class InvalidInputError extends TokenPulseError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}

/**
 * Human-readable message for anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
