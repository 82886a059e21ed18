/**
 * Response envelope helpers shared by the route modules
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { InvalidInputError } from '@tokenpulse/core';
import type { ErrorCode } from '@tokenpulse/core';

export interface ErrorBody {
  success: false;
  error: { code: string; message: string; [key: string]: unknown };
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  INVALID_INPUT: 400,
  RATE_LIMITED: 429,
  SOURCE_UNAVAILABLE: 503,
  CACHE_UNAVAILABLE: 503,
  INTERNAL_ERROR: 500,
};

export function statusFor(code: ErrorCode): number {
  return STATUS_BY_CODE[code];
}

/**
 * Validate request input; the first issue becomes the INVALID_INPUT message
 */
export function parseInput<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join('.') || what}: ${issue.message}` : 'invalid value';
    throw new InvalidInputError(`Invalid ${what} (${detail})`);
  }
  return parsed.data;
}
