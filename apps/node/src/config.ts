/**
 * Configuration
 *
 * Environment variables, parsed once at start. Invalid values stop the
 * process with the list of zod issues.
 */

import { z } from 'zod';
import { TokenSymbolSchema } from '@tokenpulse/core';

const tokenList = z
  .string()
  .transform((value) => value.split(',').map((t) => t.trim()).filter(Boolean))
  .pipe(z.array(TokenSymbolSchema).min(1));

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Cache
  REDIS_URL: z.string().url().optional(),
  CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),

  // Rate limiting
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),

  // Engine
  TRACKED_TOKENS: tokenList.default('PEPE,DOGE,SHIB,BONK,WIF'),
  STREAM_INTERVAL_MS: z.coerce.number().int().min(1000).default(5000),
  SOURCE_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  HISTORY_MAX_ENTRIES: z.coerce.number().int().positive().default(1000),

  // Sources
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  DEXSCREENER_API_URL: z.string().url().default('https://api.dexscreener.com'),
  EXPLORER_API_URL: z.string().url().default('https://api.basescan.org/api'),
  EXPLORER_API_KEY: z.string().default(''),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }
  return parsed.data;
}
