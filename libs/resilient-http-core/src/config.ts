import { z } from 'zod';

import { ConfigurationError } from './errors';

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();
/** Node timers fire after 1 ms for any delay above 2^31 - 1. */
const timerMs = positiveInt.max(2_147_483_647);

export const resilienceOptionsSchema = z
  .object({
    /** Concurrent calls admitted by the bulkhead. */
    permitLimit: positiveInt.default(10),
    /** Callers allowed to wait for a permit; 0 rejects as soon as all permits are taken. */
    queueLimit: nonNegativeInt.default(100),
    /** Retries after the initial attempt; 0 disables the retry stage. */
    maxRetries: nonNegativeInt.default(2),
    baseDelayMs: nonNegativeInt.default(1_000),
    maxDelayMs: nonNegativeInt.default(30_000),
    jitterRange: z.tuple([z.number().nonnegative(), z.number().nonnegative()]).default([0.8, 1.2]),
    attemptTimeoutMs: timerMs.default(30_000),
    totalTimeoutMs: timerMs.default(60_000),
    circuitBreakerMinimumThroughput: positiveInt.default(100),
    circuitBreakerFailureRatio: z.number().gt(0).max(1).default(0.1),
    circuitBreakerSamplingDurationMs: positiveInt.default(30_000),
    circuitBreakerBreakDurationMs: positiveInt.default(5_000),
    /** Retry HTTP 429 responses (idempotent requests only). */
    rateLimitRetryEnabled: z.boolean().default(false),
    proactiveThrottlingEnabled: z.boolean().default(true),
    /** Fraction of the server quota below which admission is paced. */
    quotaLowThreshold: z.number().min(0).max(1).default(0.1),
    maxProactiveDelayMs: nonNegativeInt.default(10_000),
    maxRetryAfterMs: nonNegativeInt.default(60_000),
  })
  .refine((value) => value.jitterRange[0] <= value.jitterRange[1], {
    message: 'jitterRange must be [min, max] with min <= max',
    path: ['jitterRange'],
  });

export type ResilienceOptions = z.output<typeof resilienceOptionsSchema>;
export type ResilienceOptionsInput = z.input<typeof resilienceOptionsSchema>;

export function resolveResilienceOptions(input: ResilienceOptionsInput = {}): ResilienceOptions {
  const parsed = resilienceOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw ConfigurationError.fromZod('Invalid resilience options', parsed.error);
  }
  return parsed.data;
}

type EnvSource = Record<string, string | undefined>;

const NUMERIC_ENV_KEYS = {
  PERMIT_LIMIT: 'permitLimit',
  QUEUE_LIMIT: 'queueLimit',
  MAX_RETRIES: 'maxRetries',
  BASE_DELAY_MS: 'baseDelayMs',
  MAX_DELAY_MS: 'maxDelayMs',
  ATTEMPT_TIMEOUT_MS: 'attemptTimeoutMs',
  TOTAL_TIMEOUT_MS: 'totalTimeoutMs',
  CB_MINIMUM_THROUGHPUT: 'circuitBreakerMinimumThroughput',
  CB_BREAK_DURATION_MS: 'circuitBreakerBreakDurationMs',
  QUOTA_LOW_THRESHOLD: 'quotaLowThreshold',
} as const;

const BOOLEAN_ENV_KEYS = {
  RATE_LIMIT_RETRY: 'rateLimitRetryEnabled',
  PROACTIVE_THROTTLING: 'proactiveThrottlingEnabled',
} as const;

const envNumber = z.coerce.number().finite();
const envBoolean = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

/**
 * Reads resilience overrides from environment variables named `<prefix>_<KEY>`,
 * e.g. `EDGE_API_MAX_RETRIES=3`. Unset variables are left to the schema defaults.
 */
export function resilienceOptionsFromEnv(env: EnvSource, prefix: string): ResilienceOptionsInput {
  const result: ResilienceOptionsInput = {};
  const issues: string[] = [];

  for (const [suffix, key] of Object.entries(NUMERIC_ENV_KEYS)) {
    const name = `${prefix}_${suffix}`;
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;
    const parsed = envNumber.safeParse(raw);
    if (parsed.success) {
      result[key] = parsed.data;
    } else {
      issues.push(`${name}: expected a number, received "${raw}"`);
    }
  }

  for (const [suffix, key] of Object.entries(BOOLEAN_ENV_KEYS)) {
    const name = `${prefix}_${suffix}`;
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;
    const parsed = envBoolean.safeParse(raw);
    if (parsed.success) {
      result[key] = parsed.data;
    } else {
      issues.push(`${name}: expected a boolean, received "${raw}"`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid resilience environment variables', issues);
  }
  return result;
}
