import type { HttpMethod, PipelineOutcome, RequestDescriptor } from './types';

export type ErrorCategory =
  | 'auth'
  | 'not_found'
  | 'validation'
  | 'quota'
  | 'rate_limit'
  | 'timeout'
  | 'transient'
  | 'network'
  | 'unknown';

const IDEMPOTENT_METHODS = new Set<HttpMethod>(['GET', 'HEAD', 'OPTIONS', 'TRACE', 'PUT', 'DELETE']);

export function isIdempotentMethod(method: HttpMethod): boolean {
  return IDEMPOTENT_METHODS.has(method);
}

export const statusToCategory = (status: number): ErrorCategory => {
  if (status === 401 || status === 403) return 'auth';
  if (status === 404) return 'not_found';
  if (status === 400 || status === 422) return 'validation';
  if (status === 402) return 'quota';
  if (status === 429) return 'rate_limit';
  if (status === 408) return 'timeout';
  if (status >= 500) return 'transient';
  if (status === 0) return 'network';
  return 'unknown';
};

export interface RetryDecisionOptions {
  rateLimitRetryEnabled: boolean;
}

/**
 * Decides whether the outcome of attempt `attempt` (1-based) may be retried.
 * Rules apply in order; the first that matches wins.
 */
export function shouldRetry(
  outcome: PipelineOutcome<unknown>,
  descriptor: RequestDescriptor,
  attempt: number,
  maxAttempts: number,
  options: RetryDecisionOptions,
): boolean {
  if (attempt >= maxAttempts) return false;
  if (!isIdempotentMethod(descriptor.method)) return false;
  if (outcome.kind !== 'transportFailure') return false;

  switch (outcome.reason) {
    case 'network':
    case 'attempt_timeout':
      return true;
    case 'http_status': {
      const status = outcome.status ?? 0;
      if (status === 408 || status >= 500) return true;
      if (status === 429) return options.rateLimitRetryEnabled;
      return false;
    }
    default:
      return false;
  }
}

/** Whether the outcome counts against the upstream's health. */
export function isCircuitBreakerFailure(outcome: PipelineOutcome<unknown>): boolean {
  if (outcome.kind !== 'transportFailure') return false;
  switch (outcome.reason) {
    case 'network':
    case 'attempt_timeout':
      return true;
    case 'http_status': {
      const status = outcome.status ?? 0;
      return status >= 500 || status === 408 || status === 429;
    }
    default:
      return false;
  }
}

export const parseRetryAfter = (value: string | undefined, now: number = Date.now()): number | undefined => {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (trimmed === '') return undefined;
  const seconds = Number(trimmed);
  if (!Number.isNaN(seconds)) {
    return seconds >= 0 && Number.isFinite(seconds) ? seconds * 1000 : undefined;
  }
  const date = Date.parse(trimmed);
  if (!Number.isNaN(date)) {
    const diff = date - now;
    return diff > 0 ? diff : undefined;
  }
  return undefined;
};

/** Server-supplied wait for 429 and 503 responses carrying `Retry-After`. */
export function retryAfterFromOutcome(outcome: PipelineOutcome<unknown>, now?: number): number | undefined {
  if (outcome.kind !== 'transportFailure' || outcome.reason !== 'http_status') return undefined;
  if (outcome.status !== 429 && outcome.status !== 503) return undefined;
  return parseRetryAfter(outcome.headers?.['retry-after'], now);
}
