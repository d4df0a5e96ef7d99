import type { HttpHeaders, QuotaSignal } from './types';

const getNumber = (value?: string): number | undefined => {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (trimmed === '') return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
};

/**
 * Reset values are delta-seconds, except that a value larger than the current epoch
 * seconds is taken as an absolute epoch timestamp.
 */
const parseReset = (value: string | undefined, now: number): number | undefined => {
  const numeric = getNumber(value);
  if (numeric === undefined || numeric < 0) return undefined;
  if (numeric > now / 1000) {
    return numeric * 1000;
  }
  return now + numeric * 1000;
};

/** Reads `key=value` parameters of a structured field such as `"default";r=50;t=30`. */
function structuredParams(value: string): Map<string, string> {
  const params = new Map<string, string>();
  const firstItem = value.split(',')[0] ?? '';
  for (const part of firstItem.split(';').slice(1)) {
    const [key, raw] = part.split('=');
    if (key !== undefined && raw !== undefined) {
      params.set(key.trim().toLowerCase(), raw.trim());
    }
  }
  return params;
}

function fromStructured(headers: HttpHeaders, now: number): QuotaSignal | undefined {
  const header = headers['ratelimit'];
  const policy = headers['ratelimit-policy'];
  if (header === undefined || policy === undefined) return undefined;

  const state = structuredParams(header);
  const quota = structuredParams(policy);
  const remaining = getNumber(state.get('r'));
  const limit = getNumber(quota.get('q'));
  const resetAt = parseReset(state.get('t') ?? quota.get('w'), now);
  if (remaining === undefined || limit === undefined || resetAt === undefined) return undefined;
  return { remaining, limit, windowResetAt: resetAt };
}

function fromFields(headers: HttpHeaders, prefix: string, now: number): QuotaSignal | undefined {
  const limit = getNumber(headers[`${prefix}limit`]);
  const remaining = getNumber(headers[`${prefix}remaining`]);
  const resetAt = parseReset(headers[`${prefix}reset`], now);
  if (limit === undefined || remaining === undefined || resetAt === undefined) return undefined;
  return { remaining, limit, windowResetAt: resetAt };
}

/**
 * Extracts the server's advertised quota from response headers (lower-cased names).
 * Returns `undefined` when no complete, parseable signal is present.
 */
export function parseQuotaSignal(headers: HttpHeaders | undefined, now: number = Date.now()): QuotaSignal | undefined {
  if (!headers) return undefined;
  const signal =
    fromStructured(headers, now) ?? fromFields(headers, 'ratelimit-', now) ?? fromFields(headers, 'x-ratelimit-', now);
  if (!signal || signal.limit <= 0 || signal.remaining < 0) return undefined;
  return signal;
}

/** Last-write-wins holder for the most recent quota signal of one pipeline. */
export class QuotaTracker {
  private current?: QuotaSignal;

  record(signal: QuotaSignal | undefined): void {
    if (signal) {
      this.current = signal;
    }
  }

  get latest(): QuotaSignal | undefined {
    return this.current;
  }
}
