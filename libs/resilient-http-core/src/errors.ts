import type { ZodError } from 'zod';

import type {
  ApiError,
  ApplicationFailureOutcome,
  FailureOutcome,
  HttpHeaders,
  PipelineOutcome,
  RejectedOutcome,
  TransportFailureOutcome,
} from './types';

/** Base class for every error derived from a pipeline outcome. */
export class ResilientHttpError extends Error {
  readonly outcome: FailureOutcome;

  constructor(message: string, outcome: FailureOutcome, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResilientHttpError';
    this.outcome = outcome;
  }
}

export function formatApiErrors(errors: readonly ApiError[]): string {
  return errors.map((e) => `[${e.code}] ${e.message}`).join(', ');
}

/** The server answered 2xx but the envelope declared `success: false`. */
export class ApiRequestError extends ResilientHttpError {
  readonly errors: ApiError[];
  readonly messages: string[];
  readonly status: number;

  constructor(outcome: ApplicationFailureOutcome) {
    const detail = outcome.errors.length > 0 ? formatApiErrors(outcome.errors) : 'no error details';
    super(`API returned a failure response: ${detail}`, outcome);
    this.name = 'ApiRequestError';
    this.errors = outcome.errors;
    this.messages = outcome.messages;
    this.status = outcome.status;
  }
}

export class HttpError extends ResilientHttpError {
  readonly status: number;
  readonly body?: string;
  readonly headers?: HttpHeaders;
  readonly errors: ApiError[];

  constructor(outcome: TransportFailureOutcome & { status: number }) {
    const errors = outcome.errors ?? [];
    const suffix = errors.length > 0 ? `: ${formatApiErrors(errors)}` : '';
    super(`HTTP ${outcome.status}${suffix}`, outcome);
    this.name = 'HttpError';
    this.status = outcome.status;
    this.body = outcome.body;
    this.headers = outcome.headers;
    this.errors = errors;
  }
}

/** Connection-level failure; the request may never have reached the server. */
export class NetworkError extends ResilientHttpError {
  constructor(outcome: TransportFailureOutcome) {
    super(`Network error: ${describeCause(outcome.error)}`, outcome, { cause: outcome.error });
    this.name = 'NetworkError';
  }
}

export class TimeoutError extends ResilientHttpError {
  readonly scope: 'attempt' | 'total';

  constructor(outcome: TransportFailureOutcome | RejectedOutcome, scope: 'attempt' | 'total') {
    super(scope === 'total' ? 'Operation timed out' : 'Request attempt timed out', outcome);
    this.name = 'TimeoutError';
    this.scope = scope;
  }
}

export class MalformedResponseError extends ResilientHttpError {
  readonly status?: number;
  readonly body?: string;

  constructor(outcome: TransportFailureOutcome) {
    super(`Failed to decode API response: ${describeCause(outcome.error)}`, outcome, { cause: outcome.error });
    this.name = 'MalformedResponseError';
    this.status = outcome.status;
    this.body = outcome.body;
  }
}

export class CircuitOpenError extends ResilientHttpError {
  readonly retryAfterMs?: number;

  constructor(outcome: RejectedOutcome) {
    super('Circuit breaker is open; request was not sent', outcome);
    this.name = 'CircuitOpenError';
    this.retryAfterMs = outcome.retryAfterMs;
  }
}

export class RateLimiterRejectedError extends ResilientHttpError {
  constructor(outcome: RejectedOutcome) {
    super('Client is overloaded: concurrency limit and queue are full', outcome);
    this.name = 'RateLimiterRejectedError';
  }
}

export class OperationCancelledError extends ResilientHttpError {
  constructor(outcome: RejectedOutcome = { kind: 'rejected', reason: 'cancelled' }) {
    super('Operation was cancelled', outcome);
    this.name = 'OperationCancelledError';
  }
}

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }

  static fromZod(message: string, error: ZodError): ConfigurationError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    return new ConfigurationError(message, issues);
  }
}

export function outcomeToError(outcome: FailureOutcome): ResilientHttpError {
  if (outcome.kind === 'applicationFailure') {
    return new ApiRequestError(outcome);
  }
  if (outcome.kind === 'transportFailure') {
    return transportFailureToError(outcome);
  }
  return rejectionToError(outcome);
}

function transportFailureToError(outcome: TransportFailureOutcome): ResilientHttpError {
  switch (outcome.reason) {
    case 'attempt_timeout':
      return new TimeoutError(outcome, 'attempt');
    case 'malformed_response':
      return new MalformedResponseError(outcome);
    case 'http_status':
      if (outcome.status !== undefined) {
        return new HttpError({ ...outcome, status: outcome.status });
      }
      return new NetworkError(outcome);
    default:
      return new NetworkError(outcome);
  }
}

function rejectionToError(outcome: RejectedOutcome): ResilientHttpError {
  switch (outcome.reason) {
    case 'circuit_open':
      return new CircuitOpenError(outcome);
    case 'rate_limiter_rejected':
      return new RateLimiterRejectedError(outcome);
    case 'total_timeout':
      return new TimeoutError(outcome, 'total');
    default:
      return new OperationCancelledError(outcome);
  }
}

/** Returns the success value or throws the error matching the failure. */
export function unwrapOutcome<T>(outcome: PipelineOutcome<T>): T {
  if (outcome.kind === 'success') {
    return outcome.value;
  }
  throw outcomeToError(outcome);
}

function describeCause(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return 'unknown error';
  return String(error);
}
