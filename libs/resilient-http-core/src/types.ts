export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'TRACE' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

export type QueryValue = string | number | boolean | undefined;

export type QueryParams = Record<string, QueryValue | QueryValue[]>;

/**
 * One logical request. Immutable: every physical attempt is built from the same descriptor.
 * Idempotency is derived from the verb (see `isIdempotentMethod`), never declared per call.
 */
export interface RequestDescriptor {
  readonly method: HttpMethod;
  /** Relative to the client's baseUrl, or an absolute URL on the baseUrl's origin. */
  readonly path: string;
  readonly query?: Readonly<QueryParams>;
  readonly headers?: Readonly<HttpHeaders>;
  /** Serialized as JSON unless it is a string, Uint8Array or ArrayBuffer. */
  readonly body?: unknown;
  /** Logical name used in logs, e.g. `zones.list`. */
  readonly operation?: string;
}

export interface ApiError {
  code: number;
  message: string;
}

export interface PageInfo {
  type: 'page';
  page: number;
  perPage: number;
  count: number;
  totalCount: number;
  /** 0 means the server did not compute it. */
  totalPages: number;
  /** Some list endpoints return a cursor inside the page-style result_info. */
  cursor?: string | null;
}

export interface CursorInfo {
  type: 'cursor';
  count: number;
  perPage: number;
  /** null when there are no further pages. */
  cursor: string | null;
}

export type PaginationInfo = PageInfo | CursorInfo;

export interface Envelope<T> {
  success: boolean;
  errors: ApiError[];
  messages: string[];
  result: T | null;
  pagination: PaginationInfo | null;
}

// ============================================================================
// Outcomes
// ============================================================================

export interface SuccessOutcome<T> {
  kind: 'success';
  value: T;
  status: number;
  headers: HttpHeaders;
  messages: string[];
  pagination: PaginationInfo | null;
}

/** 2xx response whose envelope declared `success: false`. */
export interface ApplicationFailureOutcome {
  kind: 'applicationFailure';
  errors: ApiError[];
  messages: string[];
  status: number;
  headers: HttpHeaders;
}

export type TransportFailureReason = 'network' | 'http_status' | 'attempt_timeout' | 'malformed_response';

export interface TransportFailureOutcome {
  kind: 'transportFailure';
  reason: TransportFailureReason;
  status?: number;
  error?: unknown;
  headers?: HttpHeaders;
  body?: string;
  /** Envelope errors found in a non-2xx body, when it carried one. */
  errors?: ApiError[];
}

export type RejectionReason = 'circuit_open' | 'rate_limiter_rejected' | 'total_timeout' | 'cancelled';

/** Failures produced by the pipeline itself; never retried. */
export interface RejectedOutcome {
  kind: 'rejected';
  reason: RejectionReason;
  /** For `circuit_open`: time left until the breaker half-opens. */
  retryAfterMs?: number;
}

export type FailureOutcome = ApplicationFailureOutcome | TransportFailureOutcome | RejectedOutcome;

export type PipelineOutcome<T> = SuccessOutcome<T> | FailureOutcome;

// ============================================================================
// Transport
// ============================================================================

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: Uint8Array;
}

export interface RawHttpResponse {
  status: number;
  /** Lower-cased header names. */
  headers: HttpHeaders;
  body: ArrayBuffer;
}

export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

/** Caller-supplied decoder turning one raw response into an outcome. */
export type ResponseDecoder<T> = (response: RawHttpResponse) => PipelineOutcome<T>;

// ============================================================================
// Pipeline state
// ============================================================================

/** Owned by a single in-flight logical operation. */
export interface RetryState {
  attempt: number;
  lastDelayMs: number;
  elapsedMs: number;
}

export type CircuitState = 'closed' | 'open' | 'halfOpen';

export interface QuotaSignal {
  remaining: number;
  limit: number;
  /** Epoch millis at which the server window resets. */
  windowResetAt: number;
}

export interface PipelineRuntime {
  now(): number;
  sleep(ms: number, signal: AbortSignal): Promise<void>;
  /** Uniform in [0, 1). */
  random(): number;
}

// ============================================================================
// Logging
// ============================================================================

export type LoggerMeta = Record<string, unknown> & {
  client?: string;
  operation?: string;
  method?: HttpMethod;
  path?: string;
  attempt?: number;
  status?: number;
  reason?: string;
};

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

// ============================================================================
// Interceptors
// ============================================================================

export interface BeforeSendContext {
  descriptor: RequestDescriptor;
  /** Mutable: interceptors may add or replace headers. */
  request: TransportRequest;
  attempt: number;
  signal: AbortSignal;
}

export interface AfterResponseContext {
  descriptor: RequestDescriptor;
  request: TransportRequest;
  response: RawHttpResponse;
  attempt: number;
}

export interface OnErrorContext {
  descriptor: RequestDescriptor;
  request: TransportRequest;
  error: unknown;
  attempt: number;
}

/**
 * Cross-cutting hooks around every physical attempt (so they run once per retry).
 *
 * - `beforeSend` runs in registration order and may mutate `ctx.request`; throwing fails the attempt.
 * - `afterResponse` and `onError` run in reverse registration order; their own failures are logged
 *   and ignored.
 *
 * Interceptors must not implement their own retry loops.
 */
export interface HttpRequestInterceptor {
  beforeSend?(ctx: BeforeSendContext): Promise<void> | void;
  afterResponse?(ctx: AfterResponseContext): Promise<void> | void;
  onError?(ctx: OnErrorContext): Promise<void> | void;
}
