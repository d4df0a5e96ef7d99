import { resolveResilienceOptions, type ResilienceOptions, type ResilienceOptionsInput } from './config';
import { noopLogger } from './logger';
import { parseQuotaSignal, QuotaTracker } from './rateLimitHeaders';
import { systemRuntime } from './runtime';
import { AttemptTimeoutStage } from './stages/attemptTimeout';
import { CircuitBreakerStage } from './stages/circuitBreaker';
import { RateLimiterStage } from './stages/rateLimiter';
import { RetryStage } from './stages/retry';
import type { ResilienceStage, StageContext, StageHandler } from './stages/stage';
import { TotalTimeoutStage } from './stages/totalTimeout';
import type {
  CircuitState,
  HttpHeaders,
  Logger,
  LoggerMeta,
  PipelineOutcome,
  PipelineRuntime,
  RequestDescriptor,
} from './types';

export interface ResiliencePipelineDeps {
  logger?: Logger;
  runtime?: Partial<PipelineRuntime>;
}

export interface PipelineExecuteOptions {
  signal?: AbortSignal;
  meta?: LoggerMeta;
}

/** One physical attempt: receives the attempt-scoped signal and the 1-based attempt number. */
export type AttemptFn<T> = (ctx: StageContext) => Promise<PipelineOutcome<T>>;

function headersOf(outcome: PipelineOutcome<unknown>): HttpHeaders | undefined {
  return outcome.kind === 'rejected' ? undefined : outcome.headers;
}

/**
 * Composes the resilience stages around a physical attempt, outermost first:
 * total timeout, rate limiter, circuit breaker, retry, attempt timeout.
 *
 * Breaker state, bulkhead counters and the quota signal belong to this instance; two
 * pipelines never share them.
 */
export class ResiliencePipeline {
  readonly options: ResilienceOptions;
  readonly quota = new QuotaTracker();

  private readonly logger: Logger;
  private readonly runtime: PipelineRuntime;
  private readonly totalTimeout: TotalTimeoutStage;
  private readonly rateLimiter: RateLimiterStage;
  private readonly circuitBreaker: CircuitBreakerStage;
  private readonly retry: RetryStage;
  private readonly attemptTimeout: AttemptTimeoutStage;
  private readonly stages: readonly ResilienceStage[];

  constructor(options: ResilienceOptionsInput = {}, deps: ResiliencePipelineDeps = {}) {
    this.options = resolveResilienceOptions(options);
    this.logger = deps.logger ?? noopLogger;
    this.runtime = { ...systemRuntime, ...deps.runtime };

    const o = this.options;
    this.totalTimeout = new TotalTimeoutStage(o.totalTimeoutMs);
    this.rateLimiter = new RateLimiterStage(
      {
        permitLimit: o.permitLimit,
        queueLimit: o.queueLimit,
        proactiveThrottlingEnabled: o.proactiveThrottlingEnabled,
        quotaLowThreshold: o.quotaLowThreshold,
        maxProactiveDelayMs: o.maxProactiveDelayMs,
      },
      this.quota,
    );
    this.circuitBreaker = new CircuitBreakerStage(
      {
        minimumThroughput: o.circuitBreakerMinimumThroughput,
        failureRatio: o.circuitBreakerFailureRatio,
        samplingDurationMs: o.circuitBreakerSamplingDurationMs,
        breakDurationMs: o.circuitBreakerBreakDurationMs,
      },
      () => this.runtime.now(),
    );
    this.retry = new RetryStage({
      maxRetries: o.maxRetries,
      baseDelayMs: o.baseDelayMs,
      maxDelayMs: o.maxDelayMs,
      jitterRange: o.jitterRange,
      maxRetryAfterMs: o.maxRetryAfterMs,
      rateLimitRetryEnabled: o.rateLimitRetryEnabled,
    });
    this.attemptTimeout = new AttemptTimeoutStage(o.attemptTimeoutMs);
    this.stages = [this.totalTimeout, this.rateLimiter, this.circuitBreaker, this.retry, this.attemptTimeout];
  }

  get circuitState(): CircuitState {
    return this.circuitBreaker.circuitState;
  }

  get rateLimiterStats(): { inFlight: number; queued: number } {
    return { inFlight: this.rateLimiter.inFlight, queued: this.rateLimiter.queued };
  }

  /** Runs one logical operation. Never rejects for an expected failure; see `PipelineOutcome`. */
  execute<T>(
    descriptor: RequestDescriptor,
    attempt: AttemptFn<T>,
    options: PipelineExecuteOptions = {},
  ): Promise<PipelineOutcome<T>> {
    const innermost: StageHandler<T> = async (ctx) => {
      const outcome = await attempt(ctx);
      this.quota.record(parseQuotaSignal(headersOf(outcome), this.runtime.now()));
      return outcome;
    };
    const handler = this.stages.reduceRight<StageHandler<T>>(
      (next, stage) => (ctx) => stage.execute(ctx, next),
      innermost,
    );

    return handler({
      descriptor,
      signal: options.signal ?? new AbortController().signal,
      attempt: 0,
      runtime: this.runtime,
      logger: this.logger,
      meta: {
        operation: descriptor.operation,
        method: descriptor.method,
        path: descriptor.path,
        ...options.meta,
      },
    });
  }
}
