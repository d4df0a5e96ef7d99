import { retryAfterFromOutcome, shouldRetry } from '../classifier';
import type { PipelineOutcome, PipelineRuntime, RetryState } from '../types';
import type { ResilienceStage, StageContext, StageHandler } from './stage';

export interface RetryStageOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRange: readonly [number, number];
  maxRetryAfterMs: number;
  rateLimitRetryEnabled: boolean;
}

/** `min(maxDelay, baseDelay * 2^(attempt-1)) * jitter`, jitter uniform in `jitterRange`. */
export function computeBackoffDelay(attempt: number, options: RetryStageOptions, random: () => number): number {
  const exponential = options.baseDelayMs * 2 ** (attempt - 1);
  const capped = Math.min(options.maxDelayMs, exponential);
  const [minJitter, maxJitter] = options.jitterRange;
  const jitter = minJitter + random() * (maxJitter - minJitter);
  return Math.round(capped * jitter);
}

/**
 * Re-issues the wrapped call while the classifier allows it. Attempts are strictly
 * sequential; on exhaustion the last outcome is returned as-is.
 */
export class RetryStage implements ResilienceStage {
  readonly name = 'retry';

  constructor(private readonly options: RetryStageOptions) {}

  get maxAttempts(): number {
    return this.options.maxRetries + 1;
  }

  async execute<T>(ctx: StageContext, next: StageHandler<T>): Promise<PipelineOutcome<T>> {
    const { runtime } = ctx;
    const startedAt = runtime.now();
    const state: RetryState = { attempt: 0, lastDelayMs: 0, elapsedMs: 0 };

    for (;;) {
      state.attempt += 1;
      const outcome = await next({ ...ctx, attempt: state.attempt });
      state.elapsedMs = runtime.now() - startedAt;

      if (ctx.signal.aborted) {
        return outcome;
      }
      if (!shouldRetry(outcome, ctx.descriptor, state.attempt, this.maxAttempts, this.options)) {
        return outcome;
      }

      const delayMs = this.delayFor(state.attempt, outcome, runtime);
      state.lastDelayMs = delayMs;
      ctx.logger.info('http.retry.scheduled', {
        ...ctx.meta,
        attempt: state.attempt,
        maxAttempts: this.maxAttempts,
        delayMs,
        elapsedMs: state.elapsedMs,
        status: outcome.kind === 'transportFailure' ? outcome.status : undefined,
        reason: outcome.kind === 'transportFailure' ? outcome.reason : undefined,
      });

      try {
        await runtime.sleep(delayMs, ctx.signal);
      } catch (error) {
        if (!ctx.signal.aborted) throw error;
        return outcome;
      }
    }
  }

  private delayFor(attempt: number, outcome: PipelineOutcome<unknown>, runtime: PipelineRuntime): number {
    const retryAfter = retryAfterFromOutcome(outcome, runtime.now());
    if (retryAfter !== undefined) {
      return Math.min(retryAfter, this.options.maxRetryAfterMs);
    }
    return computeBackoffDelay(attempt, this.options, runtime.random);
  }
}
