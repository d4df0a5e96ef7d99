import { isCircuitBreakerFailure } from '../classifier';
import type { CircuitState, PipelineOutcome } from '../types';
import { rejected, type ResilienceStage, type StageContext, type StageHandler } from './stage';

export interface CircuitBreakerOptions {
  minimumThroughput: number;
  failureRatio: number;
  samplingDurationMs: number;
  breakDurationMs: number;
}

interface Sample {
  at: number;
  failure: boolean;
}

/**
 * Rolling-window breaker owned by one pipeline instance.
 *
 * closed: every finished call is sampled; the circuit opens once the window holds at least
 * `minimumThroughput` samples and the failure ratio reaches `failureRatio`.
 * open: calls are rejected without running the inner stages until `breakDurationMs` passes.
 * halfOpen: one trial call is let through; success closes and clears the window, failure reopens.
 * A trial call that ends in cancellation or a pipeline rejection is abandoned and the next call
 * may take its place.
 */
export class CircuitBreakerStage implements ResilienceStage {
  readonly name = 'circuitBreaker';

  private state: CircuitState = 'closed';
  private samples: Sample[] = [];
  private openedAt = 0;
  private trialInFlight = false;

  constructor(
    private readonly options: CircuitBreakerOptions,
    private readonly now: () => number,
  ) {}

  get circuitState(): CircuitState {
    this.advance(this.now());
    return this.state;
  }

  async execute<T>(ctx: StageContext, next: StageHandler<T>): Promise<PipelineOutcome<T>> {
    const startedAt = this.now();
    if (this.advance(startedAt)) {
      ctx.logger.info('http.circuit.half_open', { ...ctx.meta });
    }

    if (this.state === 'open') {
      const retryAfterMs = Math.max(0, this.openedAt + this.options.breakDurationMs - startedAt);
      ctx.logger.warn('http.circuit.rejected', { ...ctx.meta, state: 'open', retryAfterMs });
      return rejected('circuit_open', retryAfterMs);
    }

    if (this.state === 'halfOpen') {
      if (this.trialInFlight) {
        ctx.logger.warn('http.circuit.rejected', { ...ctx.meta, state: 'halfOpen' });
        return rejected('circuit_open', 0);
      }
      this.trialInFlight = true;
      const outcome = await next(ctx).finally(() => {
        this.trialInFlight = false;
      });
      this.onTrialFinished(ctx, outcome);
      return outcome;
    }

    const outcome = await next(ctx);
    this.onClosedCallFinished(ctx, outcome);
    return outcome;
  }

  private onTrialFinished(ctx: StageContext, outcome: PipelineOutcome<unknown>): void {
    if (ctx.signal.aborted || outcome.kind === 'rejected' || this.state !== 'halfOpen') {
      return;
    }
    if (isCircuitBreakerFailure(outcome)) {
      this.open(ctx, 'trial_failed');
      return;
    }
    this.state = 'closed';
    this.samples = [];
    ctx.logger.info('http.circuit.closed', { ...ctx.meta });
  }

  private onClosedCallFinished(ctx: StageContext, outcome: PipelineOutcome<unknown>): void {
    if (outcome.kind === 'rejected' || this.state !== 'closed') {
      return;
    }
    const at = this.now();
    this.prune(at);
    this.samples.push({ at, failure: isCircuitBreakerFailure(outcome) });

    if (this.samples.length < this.options.minimumThroughput) {
      return;
    }
    const failures = this.samples.filter((sample) => sample.failure).length;
    if (failures / this.samples.length >= this.options.failureRatio) {
      this.open(ctx, 'failure_ratio');
    }
  }

  private open(ctx: StageContext, reason: string): void {
    this.state = 'open';
    this.openedAt = this.now();
    this.samples = [];
    ctx.logger.error('http.circuit.opened', {
      ...ctx.meta,
      reason,
      breakDurationMs: this.options.breakDurationMs,
    });
  }

  /** Moves open to halfOpen once the break has elapsed; true when that transition happened. */
  private advance(now: number): boolean {
    if (this.state === 'open' && now - this.openedAt >= this.options.breakDurationMs) {
      this.state = 'halfOpen';
      this.trialInFlight = false;
      return true;
    }
    return false;
  }

  private prune(now: number): void {
    const cutoff = now - this.options.samplingDurationMs;
    if (this.samples.length > 0 && this.samples[0].at <= cutoff) {
      this.samples = this.samples.filter((sample) => sample.at > cutoff);
    }
  }
}
