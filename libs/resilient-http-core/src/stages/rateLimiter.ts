import type { QuotaTracker } from '../rateLimitHeaders';
import type { PipelineOutcome } from '../types';
import { rejected, type ResilienceStage, type StageContext, type StageHandler } from './stage';

export interface RateLimiterOptions {
  permitLimit: number;
  queueLimit: number;
  proactiveThrottlingEnabled: boolean;
  quotaLowThreshold: number;
  maxProactiveDelayMs: number;
}

type AcquireResult = 'acquired' | 'rejected' | 'cancelled';

interface Waiter {
  grant(): void;
}

/**
 * Bulkhead with a FIFO wait queue. A released permit is handed straight to the oldest
 * waiter, so a newcomer can never overtake the queue.
 */
export class RateLimiterStage implements ResilienceStage {
  readonly name = 'rateLimiter';

  private active = 0;
  private readonly waiters: Waiter[] = [];

  constructor(
    private readonly options: RateLimiterOptions,
    private readonly quota: QuotaTracker,
  ) {}

  get inFlight(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiters.length;
  }

  async execute<T>(ctx: StageContext, next: StageHandler<T>): Promise<PipelineOutcome<T>> {
    const throttleMs = this.proactiveDelay(ctx.runtime.now());
    if (throttleMs > 0) {
      ctx.logger.info('http.ratelimiter.throttled', { ...ctx.meta, delayMs: throttleMs });
      try {
        await ctx.runtime.sleep(throttleMs, ctx.signal);
      } catch (error) {
        if (!ctx.signal.aborted) throw error;
        return rejected('cancelled');
      }
    }

    const acquired = await this.acquire(ctx);
    if (acquired === 'rejected') {
      ctx.logger.warn('http.ratelimiter.rejected', {
        ...ctx.meta,
        permitLimit: this.options.permitLimit,
        queueLimit: this.options.queueLimit,
      });
      return rejected('rate_limiter_rejected');
    }
    if (acquired === 'cancelled') {
      return rejected('cancelled');
    }

    try {
      return await next(ctx);
    } finally {
      this.release();
    }
  }

  /**
   * Pacing delay derived from the last quota signal. When the remaining share drops below
   * `quotaLowThreshold` the time left in the window is spread over the remaining requests;
   * with nothing left the caller waits for the reset.
   */
  proactiveDelay(now: number): number {
    if (!this.options.proactiveThrottlingEnabled) return 0;
    const signal = this.quota.latest;
    if (!signal || signal.limit <= 0) return 0;
    if (signal.remaining / signal.limit >= this.options.quotaLowThreshold) return 0;

    const untilReset = signal.windowResetAt - now;
    if (untilReset <= 0) return 0;
    const delay = signal.remaining <= 0 ? untilReset : untilReset / (signal.remaining + 1);
    return Math.ceil(Math.min(delay, this.options.maxProactiveDelayMs));
  }

  private acquire(ctx: StageContext): Promise<AcquireResult> | AcquireResult {
    if (ctx.signal.aborted) return 'cancelled';
    if (this.active < this.options.permitLimit && this.waiters.length === 0) {
      this.active += 1;
      return 'acquired';
    }
    if (this.waiters.length >= this.options.queueLimit) {
      return 'rejected';
    }

    ctx.logger.debug('http.ratelimiter.queued', { ...ctx.meta, queued: this.waiters.length + 1 });
    const { signal } = ctx;
    return new Promise<AcquireResult>((resolve) => {
      const waiter: Waiter = {
        grant: () => {
          signal.removeEventListener('abort', onAbort);
          resolve('acquired');
        },
      };
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        resolve('cancelled');
      };
      this.waiters.push(waiter);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  private release(): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.grant();
      return;
    }
    this.active -= 1;
  }
}
