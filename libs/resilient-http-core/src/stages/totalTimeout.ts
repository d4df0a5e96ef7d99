import { whenAborted } from '../runtime';
import type { PipelineOutcome } from '../types';
import { linkedController, rejected, settle, type ResilienceStage, type StageContext, type StageHandler } from './stage';

/**
 * Outer boundary of one logical call. Expiry aborts whatever is in flight (attempt, backoff wait,
 * queue wait) and wins over any outcome that arrives afterwards. A caller abort ends the call
 * the same way but is reported as `cancelled`.
 */
export class TotalTimeoutStage implements ResilienceStage {
  readonly name = 'totalTimeout';

  constructor(private readonly timeoutMs: number) {}

  async execute<T>(ctx: StageContext, next: StageHandler<T>): Promise<PipelineOutcome<T>> {
    if (ctx.signal.aborted) {
      ctx.logger.info('http.request.cancelled', { ...ctx.meta, reason: 'cancelled_before_start' });
      return rejected('cancelled');
    }

    const { controller, unlink } = linkedController(ctx.signal);
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new Error(`Operation exceeded ${this.timeoutMs}ms`));
    }, this.timeoutMs);
    const aborted = whenAborted(controller.signal);

    try {
      const result = await Promise.race([
        settle(next({ ...ctx, signal: controller.signal })),
        aborted.promise.then(() => undefined),
      ]);

      if (timedOut) {
        ctx.logger.warn('http.timeout.total', { ...ctx.meta, timeoutMs: this.timeoutMs });
        return rejected('total_timeout');
      }
      if (ctx.signal.aborted) {
        ctx.logger.info('http.request.cancelled', { ...ctx.meta, reason: 'cancelled' });
        return rejected('cancelled');
      }
      if (result === undefined) {
        return rejected('cancelled');
      }
      if (!result.ok) {
        throw result.error;
      }
      return result.value;
    } finally {
      clearTimeout(timer);
      aborted.dispose();
      unlink();
    }
  }
}
