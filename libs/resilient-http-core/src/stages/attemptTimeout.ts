import { whenAborted } from '../runtime';
import type { PipelineOutcome } from '../types';
import { linkedController, rejected, settle, type ResilienceStage, type StageContext, type StageHandler } from './stage';

export class AttemptTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Attempt exceeded ${timeoutMs}ms`);
    this.name = 'AttemptTimeoutError';
  }
}

/** Bounds one physical attempt. Expiry aborts only this attempt and yields a retryable `attempt_timeout`. */
export class AttemptTimeoutStage implements ResilienceStage {
  readonly name = 'attemptTimeout';

  constructor(private readonly timeoutMs: number) {}

  async execute<T>(ctx: StageContext, next: StageHandler<T>): Promise<PipelineOutcome<T>> {
    if (ctx.signal.aborted) {
      return rejected('cancelled');
    }

    const { controller, unlink } = linkedController(ctx.signal);
    const timeoutError = new AttemptTimeoutError(this.timeoutMs);
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(timeoutError);
    }, this.timeoutMs);
    const aborted = whenAborted(controller.signal);

    try {
      const result = await Promise.race([
        settle(next({ ...ctx, signal: controller.signal })),
        aborted.promise.then(() => undefined),
      ]);

      if (ctx.signal.aborted) {
        return rejected('cancelled');
      }
      if (timedOut) {
        ctx.logger.warn('http.timeout.attempt', { ...ctx.meta, attempt: ctx.attempt, timeoutMs: this.timeoutMs });
        return { kind: 'transportFailure', reason: 'attempt_timeout', error: timeoutError };
      }
      if (result === undefined) {
        return rejected('cancelled');
      }
      if (!result.ok) {
        return { kind: 'transportFailure', reason: 'network', error: result.error };
      }
      return result.value;
    } finally {
      clearTimeout(timer);
      aborted.dispose();
      unlink();
    }
  }
}
