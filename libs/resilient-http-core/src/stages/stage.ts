import type { Logger, LoggerMeta, PipelineOutcome, PipelineRuntime, RejectedOutcome, RequestDescriptor } from '../types';

/** Per-call context threaded through every stage. Stages derive a new one instead of mutating it. */
export interface StageContext {
  readonly descriptor: RequestDescriptor;
  /** The single cancellation signal for this call; stages may narrow it with a child signal. */
  readonly signal: AbortSignal;
  /** 1-based physical attempt; 0 until the retry stage starts the first try. */
  readonly attempt: number;
  readonly runtime: PipelineRuntime;
  readonly logger: Logger;
  readonly meta: LoggerMeta;
}

export type StageHandler<T> = (ctx: StageContext) => Promise<PipelineOutcome<T>>;

export interface ResilienceStage {
  readonly name: string;
  execute<T>(ctx: StageContext, next: StageHandler<T>): Promise<PipelineOutcome<T>>;
}

export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

export function settle<T>(promise: Promise<T>): Promise<Settled<T>> {
  return promise.then(
    (value): Settled<T> => ({ ok: true, value }),
    (error: unknown): Settled<T> => ({ ok: false, error }),
  );
}

export function rejected(reason: RejectedOutcome['reason'], retryAfterMs?: number): RejectedOutcome {
  return retryAfterMs === undefined ? { kind: 'rejected', reason } : { kind: 'rejected', reason, retryAfterMs };
}

/** Links a child controller to `parent`: aborting the parent aborts the child with the same reason. */
export function linkedController(parent: AbortSignal): { controller: AbortController; unlink: () => void } {
  const controller = new AbortController();
  const onAbort = () => controller.abort(parent.reason);
  if (parent.aborted) {
    controller.abort(parent.reason);
  } else {
    parent.addEventListener('abort', onAbort, { once: true });
  }
  return {
    controller,
    unlink: () => parent.removeEventListener('abort', onAbort),
  };
}
