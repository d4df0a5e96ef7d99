import { setTimeout as sleepFor } from 'timers/promises';

import type { PipelineRuntime } from './types';

/** Wall clock, real timers and `Math.random`. */
export const systemRuntime: PipelineRuntime = {
  now: () => Date.now(),
  sleep: async (ms: number, signal: AbortSignal) => {
    if (ms <= 0) {
      signal.throwIfAborted();
      return;
    }
    await sleepFor(ms, undefined, { signal });
  },
  random: () => Math.random(),
};

/** Resolves once `signal` aborts; `dispose` detaches the listener when no longer needed. */
export function whenAborted(signal: AbortSignal): { promise: Promise<void>; dispose: () => void } {
  let onAbort: (() => void) | undefined;
  const promise = new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    onAbort = () => resolve();
    signal.addEventListener('abort', onAbort, { once: true });
  });
  return {
    promise,
    dispose: () => {
      if (onAbort) signal.removeEventListener('abort', onAbort);
    },
  };
}
