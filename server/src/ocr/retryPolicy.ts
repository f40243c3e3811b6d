import type { OcrFailure, RetryState } from './types';

/**
 * Waits `ms`, resolving early (never rejecting) when `signal` aborts.
 * Injected into the orchestrator so tests don't depend on real time.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const realSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) return resolve();
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/** Delay before retry number `retry` (1-based): initial, 2x initial, 4x initial, ... */
export function backoffDelayMs(retry: number, initialMs: number): number {
  return initialMs * 2 ** Math.max(0, retry - 1);
}

export function createRetryState(maxAttempts: number): RetryState {
  return { attempt: 0, maxAttempts: Math.max(1, Math.trunc(maxAttempts)), lastError: null };
}

export function canRetry(state: RetryState, failure: OcrFailure): boolean {
  return failure.retriable && state.attempt < state.maxAttempts;
}
