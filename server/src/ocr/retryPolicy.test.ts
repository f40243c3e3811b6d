import { afterEach, describe, it, expect, vi } from 'vitest';

import { ocrFailure } from './types';
import { backoffDelayMs, canRetry, createRetryState, realSleep } from './retryPolicy';

describe('backoffDelayMs', () => {
  it('doubles from the initial delay', () => {
    expect([1, 2, 3].map((n) => backoffDelayMs(n, 1000))).toEqual([1000, 2000, 4000]);
  });
});

describe('canRetry', () => {
  it('allows retriable failures until attempts run out', () => {
    const state = createRetryState(3);
    const transient = ocrFailure('TIMEOUT', 'slow', true);

    state.attempt = 1;
    expect(canRetry(state, transient)).toBe(true);
    state.attempt = 2;
    expect(canRetry(state, transient)).toBe(true);
    state.attempt = 3;
    expect(canRetry(state, transient)).toBe(false);
  });

  it('never retries permanent failures', () => {
    const state = createRetryState(3);
    state.attempt = 1;
    expect(canRetry(state, ocrFailure('INVALID_REQUEST', 'bad', false))).toBe(false);
  });

  it('always allows at least one attempt', () => {
    expect(createRetryState(0).maxAttempts).toBe(1);
  });
});

describe('realSleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    let done = false;
    const p = realSleep(1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await p;
    expect(done).toBe(true);
  });

  it('resolves early when aborted', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    let done = false;
    const p = realSleep(60_000, controller.signal).then(() => {
      done = true;
    });

    controller.abort();
    await p;
    expect(done).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });
});
