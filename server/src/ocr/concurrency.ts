export type Release = () => void;

type Waiter = {
  grant: (release: Release) => void;
  cancel: () => void;
};

/**
 * Caps concurrent in-flight OCR calls per process. Waiters are served FIFO.
 */
export class Semaphore {
  private inFlight = 0;
  private readonly waiters: Waiter[] = [];

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new RangeError(`Semaphore limit must be a positive integer (got ${limit}).`);
    }
  }

  get active(): number {
    return this.inFlight;
  }

  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Resolves with a release function, or null when `timeoutMs` elapses or
   * `signal` aborts first.
   */
  acquire(timeoutMs: number, signal?: AbortSignal): Promise<Release | null> {
    if (signal?.aborted) return Promise.resolve(null);
    if (this.inFlight < this.limit) {
      this.inFlight++;
      return Promise.resolve(this.makeRelease());
    }

    return new Promise<Release | null>((resolve) => {
      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };
      const waiter: Waiter = {
        grant: (release) => {
          cleanup();
          resolve(release);
        },
        cancel: () => {
          cleanup();
          const idx = this.waiters.indexOf(waiter);
          if (idx >= 0) this.waiters.splice(idx, 1);
          resolve(null);
        },
      };
      const onAbort = () => waiter.cancel();
      const timer = setTimeout(() => waiter.cancel(), Math.max(0, timeoutMs));
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private makeRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.drain();
    };
  }

  // Hand the slot straight to the next waiter, otherwise free it.
  private drain(): void {
    const next = this.waiters.shift();
    if (next) {
      next.grant(this.makeRelease());
      return;
    }
    this.inFlight--;
  }
}
