/**
 * Per-key FIFO mutual exclusion and in-flight request coalescing.
 *
 * {@link KeyedMutex} serializes work sharing a key (a user id) while work on
 * distinct keys runs in parallel. {@link SingleFlight} lets an identical
 * request join the promise of one already in flight instead of running twice.
 * Idle keys are dropped so the maps stay bounded by the number of active keys.
 *
 * @packageDocumentation
 */

/**
 * Releases a held lock. Calling it more than once has no effect.
 */
export type Release = () => void;

interface KeyState {
  held: boolean;
  readonly waiters: (() => void)[];
}

/**
 * FIFO mutex per key.
 *
 * @example
 * ```typescript
 * const locks = new KeyedMutex();
 * const result = await locks.runExclusive('u1', async () => handle(request));
 * ```
 */
export class KeyedMutex {
  private readonly keys = new Map<string, KeyState>();

  /**
   * Whether the lock for `key` is currently held.
   */
  isLocked(key: string): boolean {
    return this.keys.get(key)?.held ?? false;
  }

  /**
   * Number of callers waiting for `key`, not counting the holder.
   */
  queueLength(key: string): number {
    return this.keys.get(key)?.waiters.length ?? 0;
  }

  /**
   * Acquires the lock for `key`, waiting behind earlier callers.
   *
   * @returns A release function.
   */
  async acquire(key: string): Promise<Release> {
    let state = this.keys.get(key);
    if (state === undefined) {
      state = { held: false, waiters: [] };
      this.keys.set(key, state);
    }

    if (state.held) {
      const waiting = state;
      await new Promise<void>((resolve) => {
        waiting.waiters.push(resolve);
      });
    } else {
      state.held = true;
    }

    return this.createRelease(key);
  }

  /**
   * Acquires the lock for `key` only if it is free.
   *
   * @returns A release function, or undefined when the key is busy.
   */
  tryAcquire(key: string): Release | undefined {
    if (this.isLocked(key)) {
      return undefined;
    }
    this.keys.set(key, { held: true, waiters: [] });
    return this.createRelease(key);
  }

  /**
   * Runs `task` while holding the lock for `key`.
   */
  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private createRelease(key: string): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;

      const state = this.keys.get(key);
      if (state === undefined) {
        return;
      }

      // Ownership passes directly to the next waiter; `held` stays true.
      const next = state.waiters.shift();
      if (next !== undefined) {
        next();
      } else {
        this.keys.delete(key);
      }
    };
  }
}

/**
 * Coalesces concurrent calls sharing a key onto one promise.
 */
export class SingleFlight<T> {
  private readonly inFlight = new Map<string, Promise<T>>();

  /**
   * Whether a call for `key` is in flight.
   */
  has(key: string): boolean {
    return this.inFlight.has(key);
  }

  /**
   * Runs `task` unless a call for `key` is already in flight, in which case
   * that call's promise is returned.
   *
   * @returns The shared result and whether this caller joined an existing call.
   */
  run(key: string, task: () => Promise<T>): { readonly promise: Promise<T>; readonly joined: boolean } {
    const existing = this.inFlight.get(key);
    if (existing !== undefined) {
      return { promise: existing, joined: true };
    }

    const promise = task().finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, promise);
    return { promise, joined: false };
  }
}
