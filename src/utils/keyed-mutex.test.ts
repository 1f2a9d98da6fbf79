import { describe, it, expect } from 'vitest';
import { KeyedMutex, SingleFlight } from './keyed-mutex.js';

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('should run tasks for the same key one at a time in arrival order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    let active = 0;
    let maxActive = 0;

    const task = (name: string) => async (): Promise<void> => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      events.push(`start:${name}`);
      await new Promise((resolve) => setTimeout(resolve, 5));
      events.push(`end:${name}`);
      active -= 1;
    };

    await Promise.all([
      mutex.runExclusive('u1', task('a')),
      mutex.runExclusive('u1', task('b')),
      mutex.runExclusive('u1', task('c')),
    ]);

    expect(maxActive).toBe(1);
    expect(events).toEqual(['start:a', 'end:a', 'start:b', 'end:b', 'start:c', 'end:c']);
  });

  it('should let distinct keys run in parallel', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred<void>();
    const started: string[] = [];

    const first = mutex.runExclusive('u1', async () => {
      started.push('u1');
      await gate.promise;
    });
    const second = mutex.runExclusive('u2', async () => {
      started.push('u2');
      await gate.promise;
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(started).toEqual(['u1', 'u2']);

    gate.resolve();
    await Promise.all([first, second]);
  });

  it('should release the lock when the task throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('u1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(mutex.isLocked('u1')).toBe(false);
  });

  it('should report queue length while waiters are pending', async () => {
    const mutex = new KeyedMutex();
    const release = await mutex.acquire('u1');
    const waiting = mutex.acquire('u1');

    expect(mutex.isLocked('u1')).toBe(true);
    expect(mutex.queueLength('u1')).toBe(1);

    release();
    const releaseSecond = await waiting;
    expect(mutex.queueLength('u1')).toBe(0);
    releaseSecond();
    expect(mutex.isLocked('u1')).toBe(false);
  });

  it('should refuse tryAcquire on a held key', async () => {
    const mutex = new KeyedMutex();
    const release = mutex.tryAcquire('u1');

    expect(release).toBeDefined();
    expect(mutex.tryAcquire('u1')).toBeUndefined();

    release?.();
    expect(mutex.tryAcquire('u1')).toBeDefined();
  });

  it('should ignore a second call to release', async () => {
    const mutex = new KeyedMutex();
    const release = await mutex.acquire('u1');
    const next = mutex.acquire('u1');

    release();
    release();

    const releaseNext = await next;
    expect(mutex.isLocked('u1')).toBe(true);
    releaseNext();
  });
});

describe('SingleFlight', () => {
  it('should share one execution between concurrent callers', async () => {
    const flight = new SingleFlight<number>();
    const gate = deferred<number>();
    let calls = 0;

    const task = async (): Promise<number> => {
      calls += 1;
      return gate.promise;
    };

    const first = flight.run('u1:hello', task);
    const second = flight.run('u1:hello', task);

    expect(first.joined).toBe(false);
    expect(second.joined).toBe(true);

    gate.resolve(7);
    expect(await first.promise).toBe(7);
    expect(await second.promise).toBe(7);
    expect(calls).toBe(1);
  });

  it('should forget a key once its call settles', async () => {
    const flight = new SingleFlight<string>();

    await flight.run('k', async () => 'one').promise;

    expect(flight.has('k')).toBe(false);
    expect(await flight.run('k', async () => 'two').promise).toBe('two');
  });
});
