import { describe, it, expect } from 'vitest';
import { createLimiter, sleep } from '../services/concurrency';

describe('createLimiter', () => {
  it('never runs more than the configured number of tasks at once', async () => {
    const limiter = createLimiter(3);
    let running = 0;
    let peak = 0;
    const results = await Promise.all(Array.from({ length: 10 }, (_, i) => limiter.run(async () => {
      running++;
      peak = Math.max(peak, running);
      await sleep(5 + (i % 3));
      running--;
      return i;
    })));
    expect(peak).toBe(3);
    expect(results).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(limiter.active).toBe(0);
    expect(limiter.pending).toBe(0);
  });

  it('starts waiting tasks in FIFO order', async () => {
    const limiter = createLimiter(1);
    const started: number[] = [];
    await Promise.all([0, 1, 2, 3].map(i => limiter.run(async () => {
      started.push(i);
      await sleep(1);
    })));
    expect(started).toEqual([0, 1, 2, 3]);
  });

  it('releases the slot when a task rejects', async () => {
    const limiter = createLimiter(1);
    await expect(limiter.run(async () => { throw new Error('boom'); })).rejects.toThrow('boom');
    expect(limiter.active).toBe(0);
    await expect(limiter.run(async () => 'next')).resolves.toBe('next');
  });

  it('reports queued tasks while the slot is held', async () => {
    const limiter = createLimiter(1);
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => { release = resolve; });
    const first = limiter.run(() => gate);
    const second = limiter.run(async () => 'second');
    await sleep(1);
    expect(limiter.active).toBe(1);
    expect(limiter.pending).toBe(1);
    release();
    await first;
    await expect(second).resolves.toBe('second');
  });

  it('rejects a non-positive concurrency', () => {
    expect(() => createLimiter(0)).toThrow(RangeError);
    expect(() => createLimiter(1.5)).toThrow(RangeError);
  });
});
