/**
 * Counting limiter: at most `concurrency` tasks run at once, the rest wait in
 * FIFO order. A finishing task hands its slot straight to the next waiter.
 */
export interface Limiter {
  run<T>(task: () => Promise<T>): Promise<T>;
  readonly active: number;
  readonly pending: number;
}

export function createLimiter(concurrency: number): Limiter {
  if(!Number.isInteger(concurrency) || concurrency < 1){
    throw new RangeError(`concurrency must be a positive integer (got ${concurrency})`);
  }
  let active = 0;
  const queue: (() => void)[] = [];

  const acquire = (): Promise<void> => {
    if(active < concurrency){
      active++;
      return Promise.resolve();
    }
    return new Promise<void>(resolve => queue.push(resolve));
  };

  const release = () => {
    const next = queue.shift();
    if(next) next();
    else active--;
  };

  async function run<T>(task: () => Promise<T>): Promise<T> {
    await acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  return {
    run,
    get active(){ return active; },
    get pending(){ return queue.length; },
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
