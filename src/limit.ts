export type Limiter = <T>(fn: () => Promise<T>) => Promise<T>;

// FIFO slot queue: at most `max` tasks in flight; a finishing task hands its slot to the next waiter
export function createLimiter(max: number): Limiter {
  const limit = Math.max(1, Math.floor(max) || 1);
  let active = 0;
  const waiters: Array<() => void> = [];
  return async <T>(fn: () => Promise<T>): Promise<T> => {
    if (active >= limit) {
      await new Promise<void>(resolve => waiters.push(resolve));
    } else {
      active++;
    }
    try {
      return await fn();
    } finally {
      const next = waiters.shift();
      if (next) next();
      else active--;
    }
  };
}

export async function mapLimit<T, R>(items: readonly T[], max: number, fn: (item: T, index: number) => Promise<R>): Promise<R[]> {
  const run = createLimiter(max);
  return Promise.all(items.map((item, i) => run(() => fn(item, i))));
}
