export interface Limiter {
  run<T>(task: () => Promise<T>): Promise<T>;
  readonly active: number;
  readonly pending: number;
}

/** FIFO limiter: at most `max` tasks run at once, the rest wait their turn. */
export function createLimiter(max: number): Limiter {
  const limit = Math.max(1, Math.floor(max));
  const waiting: Array<() => void> = [];
  let active = 0;

  function next(): void {
    if (active >= limit) { return; }
    const start = waiting.shift();
    if (start) { start(); }
  }

  return {
    get active() { return active; },
    get pending() { return waiting.length; },
    run<T>(task: () => Promise<T>): Promise<T> {
      return new Promise<T>((resolve, reject) => {
        waiting.push(() => {
          active += 1;
          task()
            .then(resolve, reject)
            .finally(() => {
              active -= 1;
              next();
            });
        });
        next();
      });
    },
  };
}

/**
 * Serializes tasks that share a key; tasks under different keys run
 * independently. Each task starts after the previous one for its key settles.
 */
export class KeyedSerialQueue {
  private readonly tails = new Map<string, Promise<unknown>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(task, task);
    // The chain ignores outcomes; callers see them through `current`.
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) { this.tails.delete(key); }
    });
    return current;
  }

  get size(): number {
    return this.tails.size;
  }
}
