export type KeyedQueue = {
  run: <T>(key: string, task: () => Promise<T>) => Promise<T>;
  isBusy: (key: string) => boolean;
  size: () => number;
  idle: () => Promise<void>;
};

/**
 * Runs tasks one at a time per key, in submission order. Tasks for different
 * keys do not wait on each other. A failed task does not stop the ones queued
 * behind it.
 */
export function createKeyedQueue(): KeyedQueue {
  const tails = new Map<string, Promise<void>>();

  function run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    tails.set(key, tail);
    void tail.then(() => {
      if (tails.get(key) === tail) {
        tails.delete(key);
      }
    });
    return result;
  }

  async function idle(): Promise<void> {
    while (tails.size > 0) {
      await Promise.all(Array.from(tails.values()));
    }
  }

  return {
    run,
    isBusy: (key) => tails.has(key),
    size: () => tails.size,
    idle,
  };
}
