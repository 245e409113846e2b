/**
 * In-process keyed mutex.
 *
 * Serializes async operations that share a key; operations on different
 * keys run concurrently. Callers are served in the order they arrive.
 */

export interface KeyedLock {
  run<T>(key: string, fn: () => T | Promise<T>): Promise<T>;
  /** Number of keys with queued or running work. */
  readonly pending: number;
}

export function createKeyedLock(): KeyedLock {
  const tails = new Map<string, Promise<void>>();

  return {
    run<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();
      // A failed holder still releases the key to the next caller.
      const result = previous.then(() => fn());
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
    },

    get pending(): number {
      return tails.size;
    },
  };
}
