/**
 * Per-key serial task queue.
 *
 * Tasks sharing a key run one after another in submission order; tasks
 * with different keys run concurrently. The registry uses it to serialize
 * persistence writes per device, so two writes to one device can never land
 * out of order while unrelated devices persist in parallel.
 *
 * Usage:
 *   const queue = createKeyedQueue();
 *   await queue.run("dev-1", () => store.saveDevice(device));
 *   await queue.idle(); // waits for every queued task
 */

export interface KeyedQueue {
  /** Run `task` after every earlier task with the same key has settled */
  run<T>(key: string, task: () => Promise<T>): Promise<T>;
  /** Resolves once all tasks queued so far have settled */
  idle(): Promise<void>;
  /** Number of keys with queued or running work */
  activeKeys(): number;
}

export function createKeyedQueue(): KeyedQueue {
  /** Tail of each key's chain; settles when the key's last task settles */
  const tails = new Map<string, Promise<void>>();

  return {
    run<T>(key: string, task: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();
      const result = previous.then(task);

      // The chain only tracks completion; the task's outcome, including a
      // rejection, is delivered to the caller through `result`.
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

    async idle(): Promise<void> {
      while (tails.size > 0) {
        await Promise.all([...tails.values()]);
      }
    },

    activeKeys(): number {
      return tails.size;
    },
  };
}
