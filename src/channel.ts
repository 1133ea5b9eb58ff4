/**
 * Single-consumer async queue.
 *
 * Producers push synchronously from event handlers; the consumer awaits
 * `next()`. Items pushed while nobody waits are buffered in arrival order.
 */
export type Channel<T> = Readonly<{
  push: (item: T) => void;
  next: () => Promise<T>;
  size: () => number;
}>;

export function createChannel<T>(): Channel<T> {
  const buffer: Array<{ readonly item: T }> = [];
  let waiter: ((item: T) => void) | null = null;

  return {
    push: (item) => {
      if (waiter) {
        const resolve = waiter;
        waiter = null;
        resolve(item);
        return;
      }
      buffer.push({ item });
    },

    next: () => {
      const entry = buffer.shift();
      if (entry) return Promise.resolve(entry.item);
      if (waiter) {
        return Promise.reject(new Error("Channel already has a pending consumer"));
      }
      return new Promise<T>((resolve) => {
        waiter = resolve;
      });
    },

    size: () => buffer.length,
  };
}
