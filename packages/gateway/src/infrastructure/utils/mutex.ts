/**
 * @file packages/gateway/src/infrastructure/utils/mutex.ts
 * @description Promise-chain mutual exclusion for async critical sections.
 */

const settle = (promise: Promise<unknown>): Promise<void> =>
  promise.then(
    () => undefined,
    () => undefined,
  );

/**
 * Runs critical sections one at a time in call order. A failing section
 * rejects its own caller but never breaks the chain.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const next = this.tail.then(fn);
    this.tail = settle(next);
    return next;
  }
}
