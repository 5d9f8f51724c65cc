import { AsyncLocalStorage } from "node:async_hooks";

/**
 * Exclusive locks on replay keys.
 *
 * Contenders for a key queue in call order: each waits for the previous
 * holder's operation to settle before its own starts. The queue position is
 * taken synchronously, before the caller's first await.
 *
 * A call made from inside the holder's own operation (for example from a
 * programmable signer's callback) cannot wait for itself; callers detect it
 * with {@link KeyedLock.isHeldByCaller} and reject it instead.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly holdings = new AsyncLocalStorage<ReadonlySet<string>>();

  /**
   * Whether the current async context is running inside an operation holding the key.
   *
   * @param key - The replay key
   * @returns true for a re-entrant call
   */
  isHeldByCaller(key: string): boolean {
    return this.holdings.getStore()?.has(key) ?? false;
  }

  /**
   * Runs an action once every earlier holder of the key has settled.
   *
   * @param key - The replay key
   * @param action - The operation to run while holding the key
   * @returns The action's result
   */
  async runExclusive<T>(key: string, action: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const settled = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => settled);
    this.tails.set(key, tail);

    try {
      await previous;
      const held = new Set(this.holdings.getStore());
      held.add(key);
      return await this.holdings.run(held, action);
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Number of keys with a holder or a waiter.
   */
  get size(): number {
    return this.tails.size;
  }
}
