import { logDebug } from "./logging.js";

/**
 * Keyed lock that serializes work per key via promise chains.
 * Each call appends to its key's chain, so only one task per key runs at a
 * time; tasks on different keys run independently.
 */
export class GroupLock {
  private chains = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.chains.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.chains.set(key, tail);

    await previous;
    logDebug(`GroupLock acquired: ${key}`);
    try {
      return await task();
    } finally {
      release();
      if (this.chains.get(key) === tail) {
        this.chains.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.chains.has(key);
  }
}
