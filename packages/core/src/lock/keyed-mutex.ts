/**
 * Keyed Mutex
 * Serializes async work per key (one queue per incident id). Keys with no
 * pending work are dropped so the map only holds live incidents.
 */

import { createChildLogger } from '@remedyops/shared';

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();
  private logger = createChildLogger({ component: 'KeyedMutex' });

  /**
   * Run fn once every earlier holder of the key has finished
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    this.logger.debug({ key }, 'Lock acquired');

    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}
