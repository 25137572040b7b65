/**
 * Per-root mutual exclusion for mutating file operations.
 *
 * Each key holds the tail of a promise chain; a new task waits for the
 * previous one to settle (success or failure) before it starts.
 */
import { logger } from '../utils/logging/logger.js';

export class RootLock {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `task` once every earlier task for `key` has settled.
   */
  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    logger.debug('Root lock acquired', { component: 'RootLock', root: key });

    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Whether any task currently holds or waits for `key`.
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

/** Lock shared by every FileOps instance in the process */
export const rootLock = new RootLock();
