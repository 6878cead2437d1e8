/**
 * Scoped resource stack
 *
 * Each successful acquisition pushes a release callback; `unwind()` pops and
 * runs them in reverse. A releaser runs at most once, and a failing releaser
 * is logged without stopping the ones below it.
 */

import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

type Releaser = () => Promise<void> | void;

interface StackEntry {
  name: string;
  release: Releaser;
}

export class ResourceStack {
  private entries: StackEntry[] = [];

  /**
   * Acquire a resource and register its release. If `acquire` throws, nothing
   * is registered and the error propagates.
   */
  async acquire<T>(
    name: string,
    acquire: () => Promise<T>,
    release: (resource: T) => Promise<void> | void
  ): Promise<T> {
    const resource = await acquire();
    this.defer(name, () => release(resource));
    logger.debug(`[scope] Acquired ${name}`);
    return resource;
  }

  defer(name: string, release: Releaser): void {
    this.entries.push({ name, release });
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Release everything acquired so far, newest first. Never throws.
   */
  async unwind(): Promise<void> {
    let entry = this.entries.pop();
    while (entry) {
      try {
        await entry.release();
        logger.debug(`[scope] Released ${entry.name}`);
      } catch (error) {
        logger.warn(`[scope] Failed to release ${entry.name}: ${errorMessage(error)}`);
      }
      entry = this.entries.pop();
    }
  }
}
