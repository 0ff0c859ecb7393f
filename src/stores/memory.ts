/**
 * Memory Page Cache - In-memory storage for testing and embedded use
 *
 * Entries live as long as the instance. Expiry follows the same rules as
 * FilesystemPageCache.
 */

import type { PageKey, SearchPage } from "../core/types.js";
import { pageKeyString, type CachedPage, type PageCache } from "./types.js";

/** Configuration for MemoryPageCache */
export interface MemoryPageCacheConfig {
  /** Clock in epoch milliseconds. Defaults to Date.now. */
  now?: () => number;
}

export class MemoryPageCache implements PageCache {
  private readonly data = new Map<string, CachedPage>();
  private readonly now: () => number;
  private closed = false;

  constructor(config: MemoryPageCacheConfig = {}) {
    this.now = config.now ?? Date.now;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error("Page cache is closed");
    }
  }

  async get(key: PageKey): Promise<SearchPage | null> {
    this.assertOpen();
    const id = pageKeyString(key);
    const entry = this.data.get(id);
    if (!entry) return null;

    if (entry.expiresAt <= this.now()) {
      this.data.delete(id);
      return null;
    }

    // Return a deep copy to prevent external mutation
    return JSON.parse(JSON.stringify(entry.response));
  }

  async set(key: PageKey, response: SearchPage, ttlSeconds: number): Promise<void> {
    this.assertOpen();
    this.data.set(pageKeyString(key), {
      key: { ...key },
      response: JSON.parse(JSON.stringify(response)),
      expiresAt: this.now() + ttlSeconds * 1000,
    });
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Get the number of stored entries, expired or not (useful for testing) */
  get size(): number {
    return this.data.size;
  }

  /** Whether close() has been called */
  get isClosed(): boolean {
    return this.closed;
  }
}
