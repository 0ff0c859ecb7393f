/**
 * Cache interface for search page responses.
 *
 * A cache handle is acquired once per run and released with `close()`
 * on every exit path.
 *
 * Available implementations:
 * - `FilesystemPageCache`: JSON files in a local directory
 * - `MemoryPageCache`: In-memory storage (for testing)
 *
 * @module stores/types
 */

import type { PageKey, SearchPage } from "../core/types.js";

/** Default entry lifetime in seconds */
export const DEFAULT_CACHE_TTL_SECONDS = 3600;

/** One stored page, as persisted */
export interface CachedPage {
  key: PageKey;
  response: SearchPage;
  /** Epoch milliseconds after which the entry is stale */
  expiresAt: number;
}

/**
 * Key/value store of raw page responses keyed by (page, query).
 *
 * @example
 * ```typescript
 * const cache = await FilesystemPageCache.open({ directory: "./cache" });
 * try {
 *   const hit = await cache.get({ page: 1, query: "foo" });
 *   if (!hit) await cache.set({ page: 1, query: "foo" }, response, 3600);
 * } finally {
 *   await cache.close();
 * }
 * ```
 */
export interface PageCache {
  /**
   * Look up a page response.
   *
   * @returns The stored response, or null when missing or expired
   */
  get(key: PageKey): Promise<SearchPage | null>;

  /**
   * Store a page response, replacing any existing entry for the key.
   *
   * @param ttlSeconds - Lifetime of the entry
   */
  set(key: PageKey, response: SearchPage, ttlSeconds: number): Promise<void>;

  /**
   * Release the handle. Further calls to get/set throw.
   */
  close(): Promise<void>;
}

/**
 * String form of a page key, shared by all implementations.
 */
export function pageKeyString(key: PageKey): string {
  return `search_code_page_${key.page}_${key.query}`;
}
