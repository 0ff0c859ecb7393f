/**
 * Filesystem Page Cache - Persists search page responses to a local directory.
 *
 * Lets repeated runs of the tool reuse responses instead of spending API
 * rate limit on pages already seen.
 *
 * @module stores/filesystem
 *
 * @example
 * ```typescript
 * const cache = await FilesystemPageCache.open({ directory: "./cache" });
 * try {
 *   const executor = new QueryExecutor({ source, cache });
 *   await executor.fetchAll("foo lang:python");
 * } finally {
 *   await cache.close();
 * }
 * ```
 */

import { createHash } from "node:crypto";
import { promises as fs } from "node:fs";
import { join } from "node:path";
import type { PageKey, SearchPage } from "../core/types.js";
import { isoTimestamp } from "../core/utils.js";
import { pageKeyString, type CachedPage, type PageCache } from "./types.js";

/** Default cache directory, relative to the working directory */
export const DEFAULT_CACHE_DIR = "cache";

/** Suffix of entry files */
const ENTRY_SUFFIX = ".json";

/**
 * Configuration for FilesystemPageCache.
 */
export interface FilesystemPageCacheConfig {
  /**
   * Directory holding entry files.
   * @default "cache"
   */
  directory?: string;
  /** Clock in epoch milliseconds. Defaults to Date.now. */
  now?: () => number;
}

/** Entry as written to disk */
interface StoredEntry extends CachedPage {
  /** ISO 8601 time the entry was written */
  storedAt: string;
}

function isStoredEntry(value: unknown): value is StoredEntry {
  if (typeof value !== "object" || value === null) return false;
  return (
    "expiresAt" in value &&
    typeof value.expiresAt === "number" &&
    "response" in value &&
    typeof value.response === "object" &&
    value.response !== null
  );
}

/**
 * Page cache that stores one JSON file per (page, query) key.
 *
 * Creates a directory structure:
 * ```
 * {directory}/
 *   {sha256(key)}.json   - { key, response, expiresAt, storedAt }
 * ```
 *
 * Entry files are named by hash so any query string maps to a safe,
 * collision-free file name.
 */
export class FilesystemPageCache implements PageCache {
  readonly directory: string;
  private readonly now: () => number;
  private closed = false;

  private constructor(directory: string, now: () => number) {
    this.directory = directory;
    this.now = now;
  }

  /**
   * Open a cache handle, creating the directory if needed.
   */
  static async open(config: FilesystemPageCacheConfig = {}): Promise<FilesystemPageCache> {
    const directory = config.directory ?? DEFAULT_CACHE_DIR;
    await fs.mkdir(directory, { recursive: true });
    return new FilesystemPageCache(directory, config.now ?? Date.now);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error(`Page cache at "${this.directory}" is closed`);
    }
  }

  /**
   * Get the path to the entry file for a given key
   */
  private getEntryPath(key: PageKey): string {
    const digest = createHash("sha256").update(pageKeyString(key)).digest("hex");
    return join(this.directory, `${digest}${ENTRY_SUFFIX}`);
  }

  /**
   * Read and parse an entry file. Unreadable or malformed files count as missing.
   */
  private async readEntry(filePath: string): Promise<StoredEntry | null> {
    let data: string;
    try {
      data = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return null;
      }
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(data);
      return isStoredEntry(parsed) ? parsed : null;
    } catch {
      // Partially written or corrupt entry
      return null;
    }
  }

  private async removeEntry(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true });
  }

  async get(key: PageKey): Promise<SearchPage | null> {
    this.assertOpen();
    const filePath = this.getEntryPath(key);
    const entry = await this.readEntry(filePath);
    if (!entry) return null;

    if (entry.expiresAt <= this.now()) {
      await this.removeEntry(filePath);
      return null;
    }

    return entry.response;
  }

  async set(key: PageKey, response: SearchPage, ttlSeconds: number): Promise<void> {
    this.assertOpen();
    const now = this.now();
    const entry: StoredEntry = {
      key,
      response,
      expiresAt: now + ttlSeconds * 1000,
      storedAt: isoTimestamp(new Date(now)),
    };

    // Write to a temp file and rename so readers never see a partial entry
    const filePath = this.getEntryPath(key);
    const tempPath = `${filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(entry), "utf-8");
    await fs.rename(tempPath, filePath);
  }

  /**
   * Remove expired and unreadable entries, then release the handle.
   * Calling close() twice is a no-op.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.evictExpired();
  }

  /**
   * Delete every expired entry file.
   *
   * @returns Number of entries removed
   */
  private async evictExpired(): Promise<number> {
    let names: string[];
    try {
      names = await fs.readdir(this.directory);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return 0;
      }
      throw error;
    }

    const now = this.now();
    let removed = 0;
    for (const name of names) {
      if (!name.endsWith(ENTRY_SUFFIX)) continue;
      const filePath = join(this.directory, name);
      const entry = await this.readEntry(filePath);
      if (!entry || entry.expiresAt <= now) {
        await this.removeEntry(filePath);
        removed++;
      }
    }
    return removed;
  }
}
