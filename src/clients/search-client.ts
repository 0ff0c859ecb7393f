/**
 * SearchClient - Client for searching code in a Bitbucket workspace.
 *
 * The SearchClient provides a high-level API for:
 * - Raw search results as JSON
 * - Matching file names
 * - Matches rendered as numbered lines
 *
 * @module clients/search-client
 *
 * @example
 * ```typescript
 * import { SearchClient, getCredentials } from "bitbucket-code-search";
 *
 * const client = new SearchClient({
 *   workspace: "my-workspace",
 *   credentials: getCredentials(),
 * });
 * const names = await client.getFileNamesWithMatches("foo lang:python");
 * ```
 */

import type { BitbucketCredentials } from "../core/config.js";
import type { Logger } from "../core/logger.js";
import { QueryExecutor } from "../core/query-executor.js";
import type { FormattedMatch } from "../core/types.js";
import { BitbucketSearchSource } from "../sources/bitbucket.js";
import type { CodeSearchSource } from "../sources/types.js";
import type { PageCache } from "../stores/types.js";
import { getFileNamesWithMatches, getMatches, getRawMatches } from "../tools/index.js";
import type { MatchOptions, SearchOptions, ToolContext } from "../tools/types.js";

/**
 * Configuration for SearchClient.
 */
export interface SearchClientConfig {
  /** Workspace slug to search */
  workspace: string;
  /** Bitbucket credentials. Read them with getCredentials(). */
  credentials: BitbucketCredentials;
  /** Bitbucket API base URL */
  baseUrl?: string;
  /**
   * Source override. When provided, workspace/credentials/baseUrl are not
   * used to build one.
   */
  source?: CodeSearchSource;
  /** Page cache. The caller owns the handle and closes it. */
  cache?: PageCache | null;
  /**
   * Maximum pages per query.
   * @default 100
   */
  maxPages?: number;
  /**
   * Lifetime of cached pages in seconds.
   * @default 3600
   */
  cacheTtlSeconds?: number;
  logger?: Logger;
}

/**
 * Client for searching code in one workspace.
 *
 * @example
 * ```typescript
 * const cache = await FilesystemPageCache.open();
 * try {
 *   const client = new SearchClient({ workspace: "my-workspace", credentials, cache });
 *   for (const { fileName, matches } of await client.getMatches("foo", { highlight: true })) {
 *     console.log(fileName, matches);
 *   }
 * } finally {
 *   await cache.close();
 * }
 * ```
 */
export class SearchClient {
  readonly workspace: string;
  private readonly ctx: ToolContext;

  constructor(config: SearchClientConfig) {
    this.workspace = config.workspace;
    const source =
      config.source ??
      new BitbucketSearchSource({
        workspace: config.workspace,
        credentials: config.credentials,
        baseUrl: config.baseUrl,
      });
    this.ctx = {
      executor: new QueryExecutor({
        source,
        cache: config.cache,
        maxPages: config.maxPages,
        cacheTtlSeconds: config.cacheTtlSeconds,
        logger: config.logger,
      }),
    };
  }

  /**
   * Search results as a JSON array string.
   */
  async getRawMatches(query: string, options?: SearchOptions): Promise<string> {
    return getRawMatches(this.ctx, query, options);
  }

  /**
   * Names of files with matches, one per line.
   */
  async getFileNamesWithMatches(query: string, options?: SearchOptions): Promise<string> {
    return getFileNamesWithMatches(this.ctx, query, options);
  }

  /**
   * Matches rendered as numbered lines, per file.
   */
  async getMatches(query: string, options?: MatchOptions): Promise<FormattedMatch[]> {
    return getMatches(this.ctx, query, options);
  }
}
