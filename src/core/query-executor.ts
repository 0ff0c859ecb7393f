/**
 * Query Executor - Paginates a code search to completion.
 *
 * Issues one request per page, in order, until a page carries no `next`
 * link or the page cap is reached. When a cache is configured, each
 * (page, query) pair is looked up before going to the network.
 *
 * @module core/query-executor
 *
 * @example
 * ```typescript
 * const executor = new QueryExecutor({
 *   source: new BitbucketSearchSource({ workspace: "my-workspace", credentials }),
 *   cache,
 *   maxPages: 20,
 * });
 * const results = await executor.fetchAll("foo lang:python");
 * ```
 */

import type { CodeSearchSource } from "../sources/types.js";
import { DEFAULT_CACHE_TTL_SECONDS, type PageCache } from "../stores/types.js";
import { ConfigurationError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { CODE_SEARCH_RESULT, type SearchPage, type SearchResult } from "./types.js";

/** Default maximum number of pages fetched for one query */
export const DEFAULT_MAX_PAGES = 100;

/**
 * Configuration for QueryExecutor.
 */
export interface QueryExecutorConfig {
  /** Backend issuing the page requests */
  source: CodeSearchSource;
  /** Cache consulted before each page request. Null or omitted disables caching. */
  cache?: PageCache | null;
  /**
   * Maximum number of page requests per query.
   * @default 100
   */
  maxPages?: number;
  /**
   * Lifetime of cached pages in seconds.
   * @default 3600
   */
  cacheTtlSeconds?: number;
  /** Diagnostics sink. Defaults to a silent logger. */
  logger?: Logger;
}

function assertMaxPages(maxPages: number): void {
  if (!Number.isInteger(maxPages) || maxPages < 1) {
    throw new ConfigurationError(`maxPages must be a positive integer, got ${maxPages}`);
  }
}

export class QueryExecutor {
  private readonly source: CodeSearchSource;
  private readonly cache: PageCache | null;
  private readonly maxPages: number;
  private readonly cacheTtlSeconds: number;
  private readonly logger: Logger;

  constructor(config: QueryExecutorConfig) {
    this.source = config.source;
    this.cache = config.cache ?? null;
    this.maxPages = config.maxPages ?? DEFAULT_MAX_PAGES;
    this.cacheTtlSeconds = config.cacheTtlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
    this.logger = config.logger ?? silentLogger;
    assertMaxPages(this.maxPages);
  }

  /**
   * Fetch one page, from the cache when possible.
   */
  private async fetchPage(query: string, page: number): Promise<SearchPage> {
    if (!this.cache) {
      this.logger.info(`Fetching page ${page}`);
      return this.source.searchCode(query, page);
    }

    const key = { page, query };
    const cached = await this.cache.get(key);
    if (cached) {
      this.logger.info(`Using cached response for page ${page}`);
      return cached;
    }

    this.logger.info(`Fetching page ${page}`);
    const response = await this.source.searchCode(query, page);
    await this.cache.set(key, response, this.cacheTtlSeconds);
    return response;
  }

  /**
   * Fetch every code search result for a query across all pages.
   *
   * Results keep the order the service returned them in. Entries whose
   * `type` is not "code_search_result" are dropped. Duplicates across
   * pages are kept.
   *
   * @param query - Raw query string
   * @param maxPages - Overrides the configured page cap for this call
   * @returns Accumulated results; partial when the page cap was hit
   */
  async fetchAll(query: string, maxPages: number = this.maxPages): Promise<SearchResult[]> {
    assertMaxPages(maxPages);
    const results: SearchResult[] = [];
    let page = 1;

    while (true) {
      const response = await this.fetchPage(query, page);

      for (const value of response.values ?? []) {
        if (value.type === CODE_SEARCH_RESULT) {
          results.push(value);
        }
      }

      if (response.next === undefined || response.next === null) {
        break;
      }

      page++;
      if (page > maxPages) {
        this.logger.warn(`Reached maximum page limit of ${maxPages}`);
        break;
      }
    }

    this.logger.debug(`Collected ${results.length} results in ${Math.min(page, maxPages)} page(s)`);
    return results;
  }
}
