/**
 * Source interface for code search backends.
 *
 * A source issues exactly one request per call. Pagination, caching and
 * filtering are the QueryExecutor's job.
 *
 * @module sources/types
 */

import type { SearchPage } from "../core/types.js";

/**
 * Backend that answers one page of a code search.
 *
 * @example
 * ```typescript
 * const source = new BitbucketSearchSource({ workspace: "my-workspace", credentials });
 * const first = await source.searchCode("foo lang:python");
 * const second = await source.searchCode("foo lang:python", 2);
 * ```
 */
export interface CodeSearchSource {
  /** Identifies the backend in logs */
  readonly type: "bitbucket";

  /**
   * Fetch one page of results.
   *
   * @param query - Raw query string in the platform's search grammar
   * @param page - 1-based page index. Page 1 is requested without a page parameter.
   * @throws Error on transport, auth, or non-2xx responses
   */
  searchCode(query: string, page?: number): Promise<SearchPage>;
}
