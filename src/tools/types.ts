/**
 * Tool context and types for client tool implementations.
 *
 * Tools are the low-level functions behind client operations:
 * - `getRawMatches`: Search results as JSON
 * - `getFileNamesWithMatches`: Matching file names
 * - `getMatches`: Matches rendered as numbered lines
 *
 * These tools are used by:
 * - SearchClient (programmatic access and the --debug modes)
 * - CLIAgent (AI SDK tools)
 *
 * @module tools/types
 */

import type { QueryExecutor } from "../core/query-executor.js";

/**
 * Context passed to tool implementations.
 *
 * @example
 * ```typescript
 * const ctx: ToolContext = { executor: new QueryExecutor({ source }) };
 * const names = await getFileNamesWithMatches(ctx, "foo lang:python");
 * ```
 */
export interface ToolContext {
  /** Paginating executor all tools fetch through */
  executor: QueryExecutor;
}

/**
 * Options shared by the search tools.
 */
export interface SearchOptions {
  /** Page cap for this call. Defaults to the executor's cap. */
  maxPages?: number;
  /**
   * Maximum characters in the tool output.
   * Useful for limiting context size when used with LLMs.
   */
  maxOutputLength?: number;
}

/**
 * Options for getMatches.
 */
export interface MatchOptions {
  /** Page cap for this call. Defaults to the executor's cap. */
  maxPages?: number;
  /**
   * Wrap matched segments in `**`.
   * @default false
   */
  highlight?: boolean;
}
