/**
 * Search tools - Code search across a workspace.
 *
 * Each tool paginates the full result set through the executor, then
 * shapes it for its consumer.
 *
 * @module tools/search
 */

import type { FormattedMatch } from "../core/types.js";
import { truncateOutput } from "../core/utils.js";
import { formatMatches } from "./format-matches.js";
import { qualifiedFileName, resultPath } from "./repo-name.js";
import type { MatchOptions, SearchOptions, ToolContext } from "./types.js";

/**
 * Search results as a JSON array string.
 *
 * @example
 * ```typescript
 * const json = await getRawMatches(ctx, "foo lang:python");
 * const results = JSON.parse(json);
 * ```
 */
export async function getRawMatches(
  ctx: ToolContext,
  query: string,
  options?: SearchOptions
): Promise<string> {
  const results = await ctx.executor.fetchAll(query, options?.maxPages);
  return truncateOutput(JSON.stringify(results), options?.maxOutputLength);
}

/**
 * Names of files containing matches, one per line.
 *
 * Names are repository-qualified when the repository resolves from the
 * result's self link. Results without a path are skipped.
 */
export async function getFileNamesWithMatches(
  ctx: ToolContext,
  query: string,
  options?: SearchOptions
): Promise<string> {
  const results = await ctx.executor.fetchAll(query, options?.maxPages);
  const fileNames = results
    .filter((result) => resultPath(result) !== "")
    .map(qualifiedFileName);
  return truncateOutput(fileNames.join("\n"), options?.maxOutputLength);
}

/**
 * Matches rendered as numbered lines, per file.
 *
 * Files whose matches render to nothing are left out.
 *
 * @example
 * ```typescript
 * for (const { fileName, matches } of await getMatches(ctx, "foo", { highlight: true })) {
 *   console.log(`File: ${fileName}\n${matches}`);
 * }
 * ```
 */
export async function getMatches(
  ctx: ToolContext,
  query: string,
  options?: MatchOptions
): Promise<FormattedMatch[]> {
  const results = await ctx.executor.fetchAll(query, options?.maxPages);
  const formatted: FormattedMatch[] = [];

  for (const result of results) {
    const matches = formatMatches(result.content_matches ?? [], options?.highlight ?? false);
    if (matches) {
      formatted.push({ fileName: qualifiedFileName(result), matches });
    }
  }

  return formatted;
}
