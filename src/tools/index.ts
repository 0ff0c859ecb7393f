/**
 * Tools module exports
 */

export { getRawMatches, getFileNamesWithMatches, getMatches } from "./search.js";
export { formatMatches, HIGHLIGHT_OPEN, HIGHLIGHT_CLOSE } from "./format-matches.js";
export { resolveRepoName, qualifiedFileName, resultPath } from "./repo-name.js";
export type { ToolContext, SearchOptions, MatchOptions } from "./types.js";
