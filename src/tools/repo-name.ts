/**
 * Repository name resolution from result self links.
 *
 * Search results carry the repository only inside the file's self link:
 * `https://api.bitbucket.org/2.0/repositories/{workspace}/{repo}/src/{commit}/{path}`
 *
 * @module tools/repo-name
 */

import type { SearchResult } from "../core/types.js";

const REPOSITORIES_MARKER = "/repositories/";

/**
 * Extract the repository slug from a self link URL.
 *
 * Pure string operation. Returns "" when the marker is absent or fewer
 * than two segments follow it.
 *
 * @example
 * resolveRepoName("https://api.bitbucket.org/2.0/repositories/ws/demo/src/abc/foo.py") // "demo"
 * resolveRepoName("https://example.org/other/path") // ""
 */
export function resolveRepoName(selfLinkUrl: string): string {
  const markerIdx = selfLinkUrl.indexOf(REPOSITORIES_MARKER);
  if (markerIdx === -1) {
    return "";
  }
  const parts = selfLinkUrl.slice(markerIdx + REPOSITORIES_MARKER.length).split("/");
  return parts.length >= 2 ? parts[1] : "";
}

/**
 * Bare file path of a result, or "" when missing.
 */
export function resultPath(result: SearchResult): string {
  return result.file?.path ?? "";
}

/**
 * Repository-qualified path of a result: "{repo}/{path}" when the
 * repository resolves, otherwise the bare path.
 */
export function qualifiedFileName(result: SearchResult): string {
  const path = resultPath(result);
  const repoName = resolveRepoName(result.file?.links?.self?.href ?? "");
  return repoName ? `${repoName}/${path}` : path;
}
