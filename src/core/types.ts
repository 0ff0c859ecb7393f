/**
 * Shapes returned by the Bitbucket Cloud code-search endpoint.
 *
 * Every field is optional: the API omits empty collections and the
 * pipeline falls back to empty values instead of failing.
 *
 * @module core/types
 *
 * @example
 * ```json
 * {
 *   "type": "code_search_result",
 *   "content_match_count": 1,
 *   "content_matches": [
 *     { "lines": [{ "line": 3, "segments": [{ "text": "def " }, { "text": "foo", "match": true }] }] }
 *   ],
 *   "file": {
 *     "path": "src/foo.py",
 *     "links": { "self": { "href": "https://api.bitbucket.org/2.0/repositories/ws/demo/src/abc/src/foo.py" } }
 *   }
 * }
 * ```
 */

/** Discriminator of the only result type the pipeline processes */
export const CODE_SEARCH_RESULT = "code_search_result";

/** A contiguous run of text within a line, flagged when it matches the query */
export interface Segment {
  text?: string;
  /** @default false */
  match?: boolean;
}

/** One line of a content match */
export interface LineRecord {
  line?: number;
  segments?: Segment[];
}

/** A block of matched lines within a single file */
export interface MatchBlock {
  lines?: LineRecord[];
}

export interface SearchResultFile {
  path?: string;
  type?: string;
  links?: {
    self?: {
      href?: string;
    };
  };
}

/** One file-level match record */
export interface SearchResult {
  type?: string;
  content_match_count?: number;
  content_matches?: MatchBlock[];
  path_matches?: Segment[];
  file?: SearchResultFile;
}

/** One page of the paginated search response */
export interface SearchPage {
  values?: SearchResult[];
  /** URL of the next page. Only its presence is used. */
  next?: string | null;
  page?: number;
  pagelen?: number;
  size?: number;
  query_substituted?: boolean;
}

/** A file with its matches rendered as text */
export interface FormattedMatch {
  /** Repository-qualified path, or the bare path when no repository resolves */
  fileName: string;
  /** Newline-joined "Line {n}: {text}" entries */
  matches: string;
}

/** Cache key for one page of one query */
export interface PageKey {
  page: number;
  query: string;
}
