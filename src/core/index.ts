/**
 * Core module exports
 */

export type {
  Segment,
  LineRecord,
  MatchBlock,
  SearchResult,
  SearchResultFile,
  SearchPage,
  FormattedMatch,
  PageKey,
} from "./types.js";
export { CODE_SEARCH_RESULT } from "./types.js";

export { QueryExecutor, DEFAULT_MAX_PAGES } from "./query-executor.js";
export type { QueryExecutorConfig } from "./query-executor.js";

export { ConfigurationError, BitbucketApiError, errorMessage } from "./errors.js";

export { createLogger, silentLogger, LogLevel } from "./logger.js";
export type { Logger, LoggerOptions, LogLevelValue } from "./logger.js";

export { getCredentials, parseLogLevel } from "./config.js";
export type { BitbucketCredentials } from "./config.js";

export { isoTimestamp, truncateOutput, buildUserAgent, VERSION } from "./utils.js";
