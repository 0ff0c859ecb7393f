/**
 * Sources module exports
 */

export type { CodeSearchSource } from "./types.js";
export { BitbucketSearchSource, DEFAULT_BITBUCKET_URL } from "./bitbucket.js";
export type { BitbucketSearchSourceConfig } from "./bitbucket.js";
