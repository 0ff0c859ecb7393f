/**
 * Stores module exports
 */

export type { PageCache, CachedPage } from "./types.js";
export { DEFAULT_CACHE_TTL_SECONDS, pageKeyString } from "./types.js";
export { FilesystemPageCache, DEFAULT_CACHE_DIR } from "./filesystem.js";
export type { FilesystemPageCacheConfig } from "./filesystem.js";
export { MemoryPageCache } from "./memory.js";
export type { MemoryPageCacheConfig } from "./memory.js";
