/**
 * bitbucket-code-search - Main package entry point
 *
 * Paginated Bitbucket Cloud code search, match formatting, page caching,
 * and an AI SDK agent that searches on a language model's behalf.
 */

// Core types and utilities
export * from "./core/index.js";

// Sources
export * from "./sources/index.js";

// Stores
export * from "./stores/index.js";

// Tools
export * from "./tools/index.js";

// Clients
export * from "./clients/index.js";
