/**
 * Shared utility functions
 */
import { createRequire } from "node:module";

const require = createRequire(import.meta.url);

function readVersion(): string {
  try {
    const packageJson: { version?: unknown } = require("../../package.json");
    return typeof packageJson.version === "string" ? packageJson.version : "unknown";
  } catch {
    return "unknown";
  }
}

/** Package version, or "unknown" when package.json cannot be read */
export const VERSION = readVersion();

/**
 * User-Agent sent with every API request.
 *
 * @example
 * buildUserAgent() // => 'bitbucket-code-search/0.1.0'
 */
export function buildUserAgent(): string {
  return `bitbucket-code-search/${VERSION}`;
}

/**
 * Get current timestamp in ISO format
 */
export function isoTimestamp(date: Date = new Date()): string {
  return date.toISOString();
}

/**
 * Cap text at maxChars characters, noting how much was cut.
 *
 * Returns the text unchanged when maxChars is undefined or not exceeded.
 *
 * @example
 * truncateOutput("abcdef", 4) // => "abcd\n... [truncated 2 chars]"
 */
export function truncateOutput(text: string, maxChars?: number): string {
  if (maxChars === undefined || text.length <= maxChars) {
    return text;
  }
  const cut = text.length - maxChars;
  return `${text.slice(0, maxChars)}\n... [truncated ${cut} chars]`;
}
