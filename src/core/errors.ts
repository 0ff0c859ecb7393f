/**
 * Error types raised by the search pipeline and the CLI.
 *
 * Transport and model failures are not wrapped here: they propagate from
 * `fetch` and the AI SDK unchanged.
 *
 * @module core/errors
 */

/**
 * Invalid or missing user input, raised before any network activity.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Non-2xx response from the Bitbucket REST API.
 */
export class BitbucketApiError extends Error {
  readonly status: number;
  readonly statusText: string;
  /** Request path relative to the API base URL */
  readonly path: string;

  constructor(status: number, statusText: string, path: string) {
    super(`Bitbucket API error: ${status} ${statusText} for ${path}`);
    this.name = "BitbucketApiError";
    this.status = status;
    this.statusText = statusText;
    this.path = path;
  }
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
