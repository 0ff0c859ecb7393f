/**
 * Bitbucket Source - Searches code in a Bitbucket Cloud workspace
 *
 * Wraps `GET /workspaces/{workspace}/search/code`. The endpoint takes the
 * raw query in `search_query` and a 1-based `page` index for pages after
 * the first.
 *
 * @module sources/bitbucket
 */

import type { BitbucketCredentials } from "../core/config.js";
import { BitbucketApiError } from "../core/errors.js";
import type { SearchPage } from "../core/types.js";
import { buildUserAgent } from "../core/utils.js";
import type { CodeSearchSource } from "./types.js";

export const DEFAULT_BITBUCKET_URL = "https://api.bitbucket.org/2.0";

/** Configuration for BitbucketSearchSource */
export interface BitbucketSearchSourceConfig {
  /** Workspace slug */
  workspace: string;
  /** Username and app password. Empty username sends no Authorization header. */
  credentials: BitbucketCredentials;
  /** Bitbucket API base URL. Defaults to https://api.bitbucket.org/2.0 */
  baseUrl?: string;
  /** fetch implementation. Defaults to the global fetch. */
  fetch?: typeof fetch;
}

export class BitbucketSearchSource implements CodeSearchSource {
  readonly type = "bitbucket" as const;
  readonly workspace: string;
  readonly baseUrl: string;
  private readonly credentials: BitbucketCredentials;
  private readonly fetchImpl: typeof fetch;

  constructor(config: BitbucketSearchSourceConfig) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BITBUCKET_URL).replace(/\/$/, "");
    this.workspace = config.workspace;
    this.credentials = config.credentials;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Make an authenticated GET request to the Bitbucket API
   */
  private async apiRequest<T>(path: string): Promise<T> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      "User-Agent": buildUserAgent(),
    };
    if (this.credentials.username) {
      const basic = Buffer.from(
        `${this.credentials.username}:${this.credentials.password}`
      ).toString("base64");
      headers.Authorization = `Basic ${basic}`;
    }

    const response = await this.fetchImpl(`${this.baseUrl}${path}`, { headers });

    if (!response.ok) {
      throw new BitbucketApiError(response.status, response.statusText, path);
    }

    return (await response.json()) as T;
  }

  async searchCode(query: string, page: number = 1): Promise<SearchPage> {
    const params = new URLSearchParams({ search_query: query });
    if (page > 1) {
      params.set("page", String(page));
    }
    return this.apiRequest<SearchPage>(
      `/workspaces/${encodeURIComponent(this.workspace)}/search/code?${params.toString()}`
    );
  }
}
