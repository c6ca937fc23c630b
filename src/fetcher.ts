/**
 * Fetcher capability and its HTTPS implementation.
 * @module fetcher
 */

import {
  ProvisionError,
  createErrorFromNetworkFailure,
  createErrorFromResponse,
} from "./errors.js";

/**
 * Retrieves the bytes behind a URL.
 *
 * Implementations reject with a ProvisionError and never resolve with the
 * body of an error page.
 */
export interface Fetcher {
  fetch(url: string): Promise<Uint8Array>;
}

/**
 * Options for HttpFetcher.
 */
export interface HttpFetcherOptions {
  /** Per-request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** User-Agent header value */
  userAgent?: string;
}

const DEFAULT_TIMEOUT = 30_000;

/**
 * Fetcher backed by the global fetch(). Follows redirects and turns
 * non-2xx responses into ProvisionErrors.
 *
 * @example
 * ```typescript
 * const fetcher = new HttpFetcher({ timeout: 10_000 });
 * const bytes = await fetcher.fetch(`${baseUrl}/config.yml`);
 * ```
 */
export class HttpFetcher implements Fetcher {
  private readonly timeout: number;
  private readonly userAgent?: string;

  constructor(options: HttpFetcherOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    if (options.userAgent !== undefined) {
      this.userAgent = options.userAgent;
    }
  }

  async fetch(url: string): Promise<Uint8Array> {
    const headers: Record<string, string> = {
      Accept: "text/plain, */*",
    };
    if (this.userAgent) {
      headers["User-Agent"] = this.userAgent;
    }

    try {
      const response = await fetch(url, {
        method: "GET",
        headers,
        redirect: "follow",
        signal: AbortSignal.timeout(this.timeout),
      });

      if (!response.ok) {
        throw createErrorFromResponse(response, url);
      }

      return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      if (ProvisionError.isProvisionError(error)) {
        throw error;
      }

      throw createErrorFromNetworkFailure(
        error instanceof Error ? error : new Error(String(error)),
        url,
      );
    }
  }
}
