/**
 * Error handling for agent-os-setup provisioning.
 * @module errors
 */

import type { ProvisionErrorCode } from "./types.js";

/**
 * Error raised by the fetcher, the filesystem layer and the flag patcher.
 *
 * Carries a code for programmatic handling and preserves the cause for
 * debugging.
 *
 * @example
 * ```typescript
 * const result = await provisioner.provision(artifact, policy);
 * if (result.status === "failed" && result.cause.isNotFound) {
 *   console.error(`Missing upstream: ${result.artifact.remoteUrl}`);
 * }
 * ```
 */
export class ProvisionError extends Error {
  /** Error code for programmatic handling */
  readonly code: ProvisionErrorCode;

  /** HTTP status code if this was an HTTP error */
  readonly statusCode?: number;

  /** URL or filesystem path the error refers to */
  readonly path?: string;

  constructor(
    message: string,
    code: ProvisionErrorCode,
    options: {
      cause?: Error;
      statusCode?: number;
      path?: string;
    } = {},
  ) {
    super(message, { cause: options.cause });

    // Fix prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = "ProvisionError";
    this.code = code;
    if (options.statusCode !== undefined) {
      this.statusCode = options.statusCode;
    }
    if (options.path !== undefined) {
      this.path = options.path;
    }
  }

  /**
   * Type guard to check if an error is a ProvisionError.
   */
  static isProvisionError(error: unknown): error is ProvisionError {
    return error instanceof ProvisionError;
  }

  get isNotFound(): boolean {
    return this.code === "NOT_FOUND";
  }

  get isPermissionDenied(): boolean {
    return this.code === "PERMISSION_DENIED";
  }

  /** Timeouts count as network errors */
  get isNetworkError(): boolean {
    return (
      this.code === "NETWORK_ERROR" ||
      this.code === "TIMEOUT" ||
      this.code === "HTTP_ERROR"
    );
  }

  get isTimeout(): boolean {
    return this.code === "TIMEOUT";
  }

  /** Config schema drift: the section or its flag line is missing */
  get isSchemaDrift(): boolean {
    return this.code === "SECTION_NOT_FOUND" || this.code === "FLAG_NOT_FOUND";
  }
}

/**
 * Create a ProvisionError from a non-2xx HTTP response.
 * @internal
 */
export function createErrorFromResponse(
  response: Response,
  url: string,
): ProvisionError {
  const status = response.status;
  const statusText = response.statusText || "Request failed";

  switch (status) {
    case 404:
      return new ProvisionError(`Not found: ${url}`, "NOT_FOUND", {
        statusCode: status,
        path: url,
      });

    case 401:
    case 403:
      return new ProvisionError(
        `Access denied (${status}): ${url}`,
        "HTTP_ERROR",
        { statusCode: status, path: url },
      );

    case 408:
    case 504:
      return new ProvisionError(
        `Upstream timed out (${status}): ${url}`,
        "TIMEOUT",
        { statusCode: status, path: url },
      );

    default:
      return new ProvisionError(
        `HTTP error (${status} ${statusText}): ${url}`,
        "HTTP_ERROR",
        { statusCode: status, path: url },
      );
  }
}

/**
 * Create a ProvisionError from a failed fetch() call.
 * @internal
 */
export function createErrorFromNetworkFailure(
  error: Error,
  url: string,
): ProvisionError {
  // Timeout via AbortSignal.timeout()
  if (error.name === "TimeoutError") {
    return new ProvisionError(`Request timed out: ${url}`, "TIMEOUT", {
      cause: error,
      path: url,
    });
  }

  if (error.name === "AbortError") {
    return new ProvisionError(`Request was cancelled: ${url}`, "NETWORK_ERROR", {
      cause: error,
      path: url,
    });
  }

  return new ProvisionError(
    `Network error fetching ${url}: ${error.message}`,
    "NETWORK_ERROR",
    { cause: error, path: url },
  );
}

/**
 * Read the `code` property Node attaches to system errors.
 * @internal
 */
function systemErrorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Create a ProvisionError from a failed filesystem call.
 * @internal
 */
export function createErrorFromFsFailure(
  error: unknown,
  path: string,
): ProvisionError {
  if (ProvisionError.isProvisionError(error)) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));

  switch (systemErrorCode(cause)) {
    case "ENOENT":
      return new ProvisionError(`No such file: ${path}`, "NOT_FOUND", {
        cause,
        path,
      });

    case "EACCES":
    case "EPERM":
    case "EROFS":
      return new ProvisionError(`Permission denied: ${path}`, "PERMISSION_DENIED", {
        cause,
        path,
      });

    default:
      return new ProvisionError(
        `Filesystem error at ${path}: ${cause.message}`,
        "FILESYSTEM_ERROR",
        { cause, path },
      );
  }
}
