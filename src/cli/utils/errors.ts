/**
 * CLI error handling utilities.
 * @module cli/utils/errors
 */

import type { ProvisionError } from "../../errors.js";

// ============================================
// Exit Codes
// ============================================

/**
 * CLI exit codes.
 */
export const ExitCode = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  CONFIG_ERROR: 2,
  CONNECTION_ERROR: 3,
  FILESYSTEM_ERROR: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

// ============================================
// CLI Error Class
// ============================================

/**
 * CLI-specific error with exit code and optional hint.
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly code: ExitCode = ExitCode.GENERAL_ERROR,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = "CLIError";
  }
}

/**
 * Pick the exit code for a fatal provisioning failure.
 *
 * Anything that came back from the content host maps to CONNECTION_ERROR,
 * local failures to FILESYSTEM_ERROR.
 */
export function exitCodeFor(error: ProvisionError): ExitCode {
  if (error.statusCode !== undefined || error.isNetworkError) {
    return ExitCode.CONNECTION_ERROR;
  }
  return ExitCode.FILESYSTEM_ERROR;
}

// ============================================
// Error Handler
// ============================================

/**
 * Convert any thrown value to a CLIError. Argument parser errors become
 * usage errors with a pointer to --help.
 * @internal
 */
function toCLIError(error: unknown): CLIError {
  if (error instanceof CLIError) {
    return error;
  }
  if (error instanceof Error && error.name === "CACError") {
    return new CLIError(
      error.message,
      ExitCode.GENERAL_ERROR,
      "Use --help for usage information",
    );
  }
  return new CLIError(
    error instanceof Error ? error.message : String(error),
    ExitCode.GENERAL_ERROR,
  );
}

/**
 * Handle CLI errors consistently.
 *
 * @param error - The error to handle
 * @param options - Output options
 */
export function handleError(
  error: unknown,
  options: { json?: boolean } = {},
): never {
  const cliError = toCLIError(error);

  if (options.json) {
    console.error(
      JSON.stringify({
        error: cliError.message,
        code: cliError.code,
        hint: cliError.hint,
      }),
    );
  } else {
    console.error(`Error: ${cliError.message}`);
    if (cliError.hint) {
      console.error(`Hint: ${cliError.hint}`);
    }
  }

  process.exit(cliError.code);
}
