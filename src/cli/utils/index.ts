/**
 * CLI utility exports.
 * @module cli/utils
 */

export { CLIError, ExitCode, exitCodeFor, handleError } from "./errors.js";
export type { ExitCode as ExitCodeType } from "./errors.js";

export {
  output,
  info,
  warn,
  summarizeInstall,
  formatFetchResult,
  formatInstallSummary,
} from "./output.js";
export type { OutputOptions, InstallSummary } from "./output.js";
