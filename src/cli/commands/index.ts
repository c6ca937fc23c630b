/**
 * CLI command exports.
 * @module cli/commands
 */

export {
  registerInstallCommand,
  runInstall,
  integrationsFrom,
  overwriteFrom,
} from "./install.js";
export type { InstallCommandOptions, InstallCommandDeps } from "./install.js";
