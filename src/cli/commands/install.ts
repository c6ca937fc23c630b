/**
 * CLI install command - installs the Agent OS base files.
 * @module cli/commands/install
 */

import { join, resolve } from "node:path";
import type { CAC } from "cac";
import { loadConfig, type PartialConfig } from "../../config.js";
import { HttpFetcher, type Fetcher } from "../../fetcher.js";
import { Installer, createInstallOptions } from "../../installer.js";
import type {
  IntegrationOptions,
  OverwriteOptions,
  SetupConfig,
} from "../../types.js";
import {
  CLIError,
  ExitCode,
  exitCodeFor,
  formatFetchResult,
  formatInstallSummary,
  handleError,
  info,
  output,
  summarizeInstall,
  warn,
  type InstallSummary,
} from "../utils/index.js";

/**
 * Parsed command-line options. Aliases are listed separately because the
 * parser only copies values between aliases spelled without hyphens.
 */
export interface InstallCommandOptions {
  overwriteInstructions?: boolean;
  overwriteStandards?: boolean;
  overwriteConfig?: boolean;
  claudeCode?: boolean;
  claude?: boolean;
  claude_code?: boolean;
  cursor?: boolean;
  cursorCli?: boolean;
  githubCopilot?: boolean;
  /** cac hands numeric-looking values over as numbers */
  installDir?: string | number;
  baseUrl?: string;
  timeout?: number | string;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Capabilities that tests may replace.
 */
export interface InstallCommandDeps {
  /** Directory the install root is created in (default: process.cwd()) */
  cwd?: string;
  /** Factory for the fetcher (default: HttpFetcher from config) */
  createFetcher?: (config: { timeout: number; userAgent: string }) => Fetcher;
}

/**
 * Resolve the integration switches, whichever alias was used.
 */
export function integrationsFrom(
  options: InstallCommandOptions,
): IntegrationOptions {
  return {
    claudeCode:
      options.claudeCode === true ||
      options.claude === true ||
      options.claude_code === true,
    cursor: options.cursor === true || options.cursorCli === true,
    githubCopilot: options.githubCopilot === true,
  };
}

/**
 * Resolve the overwrite switches.
 */
export function overwriteFrom(options: InstallCommandOptions): OverwriteOptions {
  return {
    instructions: options.overwriteInstructions === true,
    standards: options.overwriteStandards === true,
    config: options.overwriteConfig === true,
  };
}

function configOverrides(options: InstallCommandOptions): PartialConfig {
  const overrides: PartialConfig = {};
  if (options.baseUrl !== undefined) {
    overrides.baseUrl = String(options.baseUrl);
  }
  if (options.timeout !== undefined) {
    overrides.timeout = Number(options.timeout);
  }
  return overrides;
}

/**
 * Run the installation and print progress and summary.
 *
 * @throws {CLIError} On invalid configuration or a fatal provisioning failure
 */
export async function runInstall(
  options: InstallCommandOptions,
  deps: InstallCommandDeps = {},
): Promise<InstallSummary> {
  const cwd = deps.cwd ?? process.cwd();

  let config: SetupConfig;
  try {
    config = await loadConfig(cwd, configOverrides(options));
  } catch (error) {
    throw new CLIError(
      error instanceof Error ? error.message : String(error),
      ExitCode.CONFIG_ERROR,
      "Check .agentosrc, AGENT_OS_* environment variables and --base-url/--timeout",
    );
  }

  const installDir =
    options.installDir !== undefined
      ? resolve(cwd, String(options.installDir))
      : join(cwd, config.installDirName);

  const installOptions = createInstallOptions({
    installDir,
    baseUrl: config.baseUrl,
    overwrite: overwriteFrom(options),
    integrations: integrationsFrom(options),
  });

  const fetcher = deps.createFetcher
    ? deps.createFetcher(config)
    : new HttpFetcher({ timeout: config.timeout, userAgent: config.userAgent });

  const installer = new Installer(installOptions, { fetcher });
  const progress = (line: string): void => info(line, options);
  installer.provisioner.on("artifact:written", (r) => progress(formatFetchResult(r)));
  installer.provisioner.on("artifact:skipped", (r) => progress(formatFetchResult(r)));
  installer.provisioner.on("artifact:failed", (r) => progress(formatFetchResult(r)));

  info(`Installing Agent OS base files into ${installDir}`, options);
  info(`Source: ${config.baseUrl}`, options);

  const result = await installer.run();
  const summary = summarizeInstall(result);

  for (const flag of summary.flags) {
    if (flag.status === "failed") {
      warn(
        `Could not enable ${flag.flag}; the config may be out of sync with this installer version`,
        options,
      );
    }
  }

  output(summary, formatInstallSummary, options);

  if (result.aborted && result.abortReason) {
    throw new CLIError(
      `Installation aborted: ${result.abortReason.message}`,
      exitCodeFor(result.abortReason),
      result.abortReason.isPermissionDenied
        ? `Check that ${installDir} is writable`
        : "Check your network connection and the --base-url setting",
    );
  }

  return summary;
}

/**
 * Register the install command as the default command.
 */
export function registerInstallCommand(cli: CAC): void {
  cli
    .command("", "Install Agent OS base files into ./.agent-os")
    .alias("install")
    .option("--overwrite-instructions", "Overwrite existing instruction files")
    .option("--overwrite-standards", "Overwrite existing standards files")
    .option("--overwrite-config", "Overwrite existing config.yml")
    .option("--claude-code, --claude, --claude_code", "Add Claude Code support")
    .option("--cursor, --cursor-cli", "Add Cursor support")
    .option("--github-copilot", "Add GitHub Copilot support")
    .option(
      "--install-dir <path>",
      "Install directory (default: ./.agent-os)",
    )
    .option("--base-url <url>", "Remote content base URL")
    .option("--timeout <ms>", "Per-request timeout in milliseconds")
    .option("--json", "Output as JSON")
    .option("--quiet", "Suppress output")
    .action(async (options: InstallCommandOptions) => {
      try {
        await runInstall(options);
      } catch (error) {
        handleError(error, options);
      }
    });
}
