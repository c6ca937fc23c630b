#!/usr/bin/env node
/**
 * CLI entry point for agent-os-setup.
 * @module cli
 */

import { cac, type CAC } from "cac";
import { handleError } from "./utils/index.js";
import { registerInstallCommand } from "./commands/index.js";
import { VERSION } from "../version.js";

/**
 * Create and configure the CLI.
 */
export function createCLI(): CAC {
  const cli = cac("agent-os-setup");

  registerInstallCommand(cli);

  cli.help();
  cli.version(VERSION);

  return cli;
}

/**
 * Run the CLI.
 */
async function main(): Promise<void> {
  const cli = createCLI();

  try {
    cli.parse(process.argv, { run: false });
    await cli.runMatchedCommand();
  } catch (error) {
    handleError(error);
  }
}

main().catch((error) => {
  handleError(error);
});
