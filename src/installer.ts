/**
 * Installer - runs one Agent OS base installation.
 * @module installer
 */

import { join } from "node:path";
import { ProvisionError, createErrorFromFsFailure } from "./errors.js";
import type { Fetcher } from "./fetcher.js";
import { FlagPatcher } from "./flags.js";
import { NodeFileSystem, type FileSystem } from "./fs.js";
import {
  CONFIG_FILE,
  buildFlagSet,
  buildManifest,
  buildOverwritePolicy,
} from "./manifest.js";
import { Provisioner, isFatal } from "./provisioner.js";
import type {
  FlagPatchResult,
  FlagSet,
  InstallOptions,
  InstallResult,
} from "./types.js";

/**
 * Capabilities the installer runs on.
 */
export interface InstallerDeps {
  fetcher: Fetcher;
  /** Filesystem implementation (default: NodeFileSystem) */
  fs?: FileSystem;
}

/**
 * Build an immutable InstallOptions record.
 */
export function createInstallOptions(options: InstallOptions): InstallOptions {
  return Object.freeze({
    installDir: options.installDir,
    baseUrl: options.baseUrl,
    overwrite: Object.freeze({ ...options.overwrite }),
    integrations: Object.freeze({ ...options.integrations }),
  });
}

/**
 * Orchestrates the provisioner and the flag patcher for one run.
 *
 * Attach progress listeners to {@link Installer.provisioner} before calling
 * {@link Installer.run}.
 *
 * @example
 * ```typescript
 * const installer = new Installer(options, { fetcher: new HttpFetcher() });
 * installer.provisioner.on("artifact:failed", (r) => warn(r.cause.message));
 * const result = await installer.run();
 * ```
 */
export class Installer {
  readonly provisioner: Provisioner;
  private readonly options: InstallOptions;
  private readonly fs: FileSystem;
  private readonly flagPatcher: FlagPatcher;

  constructor(options: InstallOptions, deps: InstallerDeps) {
    this.options = createInstallOptions(options);
    this.fs = deps.fs ?? new NodeFileSystem();
    this.provisioner = new Provisioner({
      fetcher: deps.fetcher,
      fs: this.fs,
      root: this.options.installDir,
    });
    this.flagPatcher = new FlagPatcher(this.fs);
  }

  /**
   * Provision every artifact, then enable the requested integration flags.
   *
   * Flags are not touched when the run aborts.
   */
  async run(): Promise<InstallResult> {
    const { installDir } = this.options;
    const result: InstallResult = {
      installDir,
      results: [],
      flags: [],
      aborted: false,
    };

    try {
      await this.fs.ensureDir(installDir);
      await this.fs.ensureDir(join(installDir, "setup"));
    } catch (error) {
      result.aborted = true;
      result.abortReason = createErrorFromFsFailure(error, installDir);
      return result;
    }

    const manifest = buildManifest(this.options);
    const policy = buildOverwritePolicy(this.options.overwrite);
    result.results = await this.provisioner.provisionAll(manifest, policy);

    const fatal = result.results.find(isFatal);
    if (fatal) {
      result.aborted = true;
      result.abortReason = fatal.cause;
      return result;
    }

    result.flags = await this.applyFlags(buildFlagSet(this.options.integrations));
    return result;
  }

  private async applyFlags(flags: FlagSet): Promise<FlagPatchResult[]> {
    if (flags.size === 0) {
      return [];
    }

    const configPath = join(this.options.installDir, CONFIG_FILE);
    if (await this.fs.exists(configPath)) {
      return this.flagPatcher.setFlags(configPath, flags);
    }

    return [...flags].map(([flag, value]) => ({
      flag,
      value,
      status: "failed" as const,
      cause: new ProvisionError(`No such file: ${configPath}`, "NOT_FOUND", {
        path: configPath,
      }),
    }));
  }
}

/**
 * Run one installation with the given options and capabilities.
 */
export async function install(
  options: InstallOptions,
  deps: InstallerDeps,
): Promise<InstallResult> {
  return new Installer(options, deps).run();
}
