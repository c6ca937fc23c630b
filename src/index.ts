/**
 * agent-os-setup - installs the Agent OS base files from a remote content
 * host and switches integration flags in the downloaded config.
 *
 * @example
 * ```typescript
 * import { HttpFetcher, install, loadConfig } from 'agent-os-setup';
 *
 * const config = await loadConfig();
 * const result = await install(
 *   {
 *     installDir: '/home/me/.agent-os',
 *     baseUrl: config.baseUrl,
 *     overwrite: { instructions: false, standards: false, config: false },
 *     integrations: { claudeCode: true, cursor: false, githubCopilot: false },
 *   },
 *   { fetcher: new HttpFetcher({ timeout: config.timeout }) },
 * );
 * ```
 *
 * @packageDocumentation
 */

// Core engine
export { Provisioner, isFatal } from "./provisioner.js";
export type { ProvisionerOptions } from "./provisioner.js";
export { FlagPatcher, patchFlagLines } from "./flags.js";
export type { LinePatch } from "./flags.js";

// Capabilities
export { HttpFetcher } from "./fetcher.js";
export type { Fetcher, HttpFetcherOptions } from "./fetcher.js";
export { NodeFileSystem } from "./fs.js";
export type { FileSystem } from "./fs.js";

// Orchestration
export { Installer, install, createInstallOptions } from "./installer.js";
export type { InstallerDeps } from "./installer.js";
export {
  AGENT_TEMPLATES,
  PROMPT_COMMANDS,
  CONFIG_FILE,
  INTEGRATION_FLAGS,
  buildManifest,
  buildOverwritePolicy,
  buildFlagSet,
} from "./manifest.js";

// Configuration
export { loadConfig, getDefaultConfig, DEFAULT_BASE_URL } from "./config.js";
export type { PartialConfig } from "./config.js";

// Events
export { TypedEventEmitter } from "./events.js";
export type { ProvisionEventMap, ProvisionEventName } from "./events.js";

// Errors
export {
  ProvisionError,
  createErrorFromResponse,
  createErrorFromNetworkFailure,
  createErrorFromFsFailure,
} from "./errors.js";

// Types
export { ProvisionErrorCode, ARTIFACT_CATEGORIES } from "./types.js";
export type {
  Artifact,
  ArtifactCategory,
  FetchResult,
  FetchStatus,
  FlagPatchResult,
  FlagSet,
  InstallOptions,
  InstallResult,
  IntegrationOptions,
  Manifest,
  OverwriteOptions,
  OverwritePolicy,
  SetupConfig,
} from "./types.js";

export { VERSION } from "./version.js";
