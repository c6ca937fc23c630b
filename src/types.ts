/**
 * Type definitions for agent-os-setup.
 * @module types
 */

import type { ProvisionError } from "./errors.js";

// ============================================
// Error Codes
// ============================================

/**
 * Error codes for ProvisionError.
 */
export const ProvisionErrorCode = {
  /** Remote 404 or missing local file */
  NOT_FOUND: "NOT_FOUND",
  /** Destination not writable, or outside the install root */
  PERMISSION_DENIED: "PERMISSION_DENIED",
  /** Transport-level failure (DNS, refused connection, reset) */
  NETWORK_ERROR: "NETWORK_ERROR",
  /** Transport timeout elapsed */
  TIMEOUT: "TIMEOUT",
  /** Any other non-2xx response */
  HTTP_ERROR: "HTTP_ERROR",
  /** Any other filesystem failure */
  FILESYSTEM_ERROR: "FILESYSTEM_ERROR",
  /** Config section for a flag is missing */
  SECTION_NOT_FOUND: "SECTION_NOT_FOUND",
  /** Config section exists but has no `enabled:` line */
  FLAG_NOT_FOUND: "FLAG_NOT_FOUND",
} as const;

export type ProvisionErrorCode =
  (typeof ProvisionErrorCode)[keyof typeof ProvisionErrorCode];

// ============================================
// Artifacts
// ============================================

/** Artifact categories, each governed by one overwrite policy entry */
export const ARTIFACT_CATEGORIES = [
  "instructions",
  "standards",
  "config",
  "agentTemplate",
  "promptTemplate",
  "projectScript",
] as const;

export type ArtifactCategory = (typeof ARTIFACT_CATEGORIES)[number];

/**
 * One remote-to-local file mapping.
 */
export interface Artifact {
  /** Absolute URL of the remote file */
  readonly remoteUrl: string;
  /** Absolute destination path */
  readonly localPath: string;
  /** Category that selects the overwrite policy */
  readonly category: ArtifactCategory;
  /** Set the executable bits after writing */
  readonly executable: boolean;
  /** Failure aborts the whole run */
  readonly critical: boolean;
  /** Install-root-relative path, used for progress output */
  readonly label: string;
}

/** Ordered artifacts for one run */
export type Manifest = readonly Artifact[];

/**
 * Per-category overwrite switch. `true` means an existing file is replaced.
 */
export type OverwritePolicy = Readonly<Record<ArtifactCategory, boolean>>;

// ============================================
// Results
// ============================================

/** Outcome of provisioning one artifact */
export type FetchResult =
  | { readonly status: "written"; readonly artifact: Artifact }
  | { readonly status: "skipped"; readonly artifact: Artifact }
  | {
      readonly status: "failed";
      readonly artifact: Artifact;
      readonly cause: ProvisionError;
    };

export type FetchStatus = FetchResult["status"];

/** Desired flag values, applied in insertion order */
export type FlagSet = ReadonlyMap<string, boolean>;

/** Outcome of patching one flag */
export type FlagPatchResult =
  | {
      readonly flag: string;
      readonly value: boolean;
      readonly status: "updated" | "unchanged";
    }
  | {
      readonly flag: string;
      readonly value: boolean;
      readonly status: "failed";
      readonly cause: ProvisionError;
    };

// ============================================
// Install Options
// ============================================

/** Integrations that can be enabled on the command line */
export interface IntegrationOptions {
  claudeCode: boolean;
  cursor: boolean;
  githubCopilot: boolean;
}

/** Overwrite switches from the command line */
export interface OverwriteOptions {
  instructions: boolean;
  standards: boolean;
  config: boolean;
}

/**
 * Immutable record describing one installation run.
 */
export interface InstallOptions {
  /** Absolute path of the install root (e.g. `<cwd>/.agent-os`) */
  readonly installDir: string;
  /** Remote base URL without trailing slash */
  readonly baseUrl: string;
  readonly overwrite: Readonly<OverwriteOptions>;
  readonly integrations: Readonly<IntegrationOptions>;
}

/**
 * Result of a full installation run.
 */
export interface InstallResult {
  installDir: string;
  results: FetchResult[];
  flags: FlagPatchResult[];
  /** True when a fatal failure stopped the run */
  aborted: boolean;
  /** The fatal failure, when aborted */
  abortReason?: ProvisionError;
}

// ============================================
// Configuration
// ============================================

/**
 * Settings resolved by loadConfig().
 */
export interface SetupConfig {
  /** Remote content base URL */
  baseUrl: string;
  /** Name of the install directory created under the project path */
  installDirName: string;
  /** Per-request timeout in milliseconds */
  timeout: number;
  /** User-Agent header sent with every request */
  userAgent: string;
}
