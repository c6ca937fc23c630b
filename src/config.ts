/**
 * Configuration loading for agent-os-setup.
 * Uses Zod schemas for validation and deep merging.
 * @module config
 */

import { readFile } from "node:fs/promises";
import { isAbsolute, join } from "node:path";
import { z } from "zod";
import type { SetupConfig } from "./types.js";
import { VERSION } from "./version.js";

// ============================================
// Zod Schemas
// ============================================

const configSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .refine((url) => /^https?:\/\//.test(url), {
      message: "must be an http(s) URL",
    })
    .transform((url) => url.replace(/\/+$/, "")),
  installDirName: z
    .string()
    .min(1)
    .refine((name) => !isAbsolute(name) && !name.split(/[\\/]/).includes(".."), {
      message: "must be a relative directory name",
    }),
  timeout: z.number().int().positive(),
  userAgent: z.string().min(1),
});

// ============================================
// Defaults
// ============================================

/** Raw content of the Agent OS repository's main branch */
export const DEFAULT_BASE_URL =
  "https://raw.githubusercontent.com/buildermethods/agent-os/main";

const DEFAULT_CONFIG: SetupConfig = {
  baseUrl: DEFAULT_BASE_URL,
  installDirName: ".agent-os",
  timeout: 30_000,
  userAgent: `agent-os-setup/${VERSION}`,
};

export type PartialConfig = Partial<SetupConfig>;

// ============================================
// File Loaders
// ============================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read and parse a JSON file. Returns undefined if the file doesn't exist;
 * malformed JSON is an error.
 * @internal
 */
async function readJsonFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch {
    return undefined;
  }

  try {
    return JSON.parse(content) as unknown;
  } catch (error) {
    throw new Error(
      `Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

/**
 * Load configuration from the package.json "agentOs" key.
 * @internal
 */
async function loadPackageJsonConfig(
  projectPath: string,
): Promise<Record<string, unknown> | undefined> {
  const pkg = await readJsonFile(join(projectPath, "package.json"));

  if (isPlainObject(pkg) && isPlainObject(pkg["agentOs"])) {
    return pkg["agentOs"];
  }

  return undefined;
}

/**
 * Load configuration from the .agentosrc file.
 * @internal
 */
async function loadRcConfig(
  projectPath: string,
): Promise<Record<string, unknown> | undefined> {
  const rc = await readJsonFile(join(projectPath, ".agentosrc"));
  return isPlainObject(rc) ? rc : undefined;
}

// ============================================
// Environment Variables
// ============================================

/**
 * Build a partial config from environment variables.
 * @internal
 */
function getEnvConfig(): Record<string, unknown> {
  const partial: Record<string, unknown> = {};

  const baseUrl = process.env["AGENT_OS_BASE_URL"];
  if (baseUrl) {
    partial["baseUrl"] = baseUrl;
  }

  const timeout = process.env["AGENT_OS_TIMEOUT"];
  if (timeout) {
    // Left as NaN when unparsable so validation reports it
    partial["timeout"] = Number(timeout);
  }

  return partial;
}

// ============================================
// Public API
// ============================================

/**
 * Load configuration from multiple sources with priority order:
 *
 * 1. Explicit overrides (highest priority)
 * 2. Environment variables
 * 3. .agentosrc file
 * 4. package.json "agentOs" key
 * 5. Default values (lowest priority)
 *
 * @param projectPath - Directory to look for config files (default: process.cwd())
 * @param overrides - Explicit configuration overrides, e.g. from CLI flags
 * @throws {Error} If the merged configuration is invalid
 *
 * @example
 * ```typescript
 * const config = await loadConfig(process.cwd(), { timeout: 10_000 });
 * ```
 */
export async function loadConfig(
  projectPath: string = process.cwd(),
  overrides: PartialConfig = {},
): Promise<SetupConfig> {
  const sources: Record<string, unknown>[] = [];

  const pkgConfig = await loadPackageJsonConfig(projectPath);
  if (pkgConfig) {
    sources.push(pkgConfig);
  }

  const rcConfig = await loadRcConfig(projectPath);
  if (rcConfig) {
    sources.push(rcConfig);
  }

  sources.push(getEnvConfig());
  sources.push({ ...overrides });

  let merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) {
        merged = { ...merged, [key]: value };
      }
    }
  }

  const parseResult = configSchema.safeParse(merged);

  if (!parseResult.success) {
    throw new Error(
      `Invalid configuration: ${parseResult.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`,
    );
  }

  return parseResult.data;
}

/**
 * Get default configuration without loading from files.
 */
export function getDefaultConfig(): SetupConfig {
  return { ...DEFAULT_CONFIG };
}
