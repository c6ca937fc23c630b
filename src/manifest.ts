/**
 * Static catalog of Agent OS files and the builders that expand it into
 * a manifest, an overwrite policy and a flag set.
 * @module manifest
 */

import { join } from "node:path";
import type {
  Artifact,
  ArtifactCategory,
  FlagSet,
  InstallOptions,
  IntegrationOptions,
  Manifest,
  OverwriteOptions,
  OverwritePolicy,
} from "./types.js";

// ============================================
// Catalog
// ============================================

/** Claude Code agent templates */
export const AGENT_TEMPLATES = [
  "context-fetcher",
  "date-checker",
  "file-creator",
  "git-workflow",
  "project-manager",
  "test-runner",
] as const;

/** Prompt commands, shared by command templates and Copilot prompts */
export const PROMPT_COMMANDS = [
  "analyze-product",
  "create-spec",
  "create-tasks",
  "execute-tasks",
  "plan-product",
] as const;

const CORE_INSTRUCTIONS = [
  "analyze-product",
  "create-spec",
  "create-tasks",
  "execute-task",
  "execute-tasks",
  "plan-product",
  "post-execution-tasks",
] as const;

const META_INSTRUCTIONS = ["pre-flight", "post-flight"] as const;

const STANDARDS = ["tech-stack", "code-style", "best-practices"] as const;

const CODE_STYLE_STANDARDS = [
  "css-style",
  "html-style",
  "javascript-style",
] as const;

/** Config file name inside the install root */
export const CONFIG_FILE = "config.yml";

/** Project setup script, relative to the install root */
export const PROJECT_SCRIPT = "setup/project.sh";

/** Shell helpers the project script sources */
export const FUNCTIONS_SCRIPT = "setup/functions.sh";

/** Config sections switched on per integration */
export const INTEGRATION_FLAGS: Record<keyof IntegrationOptions, string> = {
  claudeCode: "claude_code",
  githubCopilot: "github_copilot",
  cursor: "cursor",
};

// ============================================
// Builders
// ============================================

interface CatalogEntry {
  /** Path relative to the base URL */
  remote: string;
  /** Path relative to the install root (default: same as remote) */
  local?: string;
  category: ArtifactCategory;
  executable?: boolean;
  critical?: boolean;
}

function toArtifact(entry: CatalogEntry, options: InstallOptions): Artifact {
  const label = entry.local ?? entry.remote;
  return Object.freeze({
    remoteUrl: `${options.baseUrl}/${entry.remote}`,
    localPath: join(options.installDir, ...label.split("/")),
    category: entry.category,
    executable: entry.executable ?? false,
    critical: entry.critical ?? false,
    label,
  });
}

/**
 * Files every installation needs: instructions, standards and command
 * templates. All of them are critical.
 * @internal
 */
function baseFiles(): CatalogEntry[] {
  const entries: CatalogEntry[] = [];

  for (const name of CORE_INSTRUCTIONS) {
    entries.push({ remote: `instructions/core/${name}.md`, category: "instructions" });
  }
  for (const name of META_INSTRUCTIONS) {
    entries.push({ remote: `instructions/meta/${name}.md`, category: "instructions" });
  }
  for (const name of STANDARDS) {
    entries.push({ remote: `standards/${name}.md`, category: "standards" });
  }
  for (const name of CODE_STYLE_STANDARDS) {
    entries.push({ remote: `standards/code-style/${name}.md`, category: "standards" });
  }
  // Command templates follow the instructions overwrite switch
  for (const name of PROMPT_COMMANDS) {
    entries.push({ remote: `commands/${name}.md`, category: "instructions" });
  }

  return entries.map((entry) => ({ ...entry, critical: true }));
}

/**
 * Expand the catalog into the ordered manifest for one run.
 *
 * Order: functions bootstrap, base files, config, project script, then the
 * optional Claude Code agents and Copilot prompts.
 */
export function buildManifest(options: InstallOptions): Manifest {
  const entries: CatalogEntry[] = [
    { remote: FUNCTIONS_SCRIPT, category: "projectScript", critical: true },
    ...baseFiles(),
    { remote: CONFIG_FILE, category: "config" },
    { remote: PROJECT_SCRIPT, category: "projectScript", executable: true },
  ];

  if (options.integrations.claudeCode) {
    for (const agent of AGENT_TEMPLATES) {
      entries.push({
        remote: `claude-code/agents/${agent}.md`,
        category: "agentTemplate",
      });
    }
  }

  if (options.integrations.githubCopilot) {
    for (const cmd of PROMPT_COMMANDS) {
      entries.push({
        remote: `.github/prompts/${cmd}.md`,
        local: `github-copilot-prompts/${cmd}.prompt.md`,
        category: "promptTemplate",
      });
    }
  }

  return Object.freeze(entries.map((entry) => toArtifact(entry, options)));
}

/**
 * Build the overwrite policy from the command-line switches.
 *
 * `projectScript` is always overwritten so the setup scripts match the
 * installed version; templates are never overwritten.
 */
export function buildOverwritePolicy(
  overwrite: Readonly<OverwriteOptions>,
): OverwritePolicy {
  return Object.freeze({
    instructions: overwrite.instructions,
    standards: overwrite.standards,
    config: overwrite.config,
    agentTemplate: false,
    promptTemplate: false,
    projectScript: true,
  });
}

/**
 * Map requested integrations to the config flags they switch on.
 */
export function buildFlagSet(
  integrations: Readonly<IntegrationOptions>,
): FlagSet {
  const flags = new Map<string, boolean>();
  const order: (keyof IntegrationOptions)[] = [
    "claudeCode",
    "githubCopilot",
    "cursor",
  ];

  for (const key of order) {
    if (integrations[key]) {
      flags.set(INTEGRATION_FLAGS[key], true);
    }
  }

  return flags;
}
