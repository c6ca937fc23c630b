/**
 * CLI output utilities.
 * @module cli/utils/output
 */

import { join } from "node:path";
import type { FetchResult, FlagPatchResult, InstallResult } from "../../types.js";

// ============================================
// Output Options
// ============================================

/**
 * Output formatting options.
 */
export interface OutputOptions {
  /** Output as JSON */
  json?: boolean;
  /** Suppress output */
  quiet?: boolean;
}

// ============================================
// Output Function
// ============================================

/**
 * Output data in the appropriate format.
 *
 * @param data - Data to output
 * @param formatter - Function to format data for human-readable output
 * @param options - Output options
 */
export function output<T>(
  data: T,
  formatter: (data: T) => string,
  options: OutputOptions = {},
): void {
  if (options.quiet) return;

  if (options.json) {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(formatter(data));
  }
}

/**
 * Output to stderr (for messages that shouldn't interfere with piping).
 */
export function info(message: string, options: OutputOptions = {}): void {
  if (options.quiet) return;
  if (options.json) return; // Suppress info messages in JSON mode
  console.error(message);
}

/**
 * Output a warning to stderr.
 */
export function warn(message: string, options: OutputOptions = {}): void {
  if (options.quiet) return;
  if (options.json) return;
  console.error(`Warning: ${message}`);
}

// ============================================
// Install Summary
// ============================================

/**
 * Plain, JSON-friendly view of an InstallResult.
 */
export interface InstallSummary {
  installDir: string;
  aborted: boolean;
  abortReason?: { code: string; message: string };
  written: string[];
  skipped: string[];
  failed: { path: string; code: string; message: string }[];
  flags: { flag: string; status: FlagPatchResult["status"]; message?: string }[];
}

/**
 * Flatten an InstallResult into an InstallSummary.
 */
export function summarizeInstall(result: InstallResult): InstallSummary {
  const summary: InstallSummary = {
    installDir: result.installDir,
    aborted: result.aborted,
    written: [],
    skipped: [],
    failed: [],
    flags: [],
  };

  for (const r of result.results) {
    switch (r.status) {
      case "written":
        summary.written.push(r.artifact.label);
        break;
      case "skipped":
        summary.skipped.push(r.artifact.label);
        break;
      case "failed":
        summary.failed.push({
          path: r.artifact.label,
          code: r.cause.code,
          message: r.cause.message,
        });
        break;
    }
  }

  for (const f of result.flags) {
    summary.flags.push(
      f.status === "failed"
        ? { flag: f.flag, status: f.status, message: f.cause.message }
        : { flag: f.flag, status: f.status },
    );
  }

  if (result.abortReason) {
    summary.abortReason = {
      code: result.abortReason.code,
      message: result.abortReason.message,
    };
  }

  return summary;
}

// ============================================
// Formatters
// ============================================

/**
 * Format one provisioning result as a progress line.
 */
export function formatFetchResult(result: FetchResult): string {
  switch (result.status) {
    case "written":
      return `  ✓ ${result.artifact.label}`;
    case "skipped":
      return `  - ${result.artifact.label} (exists, kept)`;
    case "failed":
      return `  ✗ ${result.artifact.label}: ${result.cause.message}`;
  }
}

/**
 * Format an install summary for human-readable output.
 */
export function formatInstallSummary(summary: InstallSummary): string {
  const lines: string[] = [];
  const dir = summary.installDir;

  lines.push(
    summary.aborted
      ? `Agent OS base installation aborted: ${dir}`
      : `Agent OS base installation complete: ${dir}`,
  );
  lines.push(`  Written: ${summary.written.length}`);
  lines.push(`  Skipped: ${summary.skipped.length}`);
  lines.push(`  Failed:  ${summary.failed.length}`);

  if (summary.failed.length > 0) {
    lines.push("");
    lines.push("Not installed:");
    for (const f of summary.failed) {
      lines.push(`  - ${f.path} (${f.message})`);
    }
  }

  if (summary.flags.length > 0) {
    lines.push("");
    lines.push("Integrations:");
    for (const f of summary.flags) {
      if (f.status === "failed") {
        lines.push(`  ✗ ${f.flag} not enabled: ${f.message ?? "unknown error"}`);
      } else {
        lines.push(`  ✓ ${f.flag} enabled`);
      }
    }
  }

  if (!summary.aborted) {
    const projectScript = join(dir, "setup", "project.sh");
    lines.push("");
    lines.push("Next steps:");
    lines.push(`  1. Customize your standards in ${join(dir, "standards")}`);
    lines.push(`  2. Configure project types in ${join(dir, "config.yml")}`);
    lines.push(`  3. Navigate to a project directory and run: ${projectScript}`);
  }

  return lines.join("\n");
}
