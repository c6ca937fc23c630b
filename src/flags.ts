/**
 * FlagPatcher - switches `enabled:` flags inside named config sections.
 *
 * Works on the file as an ordered list of lines instead of running a regex
 * over the whole text, so only the first `enabled:` line of the named
 * section is ever touched and every other byte is kept.
 *
 * @module flags
 */

import { ProvisionError, createErrorFromFsFailure } from "./errors.js";
import { NodeFileSystem, type FileSystem } from "./fs.js";
import type { FlagPatchResult, FlagSet } from "./types.js";

/** `name:` with no inline value, optionally followed by a comment */
const SECTION_HEADER = /^(\s*)([A-Za-z0-9_.-]+):\s*(?:#[^\n]*)?$/;

/** Any `enabled:` key line */
const ENABLED_KEY = /^\s*enabled:/;

/** `enabled:` with a boolean literal; the suffix keeps comments and `\r` */
const ENABLED_BOOLEAN = /^(\s*enabled:\s*)(true|false)(\s*(?:#[^\n]*)?)$/;

const BLANK_OR_COMMENT = /^\s*(?:#[^\n]*)?$/;

/**
 * Result of patching a list of lines.
 */
export type LinePatch =
  | {
      ok: true;
      /** Lines after the patch (same length as the input) */
      lines: string[];
      /** Index of the `enabled:` line that was targeted */
      index: number;
      /** False when the literal already had the wanted value */
      changed: boolean;
    }
  | { ok: false; reason: "SECTION_NOT_FOUND" | "FLAG_NOT_FOUND" };

function indentOf(line: string): number {
  const match = /^\s*/.exec(line);
  return match ? match[0].length : 0;
}

/**
 * Find the index of the first header line for `name`, with its indentation.
 * @internal
 */
function findSection(
  lines: readonly string[],
  name: string,
): { index: number; indent: number } | undefined {
  for (let i = 0; i < lines.length; i++) {
    const match = SECTION_HEADER.exec(lines[i] ?? "");
    if (match && match[2] === name) {
      return { index: i, indent: (match[1] ?? "").length };
    }
  }
  return undefined;
}

/**
 * Set the `enabled:` literal of section `name` within a list of lines.
 *
 * The section spans from its header to the next non-blank, non-comment line
 * indented no deeper than the header (or the end of the list). Only the
 * first `enabled:` line inside that span is considered.
 *
 * @example
 * ```typescript
 * const patch = patchFlagLines(["cursor:", "  enabled: false"], "cursor", true);
 * // patch.ok && patch.lines => ["cursor:", "  enabled: true"]
 * ```
 */
export function patchFlagLines(
  lines: readonly string[],
  name: string,
  value: boolean,
): LinePatch {
  const section = findSection(lines, name);
  if (!section) {
    return { ok: false, reason: "SECTION_NOT_FOUND" };
  }

  for (let i = section.index + 1; i < lines.length; i++) {
    const line = lines[i] ?? "";

    if (BLANK_OR_COMMENT.test(line)) {
      continue;
    }
    if (indentOf(line) <= section.indent) {
      break;
    }
    if (!ENABLED_KEY.test(line)) {
      continue;
    }

    const match = ENABLED_BOOLEAN.exec(line);
    if (!match) {
      // First enabled: line holds something other than a boolean literal
      return { ok: false, reason: "FLAG_NOT_FOUND" };
    }

    const literal = String(value);
    if (match[2] === literal) {
      return { ok: true, lines: [...lines], index: i, changed: false };
    }

    const patched = [...lines];
    patched[i] = `${match[1] ?? ""}${literal}${match[3] ?? ""}`;
    return { ok: true, lines: patched, index: i, changed: true };
  }

  return { ok: false, reason: "FLAG_NOT_FOUND" };
}

/**
 * Applies flag values to a config file on disk.
 *
 * Writes go through a temp file and a rename. Failures are returned as
 * `failed` results rather than thrown, since a missing section only means
 * the config schema drifted from this tool's version.
 */
export class FlagPatcher {
  private readonly fs: FileSystem;

  constructor(fs: FileSystem = new NodeFileSystem()) {
    this.fs = fs;
  }

  /**
   * Set one flag. Idempotent: a second call with the same value reports
   * `unchanged` and leaves the file alone.
   */
  async setFlag(
    filePath: string,
    flag: string,
    value: boolean,
  ): Promise<FlagPatchResult> {
    try {
      const content = await this.fs.readText(filePath);
      const patch = patchFlagLines(content.split("\n"), flag, value);

      if (!patch.ok) {
        const message =
          patch.reason === "SECTION_NOT_FOUND"
            ? `Section '${flag}' not found in ${filePath}`
            : `Section '${flag}' in ${filePath} has no 'enabled: true|false' line`;
        return {
          flag,
          value,
          status: "failed",
          cause: new ProvisionError(message, patch.reason, { path: filePath }),
        };
      }

      if (!patch.changed) {
        return { flag, value, status: "unchanged" };
      }

      await this.fs.writeFileAtomic(filePath, patch.lines.join("\n"));
      return { flag, value, status: "updated" };
    } catch (error) {
      return {
        flag,
        value,
        status: "failed",
        cause: createErrorFromFsFailure(error, filePath),
      };
    }
  }

  /**
   * Apply every entry of a flag set, in insertion order.
   */
  async setFlags(filePath: string, flags: FlagSet): Promise<FlagPatchResult[]> {
    const results: FlagPatchResult[] = [];
    for (const [flag, value] of flags) {
      results.push(await this.setFlag(filePath, flag, value));
    }
    return results;
  }
}
