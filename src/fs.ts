/**
 * Filesystem capability used by the provisioner and the flag patcher.
 * @module fs
 */

import {
  access,
  chmod,
  mkdir,
  readFile,
  realpath,
  rename,
  rm,
  stat,
  writeFile,
} from "node:fs/promises";
import { randomBytes } from "node:crypto";
import { basename, dirname, join } from "node:path";
import { createErrorFromFsFailure } from "./errors.js";

/**
 * Filesystem operations the core depends on. Every method rejects with a
 * ProvisionError.
 */
export interface FileSystem {
  /** Create a directory and its parents; existing directories are fine */
  ensureDir(path: string): Promise<void>;
  /** Replace (or create) a file so readers see old or new content, never a mix */
  writeFileAtomic(path: string, content: Uint8Array | string): Promise<void>;
  exists(path: string): Promise<boolean>;
  setExecutable(path: string): Promise<void>;
  readText(path: string): Promise<string>;
  /** Resolve symlinks in an existing path */
  realPath(path: string): Promise<string>;
}

/**
 * Build the temp file name used next to `path` during an atomic write.
 * @internal
 */
export function tempPathFor(path: string): string {
  const suffix = randomBytes(6).toString("hex");
  return join(dirname(path), `.${basename(path)}.${suffix}.tmp`);
}

/**
 * FileSystem backed by node:fs/promises.
 */
export class NodeFileSystem implements FileSystem {
  async ensureDir(path: string): Promise<void> {
    try {
      await mkdir(path, { recursive: true });
    } catch (error) {
      throw createErrorFromFsFailure(error, path);
    }
  }

  /**
   * Write to a `.tmp` sibling, then rename over the target. An existing
   * target's permission bits carry over to the new file. The temp file is
   * removed when any step fails.
   */
  async writeFileAtomic(
    path: string,
    content: Uint8Array | string,
  ): Promise<void> {
    const tmpPath = tempPathFor(path);
    const mode = await stat(path).then(
      (stats) => stats.mode & 0o7777,
      () => undefined,
    );

    try {
      await writeFile(tmpPath, content);
      if (mode !== undefined) {
        await chmod(tmpPath, mode);
      }
      await rename(tmpPath, path);
    } catch (error) {
      // The write error wins over a cleanup error
      await rm(tmpPath, { force: true }).catch(() => undefined);
      throw createErrorFromFsFailure(error, path);
    }
  }

  async exists(path: string): Promise<boolean> {
    return access(path)
      .then(() => true)
      .catch(() => false);
  }

  async setExecutable(path: string): Promise<void> {
    try {
      await chmod(path, 0o755);
    } catch (error) {
      throw createErrorFromFsFailure(error, path);
    }
  }

  async readText(path: string): Promise<string> {
    try {
      return await readFile(path, "utf-8");
    } catch (error) {
      throw createErrorFromFsFailure(error, path);
    }
  }

  async realPath(path: string): Promise<string> {
    try {
      return await realpath(path);
    } catch (error) {
      throw createErrorFromFsFailure(error, path);
    }
  }
}
