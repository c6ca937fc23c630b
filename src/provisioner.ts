/**
 * Provisioner - decides per artifact whether to fetch, skip or overwrite.
 * @module provisioner
 */

import { dirname, isAbsolute, relative, resolve, sep } from "node:path";
import { ProvisionError, createErrorFromFsFailure } from "./errors.js";
import { TypedEventEmitter } from "./events.js";
import type { Fetcher } from "./fetcher.js";
import { NodeFileSystem, type FileSystem } from "./fs.js";
import type { Artifact, FetchResult, Manifest, OverwritePolicy } from "./types.js";

type FailedResult = Extract<FetchResult, { status: "failed" }>;

/**
 * Options for creating a Provisioner.
 */
export interface ProvisionerOptions {
  /** Source of remote content */
  fetcher: Fetcher;
  /** Install root; no artifact may be written outside it */
  root: string;
  /** Filesystem implementation (default: NodeFileSystem) */
  fs?: FileSystem;
}

function isEscape(rel: string): boolean {
  return rel === ".." || rel.startsWith(`..${sep}`);
}

/**
 * Whether a failed result must stop the remaining batch.
 *
 * Critical artifacts and permission failures are fatal; everything else is
 * reported and skipped over.
 */
export function isFatal(result: FetchResult): result is FailedResult {
  return (
    result.status === "failed" &&
    (result.artifact.critical || result.cause.isPermissionDenied)
  );
}

/**
 * Ensures each artifact of a manifest exists locally, honouring the
 * per-category overwrite policy.
 *
 * Artifacts are handled one at a time in manifest order. Content is written
 * through {@link FileSystem.writeFileAtomic}, so a failed fetch never leaves
 * a truncated destination behind.
 *
 * @example
 * ```typescript
 * const provisioner = new Provisioner({
 *   fetcher: new HttpFetcher(),
 *   root: "/home/me/.agent-os",
 * });
 * provisioner.on("artifact:written", (r) => console.log(`✓ ${r.artifact.label}`));
 *
 * const results = await provisioner.provisionAll(manifest, policy);
 * ```
 */
export class Provisioner extends TypedEventEmitter {
  private readonly fetcher: Fetcher;
  private readonly fs: FileSystem;
  private readonly root: string;

  constructor(options: ProvisionerOptions) {
    super();
    this.fetcher = options.fetcher;
    this.fs = options.fs ?? new NodeFileSystem();
    this.root = resolve(options.root);
  }

  /**
   * Provision a single artifact.
   *
   * Never throws: every failure is returned as a `failed` result.
   */
  async provision(
    artifact: Artifact,
    policy: OverwritePolicy,
  ): Promise<FetchResult> {
    this.emit("artifact:start", artifact);

    const result = await this.place(artifact, policy);

    switch (result.status) {
      case "written":
        this.emit("artifact:written", result);
        break;
      case "skipped":
        this.emit("artifact:skipped", result);
        break;
      case "failed":
        this.emit("artifact:failed", result);
        break;
    }

    return result;
  }

  /**
   * Provision every artifact in manifest order.
   *
   * Stops at the first fatal failure (see {@link isFatal}); the returned
   * list then ends with that failure.
   */
  async provisionAll(
    manifest: Manifest,
    policy: OverwritePolicy,
  ): Promise<FetchResult[]> {
    const results: FetchResult[] = [];

    for (const artifact of manifest) {
      const result = await this.provision(artifact, policy);
      results.push(result);

      if (isFatal(result)) {
        this.emit("batch:aborted", result);
        break;
      }
    }

    return results;
  }

  private async place(
    artifact: Artifact,
    policy: OverwritePolicy,
  ): Promise<FetchResult> {
    const localPath = resolve(artifact.localPath);

    if (!this.isWithinRoot(localPath)) {
      return {
        status: "failed",
        artifact,
        cause: new ProvisionError(
          `Refusing to write outside ${this.root}: ${localPath}`,
          "PERMISSION_DENIED",
          { path: localPath },
        ),
      };
    }

    try {
      if (!policy[artifact.category] && (await this.fs.exists(localPath))) {
        return { status: "skipped", artifact };
      }

      if (!(await this.resolvesWithinRoot(dirname(localPath)))) {
        return {
          status: "failed",
          artifact,
          cause: new ProvisionError(
            `Refusing to write through a link that leaves ${this.root}: ${localPath}`,
            "PERMISSION_DENIED",
            { path: localPath },
          ),
        };
      }

      await this.fs.ensureDir(dirname(localPath));
      const content = await this.fetcher.fetch(artifact.remoteUrl);
      await this.fs.writeFileAtomic(localPath, content);

      if (artifact.executable) {
        await this.fs.setExecutable(localPath);
      }

      return { status: "written", artifact };
    } catch (error) {
      return {
        status: "failed",
        artifact,
        cause: createErrorFromFsFailure(error, localPath),
      };
    }
  }

  /**
   * Resolve symlinks in the nearest existing ancestor of `dir` and check it
   * still lies under the resolved root, so a linked subdirectory cannot
   * carry a write out of the tree. Runs before any directory is created.
   */
  private async resolvesWithinRoot(dir: string): Promise<boolean> {
    await this.fs.ensureDir(this.root);

    let existing = dir;
    while (existing !== this.root && !(await this.fs.exists(existing))) {
      existing = dirname(existing);
    }

    const rel = relative(
      await this.fs.realPath(this.root),
      await this.fs.realPath(existing),
    );
    return rel === "" || (!isEscape(rel) && !isAbsolute(rel));
  }

  private isWithinRoot(path: string): boolean {
    const rel = relative(this.root, path);
    return (
      rel !== "" &&
      !isEscape(rel) &&
      !isAbsolute(rel)
    );
  }
}
