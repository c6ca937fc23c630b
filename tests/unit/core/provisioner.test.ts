/**
 * Tests for the Provisioner class.
 * @module tests/unit/core/provisioner
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createHash } from "node:crypto";
import {
  mkdir,
  mkdtemp,
  readFile,
  readdir,
  rm,
  stat,
  symlink,
  writeFile,
} from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { ProvisionError } from "../../../src/errors.js";
import { NodeFileSystem } from "../../../src/fs.js";
import { Provisioner, isFatal } from "../../../src/provisioner.js";
import type { Artifact, OverwritePolicy } from "../../../src/types.js";
import { FakeFetcher, notFoundError } from "../../helpers/fetchers.js";

const BASE_URL = "https://example.test/agent-os";

const KEEP_ALL: OverwritePolicy = {
  instructions: false,
  standards: false,
  config: false,
  agentTemplate: false,
  promptTemplate: false,
  projectScript: false,
};

const OVERWRITE_ALL: OverwritePolicy = {
  instructions: true,
  standards: true,
  config: true,
  agentTemplate: true,
  promptTemplate: true,
  projectScript: true,
};

function makeArtifact(
  root: string,
  label: string,
  overrides: Partial<Artifact> = {},
): Artifact {
  return {
    remoteUrl: `${BASE_URL}/${label}`,
    localPath: join(root, label),
    category: "instructions",
    executable: false,
    critical: false,
    label,
    ...overrides,
  };
}

async function sha256(path: string): Promise<string> {
  return createHash("sha256").update(await readFile(path)).digest("hex");
}

/** Filesystem whose directory creation is always refused */
class ReadOnlyFileSystem extends NodeFileSystem {
  override async ensureDir(path: string): Promise<void> {
    throw new ProvisionError(`Permission denied: ${path}`, "PERMISSION_DENIED", {
      path,
    });
  }
}

describe("Provisioner", () => {
  let root: string;
  let fetcher: FakeFetcher;
  let provisioner: Provisioner;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "agent-os-provision-test-"));
    fetcher = new FakeFetcher();
    provisioner = new Provisioner({ fetcher, root });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe("provision()", () => {
    it("should write a missing destination", async () => {
      const artifact = makeArtifact(root, "instructions/core/create-spec.md");
      fetcher.set(artifact.remoteUrl, "# Create Spec\n");

      const result = await provisioner.provision(artifact, KEEP_ALL);

      expect(result.status).toBe("written");
      expect(result.artifact).toBe(artifact);
      expect(await readFile(artifact.localPath, "utf-8")).toBe("# Create Spec\n");
    });

    it("should create missing parent directories", async () => {
      const artifact = makeArtifact(root, "claude-code/agents/test-runner.md");
      fetcher.set(artifact.remoteUrl, "agent");

      await provisioner.provision(artifact, KEEP_ALL);

      expect((await stat(dirname(artifact.localPath))).isDirectory()).toBe(true);
    });

    it("should never skip a missing destination", async () => {
      const ok = makeArtifact(root, "a.md");
      const missing = makeArtifact(root, "b.md");
      fetcher.set(ok.remoteUrl, "a").notFound(missing.remoteUrl);

      const results = [
        await provisioner.provision(ok, KEEP_ALL),
        await provisioner.provision(missing, KEEP_ALL),
      ];

      expect(results.map((r) => r.status)).toEqual(["written", "failed"]);
    });

    it("should report a 404 as NOT_FOUND and write nothing", async () => {
      const artifact = makeArtifact(root, "standards/tech-stack.md");
      fetcher.notFound(artifact.remoteUrl);

      const result = await provisioner.provision(artifact, KEEP_ALL);

      expect(result.status).toBe("failed");
      if (result.status === "failed") {
        expect(result.cause.code).toBe("NOT_FOUND");
      }
      expect(await readdir(join(root, "standards"))).toEqual([]);
    });

    it("should skip an existing destination when overwrite is off", async () => {
      const artifact = makeArtifact(root, "standards/code-style.md", {
        category: "standards",
      });
      await mkdir(dirname(artifact.localPath), { recursive: true });
      await writeFile(artifact.localPath, "my customised standards\n");
      const before = await sha256(artifact.localPath);
      fetcher.set(artifact.remoteUrl, "upstream standards\n");

      const result = await provisioner.provision(artifact, KEEP_ALL);

      expect(result.status).toBe("skipped");
      expect(await sha256(artifact.localPath)).toBe(before);
      expect(fetcher.calls).toEqual([]);
    });

    it("should overwrite an existing destination when overwrite is on", async () => {
      const artifact = makeArtifact(root, "config.yml", { category: "config" });
      await writeFile(artifact.localPath, "old: true\n");
      fetcher.set(artifact.remoteUrl, "new: true\n");

      const result = await provisioner.provision(artifact, {
        ...KEEP_ALL,
        config: true,
      });

      expect(result.status).toBe("written");
      expect(await readFile(artifact.localPath, "utf-8")).toBe("new: true\n");
    });

    it("should keep existing content when an overwrite fetch fails", async () => {
      const artifact = makeArtifact(root, "config.yml", { category: "config" });
      await writeFile(artifact.localPath, "old: true\n");
      fetcher.fail(
        artifact.remoteUrl,
        new ProvisionError("Request timed out", "TIMEOUT"),
      );

      const result = await provisioner.provision(artifact, OVERWRITE_ALL);

      expect(result.status).toBe("failed");
      expect(await readFile(artifact.localPath, "utf-8")).toBe("old: true\n");
      expect(await readdir(root)).toEqual(["config.yml"]);
    });

    it("should set the executable bits when requested", async () => {
      const artifact = makeArtifact(root, "setup/project.sh", {
        category: "projectScript",
        executable: true,
      });
      fetcher.set(artifact.remoteUrl, "#!/bin/bash\n");

      await provisioner.provision(artifact, KEEP_ALL);

      expect((await stat(artifact.localPath)).mode & 0o777).toBe(0o755);
    });

    it("should refuse destinations outside the root", async () => {
      const artifact = makeArtifact(root, "../escape.md");
      fetcher.set(artifact.remoteUrl, "nope");

      const result = await provisioner.provision(artifact, KEEP_ALL);

      expect(result.status).toBe("failed");
      if (result.status === "failed") {
        expect(result.cause.code).toBe("PERMISSION_DENIED");
      }
      expect(fetcher.calls).toEqual([]);
    });

    it("should refuse to write through a symlinked directory", async () => {
      const outside = await mkdtemp(join(tmpdir(), "agent-os-outside-"));
      try {
        await symlink(outside, join(root, "claude-code"), "dir");
        const artifact = makeArtifact(root, "claude-code/agents/test-runner.md", {
          category: "agentTemplate",
        });
        fetcher.set(artifact.remoteUrl, "agent");

        const result = await provisioner.provision(artifact, KEEP_ALL);

        expect(result.status).toBe("failed");
        if (result.status === "failed") {
          expect(result.cause.code).toBe("PERMISSION_DENIED");
        }
        expect(await readdir(outside)).toEqual([]);
        expect(fetcher.calls).toEqual([]);
      } finally {
        await rm(outside, { recursive: true, force: true });
      }
    });

    it("should follow a symlink that stays inside the root", async () => {
      await mkdir(join(root, "shared"));
      await symlink(join(root, "shared"), join(root, "standards"), "dir");
      const artifact = makeArtifact(root, "standards/tech-stack.md", {
        category: "standards",
      });
      fetcher.set(artifact.remoteUrl, "stack");

      const result = await provisioner.provision(artifact, KEEP_ALL);

      expect(result.status).toBe("written");
      expect(await readFile(join(root, "shared", "tech-stack.md"), "utf-8")).toBe("stack");
    });

    it("should report an unwritable directory as PERMISSION_DENIED", async () => {
      const readOnly = new Provisioner({
        fetcher,
        root,
        fs: new ReadOnlyFileSystem(),
      });
      const artifact = makeArtifact(root, "instructions/meta/pre-flight.md");
      fetcher.set(artifact.remoteUrl, "x");

      const result = await readOnly.provision(artifact, KEEP_ALL);

      expect(result.status).toBe("failed");
      if (result.status === "failed") {
        expect(result.cause.isPermissionDenied).toBe(true);
      }
    });

    it("should emit one event per outcome", async () => {
      const written = makeArtifact(root, "a.md");
      const skipped = makeArtifact(root, "b.md");
      const failed = makeArtifact(root, "c.md");
      await writeFile(skipped.localPath, "b");
      fetcher.set(written.remoteUrl, "a").notFound(failed.remoteUrl);

      const onStart = vi.fn();
      const onWritten = vi.fn();
      const onSkipped = vi.fn();
      const onFailed = vi.fn();
      provisioner.on("artifact:start", onStart);
      provisioner.on("artifact:written", onWritten);
      provisioner.on("artifact:skipped", onSkipped);
      provisioner.on("artifact:failed", onFailed);

      await provisioner.provision(written, KEEP_ALL);
      await provisioner.provision(skipped, KEEP_ALL);
      await provisioner.provision(failed, KEEP_ALL);

      expect(onStart).toHaveBeenCalledTimes(3);
      expect(onWritten).toHaveBeenCalledWith({ status: "written", artifact: written });
      expect(onSkipped).toHaveBeenCalledWith({ status: "skipped", artifact: skipped });
      expect(onFailed).toHaveBeenCalledTimes(1);
      expect(onFailed.mock.calls[0]?.[0]).toMatchObject({
        status: "failed",
        artifact: failed,
      });
    });
  });

  describe("provisionAll()", () => {
    const labels = [
      "instructions/core/plan-product.md",
      "standards/tech-stack.md",
      "config.yml",
    ] as const;

    it("should write every artifact into an empty directory", async () => {
      const manifest = labels.map((label) => makeArtifact(root, label));
      for (const a of manifest) {
        fetcher.set(a.remoteUrl, `fetched ${a.label}`);
      }

      const results = await provisioner.provisionAll(manifest, KEEP_ALL);

      expect(results.map((r) => r.status)).toEqual(["written", "written", "written"]);
      for (const a of manifest) {
        expect(await readFile(a.localPath, "utf-8")).toBe(`fetched ${a.label}`);
      }
    });

    it("should skip every artifact of a pre-populated directory", async () => {
      const manifest = labels.map((label) => makeArtifact(root, label));
      const hashes: string[] = [];
      for (const a of manifest) {
        await mkdir(dirname(a.localPath), { recursive: true });
        await writeFile(a.localPath, `local ${a.label}`);
        hashes.push(await sha256(a.localPath));
        fetcher.set(a.remoteUrl, `fetched ${a.label}`);
      }

      const results = await provisioner.provisionAll(manifest, KEEP_ALL);

      expect(results.map((r) => r.status)).toEqual(["skipped", "skipped", "skipped"]);
      expect(await Promise.all(manifest.map((a) => sha256(a.localPath)))).toEqual(hashes);
      expect(fetcher.calls).toEqual([]);
    });

    it("should process artifacts in manifest order", async () => {
      const manifest = labels.map((label) => makeArtifact(root, label));
      for (const a of manifest) {
        fetcher.set(a.remoteUrl, "x");
      }

      await provisioner.provisionAll(manifest, KEEP_ALL);

      expect(fetcher.calls).toEqual(manifest.map((a) => a.remoteUrl));
    });

    it("should continue past a non-critical failure", async () => {
      const manifest = labels.map((label) => makeArtifact(root, label));
      fetcher
        .set(`${BASE_URL}/${labels[0]}`, "a")
        .notFound(`${BASE_URL}/${labels[1]}`)
        .set(`${BASE_URL}/${labels[2]}`, "c");

      const results = await provisioner.provisionAll(manifest, KEEP_ALL);

      expect(results.map((r) => r.status)).toEqual(["written", "failed", "written"]);
    });

    it("should stop at a critical failure", async () => {
      const manifest = [
        makeArtifact(root, "setup/functions.sh", { critical: true }),
        makeArtifact(root, "config.yml"),
      ];
      fetcher.notFound(`${BASE_URL}/setup/functions.sh`).set(`${BASE_URL}/config.yml`, "x");
      const onAborted = vi.fn();
      provisioner.on("batch:aborted", onAborted);

      const results = await provisioner.provisionAll(manifest, KEEP_ALL);

      expect(results).toHaveLength(1);
      expect(results[0]?.status).toBe("failed");
      expect(onAborted).toHaveBeenCalledWith(results[0]);
      expect(fetcher.calls).toEqual([`${BASE_URL}/setup/functions.sh`]);
    });

    it("should stop at a permission failure on any artifact", async () => {
      const readOnly = new Provisioner({
        fetcher,
        root,
        fs: new ReadOnlyFileSystem(),
      });
      const manifest = labels.map((label) => makeArtifact(root, label));

      const results = await readOnly.provisionAll(manifest, KEEP_ALL);

      expect(results).toHaveLength(1);
      const [first] = results;
      expect(first?.status).toBe("failed");
      if (first?.status === "failed") {
        expect(first.cause.code).toBe("PERMISSION_DENIED");
        expect(isFatal(first)).toBe(true);
      }
    });
  });

  describe("isFatal()", () => {
    it("should treat critical and permission failures as fatal", () => {
      const artifact = makeArtifact("/root", "a.md");
      const critical = { ...artifact, critical: true };

      expect(isFatal({ status: "written", artifact: critical })).toBe(false);
      expect(
        isFatal({ status: "failed", artifact, cause: notFoundError(artifact.remoteUrl) }),
      ).toBe(false);
      expect(
        isFatal({
          status: "failed",
          artifact: critical,
          cause: notFoundError(artifact.remoteUrl),
        }),
      ).toBe(true);
      expect(
        isFatal({
          status: "failed",
          artifact,
          cause: new ProvisionError("denied", "PERMISSION_DENIED"),
        }),
      ).toBe(true);
    });
  });
});
