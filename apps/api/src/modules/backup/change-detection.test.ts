import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { silentLogger } from "../../core/logger.js";
import type { SelectedFile } from "../archive/file-selection.js";
import { nextManifest, planChanges, sha256File } from "./change-detection.js";
import type { FileManifest } from "./repository/types.js";

const ALPHA_SHA256 = "8ed3f6ad685b959ead7022518e1af76cd816f8e8ec7ccdda1ed4018e8f2223f8";
const BRAVO_SHA256 = "f144a6907dc4284d1f9fe6a7d9b9ff53c02c1d07ba68f24d413d7ff7f757a782";

describe("change detection", () => {
  let root: string;
  const logger = silentLogger();

  async function file(relativePath: string, content: string, mtimeMs: number): Promise<SelectedFile> {
    const absolutePath = path.join(root, relativePath);
    await writeFile(absolutePath, content);
    return { absolutePath, relativePath, size: Buffer.byteLength(content), mtimeMs };
  }

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "backhaul-changes-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("should hash file contents with SHA-256", async () => {
    const alpha = await file("a.txt", "alpha", 1000);
    expect(await sha256File(alpha.absolutePath)).toBe(ALPHA_SHA256);
  });

  it("should take every file for a full backup", async () => {
    const files = [await file("a.txt", "alpha", 1000), await file("b.txt", "bravo", 1000)];
    const plan = await planChanges(files, "full", { manifest: {}, lastFullBackupMs: 5000 }, logger);
    expect(plan.backupType).toBe("full");
    expect(plan.files).toEqual(files);
  });

  it("should fall back to a full backup without a baseline", async () => {
    const files = [await file("a.txt", "alpha", 1000)];
    const manifest: FileManifest = { "a.txt": { size: 5, mtimeMs: 1000, sha256: ALPHA_SHA256 } };

    const incremental = await planChanges(files, "incremental", { manifest: {}, lastFullBackupMs: 5000 }, logger);
    const differential = await planChanges(files, "differential", { manifest, lastFullBackupMs: null }, logger);

    expect(incremental).toMatchObject({ backupType: "full", files });
    expect(differential).toMatchObject({ backupType: "full", files });
  });

  it("should pick new, resized and rewritten files for an incremental backup", async () => {
    const manifest: FileManifest = {
      "same.txt": { size: 5, mtimeMs: 1000, sha256: ALPHA_SHA256 },
      "touched.txt": { size: 5, mtimeMs: 1000, sha256: ALPHA_SHA256 },
      "rewritten.txt": { size: 5, mtimeMs: 1000, sha256: ALPHA_SHA256 },
      "resized.txt": { size: 5, mtimeMs: 1000, sha256: ALPHA_SHA256 }
    };
    const same = await file("same.txt", "alpha", 1000);
    const touched = await file("touched.txt", "alpha", 2000);
    const rewritten = await file("rewritten.txt", "bravo", 2000);
    const resized = await file("resized.txt", "alpha and more", 1000);
    const added = await file("added.txt", "alpha", 1000);

    const plan = await planChanges(
      [same, touched, rewritten, resized, added],
      "incremental",
      { manifest, lastFullBackupMs: null },
      logger
    );

    expect(plan.backupType).toBe("incremental");
    expect(plan.files.map((item) => item.relativePath)).toEqual(["rewritten.txt", "resized.txt", "added.txt"]);
    expect(plan.digests.get("touched.txt")).toBe(ALPHA_SHA256);
    expect(plan.digests.has("same.txt")).toBe(false);
  });

  it("should pick files modified after the last full backup for a differential backup", async () => {
    const manifest: FileManifest = {
      "old.txt": { size: 5, mtimeMs: 1000, sha256: ALPHA_SHA256 },
      "changed.txt": { size: 5, mtimeMs: 1000, sha256: ALPHA_SHA256 }
    };
    const old = await file("old.txt", "alpha", 1000);
    const changed = await file("changed.txt", "alpha", 6000);
    const added = await file("added.txt", "bravo", 500);

    const plan = await planChanges([old, changed, added], "differential", { manifest, lastFullBackupMs: 5000 }, logger);

    expect(plan.backupType).toBe("differential");
    expect(plan.files.map((item) => item.relativePath)).toEqual(["changed.txt", "added.txt"]);
  });

  it("should replace the manifest after a full backup", async () => {
    const alpha = await file("a.txt", "alpha", 1000);
    const previous: FileManifest = { "deleted.txt": { size: 1, mtimeMs: 1, sha256: ALPHA_SHA256 } };
    const manifest = await nextManifest({ backupType: "full", files: [alpha], digests: new Map() }, previous);
    expect(manifest).toEqual({ "a.txt": { size: 5, mtimeMs: 1000, sha256: ALPHA_SHA256 } });
  });

  it("should merge the archived files into the manifest after an incremental backup", async () => {
    const bravo = await file("b.txt", "bravo", 2000);
    const previous: FileManifest = { "a.txt": { size: 5, mtimeMs: 1000, sha256: ALPHA_SHA256 } };
    const manifest = await nextManifest(
      { backupType: "incremental", files: [bravo], digests: new Map([["b.txt", BRAVO_SHA256]]) },
      previous
    );
    expect(manifest).toEqual({
      "a.txt": { size: 5, mtimeMs: 1000, sha256: ALPHA_SHA256 },
      "b.txt": { size: 5, mtimeMs: 2000, sha256: BRAVO_SHA256 }
    });
  });
});
