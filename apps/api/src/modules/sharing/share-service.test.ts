import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError, NotFoundError, TransferError, UnsupportedOperationError } from "../../core/errors.js";
import { silentLogger } from "../../core/logger.js";
import { MemoryBucket, memoryStorageFactory } from "../../testing/memory-storage.js";
import { StorageRegistry } from "../storage/storage-registry.js";
import { ShareService, shareRemotePath } from "./share-service.js";

const NOW = new Date("2024-05-01T12:00:00.000Z");

describe("shareRemotePath", () => {
  it("should place the file under a unique shared prefix", () => {
    expect(shareRemotePath("/data/docs/report.pdf", "abc")).toBe("shared/abc/report.pdf");
    expect(shareRemotePath("/data/docs/report.pdf")).toMatch(/^shared\/[0-9a-f-]{36}\/report\.pdf$/);
  });
});

describe("ShareService", () => {
  let root: string;
  let file: string;
  let s3: MemoryBucket;
  let github: MemoryBucket;
  let service: ShareService;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "backhaul-share-"));
    file = path.join(root, "report.pdf");
    await writeFile(file, "report");
    s3 = new MemoryBucket();
    github = new MemoryBucket();
    const registry = new StorageRegistry(silentLogger(), {}, {
      s3: memoryStorageFactory("s3", s3),
      github: memoryStorageFactory("github", github, false)
    });
    service = new ShareService(registry, silentLogger(), () => NOW);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("should upload the file and return a link with its expiry", async () => {
    const link = await service.shareFile(file, "s3", 3_600_000);

    expect(link.expiresAt).toBe("2024-05-01T13:00:00.000Z");
    expect(link.remotePath).toMatch(/^shared\/[0-9a-f-]{36}\/report\.pdf$/);
    expect(link.url).toBe(`https://storage.test/${link.remotePath}?expires=3600000`);
    expect(s3.objects.get(link.remotePath)?.toString()).toBe("report");
    expect(s3.released).toBe(1);
  });

  it("should delete the upload when the link cannot be issued", async () => {
    s3.failures.shareLink = true;

    await expect(service.shareFile(file, "s3", 60_000)).rejects.toThrow("link generation rejected");

    expect(s3.objects.size).toBe(0);
    expect(s3.calls.filter((call) => call.startsWith("delete "))).toHaveLength(1);
  });

  it("should surface the link error even when the cleanup fails", async () => {
    s3.failures.shareLink = true;
    s3.failures.delete = true;

    const error = await service.shareFile(file, "s3", 60_000).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(TransferError);
    expect(error instanceof Error ? error.message : "").toBe("link generation rejected");
    expect(s3.objects.size).toBe(1);
  });

  it("should refuse backends without sharing before uploading", async () => {
    await expect(service.shareFile(file, "github", 60_000)).rejects.toBeInstanceOf(UnsupportedOperationError);
    expect(github.calls).toEqual(["initialize"]);
    expect(github.released).toBe(1);
  });

  it("should refuse a missing file", async () => {
    await expect(service.shareFile(path.join(root, "missing.pdf"), "s3", 60_000)).rejects.toBeInstanceOf(NotFoundError);
    expect(s3.calls).toEqual([]);
  });

  it("should refuse a non-positive expiration", async () => {
    await expect(service.shareFile(file, "s3", 0)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
