import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ArchiveFormatError } from "../../core/errors.js";
import { silentLogger } from "../../core/logger.js";
import { ArchiveService, artifactKind } from "./archive-service.js";
import { selectFiles } from "./file-selection.js";

const settings = { excludedPatterns: [], excludedPaths: [], maxFileSizeMB: 1024, skipHidden: false };

/** One ustar entry followed by the end-of-archive marker. */
function rawTar(name: string, content: string): Buffer {
  const header = Buffer.alloc(512);
  const octal = (value: number, width: number) => `${value.toString(8).padStart(width - 1, "0")}\0`;
  header.write(name, 0, 100, "utf8");
  header.write(octal(0o644, 8), 100, "ascii");
  header.write(octal(0, 8), 108, "ascii");
  header.write(octal(0, 8), 116, "ascii");
  header.write(octal(Buffer.byteLength(content), 12), 124, "ascii");
  header.write(octal(0, 12), 136, "ascii");
  header.write("        ", 148, "ascii");
  header.write("0", 156, "ascii");
  header.write("ustar\0", 257, "ascii");
  header.write("00", 263, "ascii");
  let checksum = 0;
  for (const byte of header) {
    checksum += byte;
  }
  header.write(`${checksum.toString(8).padStart(6, "0")}\0 `, 148, "ascii");

  const body = Buffer.alloc(Math.ceil(Buffer.byteLength(content) / 512) * 512);
  body.write(content, 0, "utf8");
  return Buffer.concat([header, body, Buffer.alloc(1024)]);
}

describe("artifactKind", () => {
  it("should recognise each archive type with or without encryption", () => {
    expect(artifactKind("backup_docs_20240101T000000000Z.zip")).toBe("zip");
    expect(artifactKind("backup.ZIP.enc")).toBe("zip");
    expect(artifactKind("backup.tar")).toBe("tar");
    expect(artifactKind("backup.tar.gz.enc")).toBe("tar.gz");
    expect(artifactKind("backup.tgz")).toBe("tar.gz");
  });

  it("should refuse anything else", () => {
    expect(() => artifactKind("backup.rar")).toThrow(ArchiveFormatError);
  });
});

describe("ArchiveService", () => {
  let root: string;
  let source: string;
  const service = new ArchiveService(silentLogger());

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "backhaul-archive-"));
    source = path.join(root, "source");
    await mkdir(path.join(source, "nested"), { recursive: true });
    await writeFile(path.join(source, "a.txt"), "alpha");
    await writeFile(path.join(source, "nested", "b.txt"), "bravo!");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("should round trip a zip archive", async () => {
    const { files } = await selectFiles(source, settings);
    const archivePath = path.join(root, "out", "backup.zip");
    await service.createArchive(files, archivePath, "zip");

    const target = path.join(root, "restored");
    const summary = await service.extract(archivePath, target, "zip");

    expect(summary).toEqual({ fileCount: 2, totalBytes: 11 });
    expect(await readFile(path.join(target, "nested", "b.txt"), "utf8")).toBe("bravo!");
  });

  it("should round trip a compressed tar archive", async () => {
    const { files } = await selectFiles(source, settings);
    const tarPath = path.join(root, "backup.tar");
    const gzPath = path.join(root, "backup.tar.gz");
    const unpackedPath = path.join(root, "unpacked.tar");
    await service.createArchive(files, tarPath, "tar");
    await service.gzip(tarPath, gzPath);
    await service.gunzip(gzPath, unpackedPath);

    const target = path.join(root, "restored");
    const summary = await service.extract(unpackedPath, target, "tar");

    expect(summary).toEqual({ fileCount: 2, totalBytes: 11 });
    expect(await readFile(path.join(target, "a.txt"), "utf8")).toBe("alpha");
  });

  it("should overwrite files that already exist in the target", async () => {
    const { files } = await selectFiles(source, settings);
    const archivePath = path.join(root, "backup.zip");
    await service.createArchive(files, archivePath, "zip");
    const target = path.join(root, "restored");
    await mkdir(target, { recursive: true });
    await writeFile(path.join(target, "a.txt"), "stale");

    await service.extract(archivePath, target, "zip");

    expect(await readFile(path.join(target, "a.txt"), "utf8")).toBe("alpha");
  });

  it("should refuse a tar entry that escapes the target without writing anything", async () => {
    const archivePath = path.join(root, "evil.tar");
    await writeFile(archivePath, rawTar("../escaped.txt", "owned"));
    const target = path.join(root, "restored");

    await expect(service.extract(archivePath, target, "tar")).rejects.toThrow(
      "Archive entries escape the target directory: ../escaped.txt"
    );
    await expect(stat(path.join(root, "escaped.txt"))).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("should extract a plain tar entry written by another tool", async () => {
    const archivePath = path.join(root, "plain.tar");
    await writeFile(archivePath, rawTar("notes.txt", "hello"));
    const target = path.join(root, "restored");

    expect(await service.extract(archivePath, target, "tar")).toEqual({ fileCount: 1, totalBytes: 5 });
    expect(await readFile(path.join(target, "notes.txt"), "utf8")).toBe("hello");
  });

  it("should classify data that is not gzip", async () => {
    const bogus = path.join(root, "bogus.tar.gz");
    await writeFile(bogus, "not gzip at all");
    await expect(service.gunzip(bogus, path.join(root, "out.tar"))).rejects.toBeInstanceOf(ArchiveFormatError);
  });

  it("should classify a corrupt zip", async () => {
    const bogus = path.join(root, "bogus.zip");
    await writeFile(bogus, "not a zip");
    await expect(service.extract(bogus, path.join(root, "restored"), "zip")).rejects.toBeInstanceOf(
      ArchiveFormatError
    );
  });
});
