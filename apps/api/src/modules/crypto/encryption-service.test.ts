import { mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ArchiveFormatError, AuthenticationError } from "../../core/errors.js";
import { EncryptionService, HEADER_LENGTH, decodeHeader, encodeHeader } from "./encryption-service.js";

const ITERATIONS = 1000;

describe("EncryptionService", () => {
  let root: string;
  const service = new EncryptionService(ITERATIONS);

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "backhaul-crypto-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("should round trip a file", async () => {
    const plain = path.join(root, "plain.zip");
    const sealed = path.join(root, "plain.zip.enc");
    const opened = path.join(root, "opened.zip");
    const payload = Buffer.from("a".repeat(100_000));
    await writeFile(plain, payload);

    await service.encryptFile(plain, sealed, "test-secret");
    await service.decryptFile(sealed, opened, "test-secret");

    expect((await readFile(opened)).equals(payload)).toBe(true);
  });

  it("should add exactly the header and tag to the plaintext size", async () => {
    const plain = path.join(root, "plain.bin");
    const sealed = path.join(root, "plain.bin.enc");
    await writeFile(plain, Buffer.alloc(1234, 7));
    await service.encryptFile(plain, sealed, "test-secret");
    expect((await stat(sealed)).size).toBe(1234 + HEADER_LENGTH + 16);
  });

  it("should record the iteration count in the header", async () => {
    const plain = path.join(root, "plain.bin");
    const sealed = path.join(root, "plain.bin.enc");
    await writeFile(plain, "x");
    await service.encryptFile(plain, sealed, "test-secret");
    const header = decodeHeader((await readFile(sealed)).subarray(0, HEADER_LENGTH));
    expect(header).toMatchObject({ version: 1, iterations: ITERATIONS });
  });

  it("should round trip an empty file", async () => {
    const plain = path.join(root, "empty");
    const sealed = path.join(root, "empty.enc");
    const opened = path.join(root, "opened");
    await writeFile(plain, "");
    await service.encryptFile(plain, sealed, "test-secret");
    await service.decryptFile(sealed, opened, "test-secret");
    expect((await readFile(opened)).length).toBe(0);
  });

  it("should reject a wrong password and leave no output", async () => {
    const plain = path.join(root, "plain.txt");
    const sealed = path.join(root, "plain.txt.enc");
    const opened = path.join(root, "opened.txt");
    await writeFile(plain, "secret contents");
    await service.encryptFile(plain, sealed, "test-secret");

    await expect(service.decryptFile(sealed, opened, "wrong-secret")).rejects.toBeInstanceOf(AuthenticationError);
    await expect(stat(opened)).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("should reject tampered ciphertext", async () => {
    const plain = path.join(root, "plain.txt");
    const sealed = path.join(root, "plain.txt.enc");
    await writeFile(plain, "secret contents");
    await service.encryptFile(plain, sealed, "test-secret");
    const bytes = await readFile(sealed);
    bytes[HEADER_LENGTH] = (bytes[HEADER_LENGTH] ?? 0) ^ 0xff;
    await writeFile(sealed, bytes);

    await expect(service.decryptFile(sealed, path.join(root, "out"), "test-secret")).rejects.toBeInstanceOf(
      AuthenticationError
    );
  });

  it("should reject a file without the expected header", async () => {
    const sealed = path.join(root, "not-encrypted.enc");
    await writeFile(sealed, Buffer.alloc(HEADER_LENGTH + 32, 1));
    await expect(service.decryptFile(sealed, path.join(root, "out"), "test-secret")).rejects.toBeInstanceOf(
      ArchiveFormatError
    );
  });

  it("should reject a file shorter than header and tag", async () => {
    const sealed = path.join(root, "short.enc");
    await writeFile(sealed, "BKHL");
    await expect(service.decryptFile(sealed, path.join(root, "out"), "test-secret")).rejects.toThrow(
      "Encrypted file is too short"
    );
  });
});

describe("decodeHeader", () => {
  it("should refuse an unknown format version", () => {
    const header = encodeHeader({ version: 2, iterations: 1000, salt: Buffer.alloc(32), iv: Buffer.alloc(12) });
    expect(() => decodeHeader(header)).toThrow("Unsupported encrypted file format version: 2");
  });

  it("should read back what was encoded", () => {
    const salt = Buffer.alloc(32, 3);
    const iv = Buffer.alloc(12, 4);
    const decoded = decodeHeader(encodeHeader({ version: 1, iterations: 4242, salt, iv }));
    expect(decoded.iterations).toBe(4242);
    expect(decoded.salt.equals(salt)).toBe(true);
    expect(decoded.iv.equals(iv)).toBe(true);
  });
});
