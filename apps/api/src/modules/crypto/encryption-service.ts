import { createCipheriv, createDecipheriv, pbkdf2, randomBytes } from "node:crypto";
import { createReadStream, createWriteStream } from "node:fs";
import { open, rm, stat } from "node:fs/promises";
import { Readable, Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import { promisify } from "node:util";
import { ArchiveFormatError, AuthenticationError } from "../../core/errors.js";

const pbkdf2Async = promisify(pbkdf2);

const MAGIC = Buffer.from("BKHL", "ascii");
const FORMAT_VERSION = 1;
const SALT_LENGTH = 32;
const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const KEY_LENGTH = 32;
export const HEADER_LENGTH = MAGIC.length + 1 + 4 + SALT_LENGTH + IV_LENGTH;
export const DEFAULT_PBKDF2_ITERATIONS = 100_000;

export type EncryptionHeader = {
  version: number;
  iterations: number;
  salt: Buffer;
  iv: Buffer;
};

export function deriveKey(password: string, salt: Buffer, iterations: number): Promise<Buffer> {
  return pbkdf2Async(password, salt, iterations, KEY_LENGTH, "sha256");
}

export function encodeHeader(header: EncryptionHeader): Buffer {
  const iterations = Buffer.alloc(4);
  iterations.writeUInt32BE(header.iterations);
  return Buffer.concat([MAGIC, Buffer.from([header.version]), iterations, header.salt, header.iv]);
}

export function decodeHeader(blob: Buffer): EncryptionHeader {
  if (blob.length < HEADER_LENGTH || !blob.subarray(0, MAGIC.length).equals(MAGIC)) {
    throw new ArchiveFormatError("File is not an encrypted backup (bad header)");
  }
  const version = blob.readUInt8(MAGIC.length);
  if (version !== FORMAT_VERSION) {
    throw new ArchiveFormatError(`Unsupported encrypted file format version: ${version}`);
  }
  const iterations = blob.readUInt32BE(MAGIC.length + 1);
  if (iterations < 1) {
    throw new ArchiveFormatError("Encrypted file declares zero key derivation iterations");
  }
  const saltStart = MAGIC.length + 5;
  return {
    version,
    iterations,
    salt: blob.subarray(saltStart, saltStart + SALT_LENGTH),
    iv: blob.subarray(saltStart + SALT_LENGTH, saltStart + SALT_LENGTH + IV_LENGTH)
  };
}

/**
 * Password-based AES-256-GCM over whole files, streamed in both directions.
 * Layout: magic | version | iterations | salt | iv | ciphertext | tag.
 */
export class EncryptionService {
  constructor(private readonly iterations = DEFAULT_PBKDF2_ITERATIONS) {}

  async encryptFile(inputPath: string, outputPath: string, password: string): Promise<void> {
    const header: EncryptionHeader = {
      version: FORMAT_VERSION,
      iterations: this.iterations,
      salt: randomBytes(SALT_LENGTH),
      iv: randomBytes(IV_LENGTH)
    };
    const key = await deriveKey(password, header.salt, header.iterations);
    const cipher = createCipheriv("aes-256-gcm", key, header.iv);
    let headerWritten = false;

    // Prefixes the header and appends the tag once the cipher has finished.
    const frame = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        if (!headerWritten) {
          headerWritten = true;
          this.push(encodeHeader(header));
        }
        callback(null, chunk);
      },
      flush(callback) {
        if (!headerWritten) {
          this.push(encodeHeader(header));
        }
        callback(null, cipher.getAuthTag());
      }
    });

    try {
      await pipeline(createReadStream(inputPath), cipher, frame, createWriteStream(outputPath));
    } catch (error) {
      await rm(outputPath, { force: true });
      throw error;
    }
  }

  /**
   * Writes the plaintext to `outputPath` and resolves only once the tag has
   * verified. On failure the output is removed.
   */
  async decryptFile(inputPath: string, outputPath: string, password: string): Promise<void> {
    const { size } = await stat(inputPath);
    if (size < HEADER_LENGTH + TAG_LENGTH) {
      throw new ArchiveFormatError("Encrypted file is too short");
    }

    const handle = await open(inputPath, "r");
    const headerBytes = Buffer.alloc(HEADER_LENGTH);
    const tag = Buffer.alloc(TAG_LENGTH);
    try {
      await handle.read(headerBytes, 0, HEADER_LENGTH, 0);
      await handle.read(tag, 0, TAG_LENGTH, size - TAG_LENGTH);
    } finally {
      await handle.close();
    }

    const header = decodeHeader(headerBytes);
    const key = await deriveKey(password, header.salt, header.iterations);
    const decipher = createDecipheriv("aes-256-gcm", key, header.iv);
    decipher.setAuthTag(tag);

    try {
      const ciphertextEnd = size - TAG_LENGTH - 1;
      const source =
        ciphertextEnd >= HEADER_LENGTH
          ? createReadStream(inputPath, { start: HEADER_LENGTH, end: ciphertextEnd })
          : Readable.from([]);
      await pipeline(source, decipher, createWriteStream(outputPath));
    } catch (error) {
      await rm(outputPath, { force: true });
      throw new AuthenticationError("Decryption failed: wrong password or corrupted data", { cause: error });
    }
  }
}
