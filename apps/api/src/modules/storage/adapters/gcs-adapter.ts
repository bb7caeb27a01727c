import { mkdir, stat } from "node:fs/promises";
import path from "node:path";
import { Storage, type Bucket } from "@google-cloud/storage";
import type { StorageOptions } from "@backhaul/shared";
import { ConfigurationError, NotFoundError, toTransferError } from "../../../core/errors.js";
import type { Logger } from "../../../core/logger.js";
import {
  MAX_PRESIGN_SECONDS,
  normalizeRemotePath,
  notInitialized,
  option,
  optionalOption,
  requireOptions,
  unsupportedSharing,
  type StorageAdapter
} from "../storage-adapter.js";

function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === 404;
}

export class GcsAdapter implements StorageAdapter {
  readonly name = "gcp";
  private bucket: Bucket | null = null;
  private hasExplicitCredentials = false;

  constructor(private readonly logger: Logger) {}

  /** V4 signing needs the service account key given by `credentialPath`. */
  get supportsSharing(): boolean {
    return this.hasExplicitCredentials;
  }

  async initialize(options: StorageOptions): Promise<void> {
    requireOptions(options, ["bucketName"], "GCP");
    const bucketName = option(options, "bucketName");
    const keyFilename = optionalOption(options, "credentialPath");
    const projectId = optionalOption(options, "projectId");
    if (keyFilename) {
      const keyFile = await stat(keyFilename).catch(() => null);
      if (!keyFile?.isFile()) {
        throw new ConfigurationError(`GCP credential file not found: ${keyFilename}`, ["credentialPath"]);
      }
    }

    const bucket = new Storage({ keyFilename, projectId }).bucket(bucketName);
    let found: boolean;
    try {
      [found] = await bucket.exists();
    } catch (error) {
      throw toTransferError(error, `Connecting to GCP bucket ${bucketName}`);
    }
    if (!found) {
      throw new ConfigurationError(`GCP bucket '${bucketName}' not found or not accessible`, ["bucketName"]);
    }
    this.bucket = bucket;
    this.hasExplicitCredentials = keyFilename !== undefined;
    this.logger.info({ storageType: this.name, bucket: bucketName }, "Connected to bucket");
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    const bucket = this.session();
    const info = await stat(localPath).catch(() => null);
    if (!info?.isFile()) {
      throw new NotFoundError(`Source file not found: ${localPath}`);
    }
    try {
      await bucket.upload(localPath, { destination: normalizeRemotePath(remotePath) });
    } catch (error) {
      throw toTransferError(error, `Upload of ${localPath} to GCP`);
    }
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    const bucket = this.session();
    try {
      await mkdir(path.dirname(localPath), { recursive: true });
      await bucket.file(normalizeRemotePath(remotePath)).download({ destination: localPath });
    } catch (error) {
      if (isNotFound(error)) {
        throw new NotFoundError(`Object not found in GCP: ${remotePath}`, { cause: error });
      }
      throw toTransferError(error, `Download of ${remotePath} from GCP`);
    }
  }

  async exists(remotePath: string): Promise<boolean> {
    const bucket = this.session();
    try {
      const [found] = await bucket.file(normalizeRemotePath(remotePath)).exists();
      return found;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw toTransferError(error, `Lookup of ${remotePath} in GCP`);
    }
  }

  async delete(remotePath: string): Promise<void> {
    const bucket = this.session();
    try {
      await bucket.file(normalizeRemotePath(remotePath)).delete({ ignoreNotFound: true });
    } catch (error) {
      throw toTransferError(error, `Delete of ${remotePath} from GCP`);
    }
  }

  async generateShareLink(remotePath: string, expirationMs: number): Promise<string> {
    if (!this.supportsSharing) {
      throw unsupportedSharing(this.name);
    }
    const bucket = this.session();
    if (expirationMs < 1000 || expirationMs > MAX_PRESIGN_SECONDS * 1000) {
      throw new ConfigurationError(`Share link expiration must be between 1 second and ${MAX_PRESIGN_SECONDS} seconds`, [
        "expiration"
      ]);
    }
    try {
      const [url] = await bucket.file(normalizeRemotePath(remotePath)).getSignedUrl({
        version: "v4",
        action: "read",
        expires: Date.now() + expirationMs
      });
      return url;
    } catch (error) {
      throw toTransferError(error, `Signing a share link for ${remotePath}`);
    }
  }

  async release(): Promise<void> {
    this.bucket = null;
  }

  private session(): Bucket {
    if (!this.bucket) {
      throw notInitialized(this.name);
    }
    return this.bucket;
  }
}
