import { mkdir, stat } from "node:fs/promises";
import path from "node:path";
import {
  BlobSASPermissions,
  BlobServiceClient,
  RestError,
  StorageSharedKeyCredential,
  type ContainerClient
} from "@azure/storage-blob";
import type { StorageOptions } from "@backhaul/shared";
import { ConfigurationError, NotFoundError, toTransferError } from "../../../core/errors.js";
import type { Logger } from "../../../core/logger.js";
import {
  normalizeRemotePath,
  notInitialized,
  option,
  requireOptions,
  unsupportedSharing,
  type StorageAdapter
} from "../storage-adapter.js";

function isNotFound(error: unknown): boolean {
  return error instanceof RestError && error.statusCode === 404;
}

export class AzureBlobAdapter implements StorageAdapter {
  readonly name = "azure";
  private container: ContainerClient | null = null;

  constructor(private readonly logger: Logger) {}

  /** SAS URLs can only be signed with an account key credential. */
  get supportsSharing(): boolean {
    return this.container?.credential instanceof StorageSharedKeyCredential;
  }

  async initialize(options: StorageOptions): Promise<void> {
    requireOptions(options, ["connectionString", "containerName"], "Azure");
    const containerName = option(options, "containerName");
    let container: ContainerClient;
    try {
      container = BlobServiceClient.fromConnectionString(option(options, "connectionString")).getContainerClient(containerName);
    } catch (error) {
      throw new ConfigurationError("Azure connection string is invalid", ["connectionString"], { cause: error });
    }
    try {
      await container.createIfNotExists();
    } catch (error) {
      throw toTransferError(error, `Connecting to Azure container ${containerName}`);
    }
    this.container = container;
    this.logger.info({ storageType: this.name, containerName }, "Connected to blob container");
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    const container = this.session();
    const info = await stat(localPath).catch(() => null);
    if (!info?.isFile()) {
      throw new NotFoundError(`Source file not found: ${localPath}`);
    }
    try {
      await container.getBlockBlobClient(normalizeRemotePath(remotePath)).uploadFile(localPath);
    } catch (error) {
      throw toTransferError(error, `Upload of ${localPath} to Azure`);
    }
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    const container = this.session();
    try {
      await mkdir(path.dirname(localPath), { recursive: true });
      await container.getBlobClient(normalizeRemotePath(remotePath)).downloadToFile(localPath);
    } catch (error) {
      if (isNotFound(error)) {
        throw new NotFoundError(`Blob not found in Azure: ${remotePath}`, { cause: error });
      }
      throw toTransferError(error, `Download of ${remotePath} from Azure`);
    }
  }

  async exists(remotePath: string): Promise<boolean> {
    const container = this.session();
    try {
      return await container.getBlobClient(normalizeRemotePath(remotePath)).exists();
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw toTransferError(error, `Lookup of ${remotePath} in Azure`);
    }
  }

  async delete(remotePath: string): Promise<void> {
    const container = this.session();
    try {
      await container.getBlobClient(normalizeRemotePath(remotePath)).deleteIfExists();
    } catch (error) {
      throw toTransferError(error, `Delete of ${remotePath} from Azure`);
    }
  }

  async generateShareLink(remotePath: string, expirationMs: number): Promise<string> {
    if (!this.supportsSharing) {
      throw unsupportedSharing(this.name);
    }
    const container = this.session();
    try {
      return await container.getBlobClient(normalizeRemotePath(remotePath)).generateSasUrl({
        permissions: BlobSASPermissions.parse("r"),
        expiresOn: new Date(Date.now() + expirationMs)
      });
    } catch (error) {
      throw toTransferError(error, `Signing a share link for ${remotePath}`);
    }
  }

  async release(): Promise<void> {
    this.container = null;
  }

  private session(): ContainerClient {
    if (!this.container) {
      throw notInitialized(this.name);
    }
    return this.container;
  }
}
