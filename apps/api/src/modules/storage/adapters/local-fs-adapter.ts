import { copyFile, mkdir, rm, stat } from "node:fs/promises";
import path from "node:path";
import type { StorageOptions } from "@backhaul/shared";
import { ConfigurationError, NotFoundError, hasErrorCode, toTransferError } from "../../../core/errors.js";
import type { Logger } from "../../../core/logger.js";
import {
  normalizeRemotePath,
  notInitialized,
  option,
  requireOptions,
  unsupportedSharing,
  type StorageAdapter
} from "../storage-adapter.js";

export class LocalFsAdapter implements StorageAdapter {
  readonly name = "local";
  readonly supportsSharing = false;
  private basePath: string | null = null;

  constructor(private readonly logger: Logger) {}

  async initialize(options: StorageOptions): Promise<void> {
    requireOptions(options, ["path"], "local storage");
    const basePath = path.resolve(option(options, "path"));
    try {
      await mkdir(basePath, { recursive: true });
    } catch (error) {
      throw new ConfigurationError(`Failed to initialize local storage at ${basePath}`, ["path"], { cause: error });
    }
    this.basePath = basePath;
    this.logger.debug({ basePath }, "Local storage initialized");
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    const target = this.resolve(remotePath);
    const source = await stat(localPath).catch(() => null);
    if (!source?.isFile()) {
      throw new NotFoundError(`Source file not found: ${localPath}`);
    }
    try {
      await mkdir(path.dirname(target), { recursive: true });
      await copyFile(localPath, target);
    } catch (error) {
      throw toTransferError(error, `Upload of ${localPath} to local storage`);
    }
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    const source = this.resolve(remotePath);
    const info = await stat(source).catch(() => null);
    if (!info?.isFile()) {
      throw new NotFoundError(`File not found in local storage: ${remotePath}`);
    }
    try {
      await mkdir(path.dirname(localPath), { recursive: true });
      await copyFile(source, localPath);
    } catch (error) {
      throw toTransferError(error, `Download of ${remotePath} from local storage`);
    }
  }

  async exists(remotePath: string): Promise<boolean> {
    try {
      const info = await stat(this.resolve(remotePath));
      return info.isFile();
    } catch (error) {
      if (hasErrorCode(error, "ENOENT", "ENOTDIR")) {
        return false;
      }
      throw toTransferError(error, `Lookup of ${remotePath} in local storage`);
    }
  }

  async delete(remotePath: string): Promise<void> {
    try {
      await rm(this.resolve(remotePath), { force: true });
    } catch (error) {
      throw toTransferError(error, `Delete of ${remotePath} from local storage`);
    }
  }

  async generateShareLink(): Promise<string> {
    throw unsupportedSharing(this.name);
  }

  async release(): Promise<void> {
    this.basePath = null;
  }

  private resolve(remotePath: string): string {
    if (!this.basePath) {
      throw notInitialized(this.name);
    }
    const target = path.resolve(this.basePath, normalizeRemotePath(remotePath));
    if (!target.startsWith(`${this.basePath}${path.sep}`)) {
      throw new ConfigurationError(`Remote path escapes the storage base path: ${remotePath}`, ["remotePath"]);
    }
    return target;
  }
}
