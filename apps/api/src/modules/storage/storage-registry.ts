import type { StorageOptions, StorageType } from "@backhaul/shared";
import { ConfigurationError } from "../../core/errors.js";
import type { Logger } from "../../core/logger.js";
import { AzureBlobAdapter } from "./adapters/azure-blob-adapter.js";
import { DropboxAdapter } from "./adapters/dropbox-adapter.js";
import { GcsAdapter } from "./adapters/gcs-adapter.js";
import { GitHubAdapter } from "./adapters/github-adapter.js";
import { GoogleDriveAdapter } from "./adapters/google-drive-adapter.js";
import { LocalFsAdapter } from "./adapters/local-fs-adapter.js";
import { S3Adapter, amazonS3Variant, backblazeB2Variant } from "./adapters/s3-adapter.js";
import { SftpAdapter } from "./adapters/sftp-adapter.js";
import type { StorageAdapter } from "./storage-adapter.js";

export type StorageFactory = (logger: Logger) => StorageAdapter;

export const builtinStorageFactories: Readonly<Record<StorageType, StorageFactory>> = {
  local: (logger) => new LocalFsAdapter(logger),
  s3: (logger) => new S3Adapter(logger, amazonS3Variant),
  b2: (logger) => new S3Adapter(logger, backblazeB2Variant),
  azure: (logger) => new AzureBlobAdapter(logger),
  gcp: (logger) => new GcsAdapter(logger),
  gdrive: (logger) => new GoogleDriveAdapter(logger),
  dropbox: (logger) => new DropboxAdapter(logger),
  github: (logger) => new GitHubAdapter(logger),
  sftp: (logger) => new SftpAdapter(logger)
};

/**
 * Name to factory table. Every `create` returns a fresh, initialized adapter
 * owned by the caller, who must release it.
 */
export class StorageRegistry {
  private readonly factories = new Map<string, StorageFactory>();

  constructor(
    private readonly logger: Logger,
    private readonly configured: Readonly<Record<string, StorageOptions>> = {},
    factories: Readonly<Record<string, StorageFactory>> = builtinStorageFactories
  ) {
    for (const [name, factory] of Object.entries(factories)) {
      this.register(name, factory);
    }
  }

  register(name: string, factory: StorageFactory): void {
    const key = name.trim().toLowerCase();
    if (!key) {
      throw new ConfigurationError("Storage name cannot be empty", ["storageType"]);
    }
    this.factories.set(key, factory);
  }

  names(): string[] {
    return [...this.factories.keys()].sort();
  }

  has(name: string): boolean {
    return this.factories.has(name.trim().toLowerCase());
  }

  /** Instantiates without initializing. */
  instantiate(name: string): StorageAdapter {
    const key = name.trim().toLowerCase();
    const factory = this.factories.get(key);
    if (!factory) {
      throw new ConfigurationError(
        `Unknown storage type '${name}'. Valid types: ${this.names().join(", ")}`,
        ["storageType"]
      );
    }
    return factory(this.logger.child({ storageType: key }));
  }

  async create(name: string, options: StorageOptions): Promise<StorageAdapter> {
    const storage = this.instantiate(name);
    try {
      await storage.initialize(options);
    } catch (error) {
      await storage.release().catch((releaseError: unknown) => {
        this.logger.warn({ storageType: storage.name, err: releaseError }, "Release after failed initialize failed");
      });
      throw error;
    }
    return storage;
  }

  /** Creates the backend with the options held in configuration for `name`. */
  resolve(name: string): Promise<StorageAdapter> {
    return this.create(name, this.optionsFor(name));
  }

  optionsFor(name: string): StorageOptions {
    return this.configured[name.trim().toLowerCase()] ?? {};
  }
}
