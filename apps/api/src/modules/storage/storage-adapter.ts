import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { StorageOptions } from "@backhaul/shared";
import type { Logger } from "../../core/logger.js";
import { ConfigurationError, TransferError, UnsupportedOperationError, errorMessage } from "../../core/errors.js";

/** SigV4 presigned URLs are valid for at most seven days. */
export const MAX_PRESIGN_SECONDS = 7 * 24 * 60 * 60;

/**
 * Uniform contract over every remote storage provider. One instance owns one
 * remote session and is not shared between concurrent operations.
 */
export interface StorageAdapter {
  readonly name: string;
  readonly supportsSharing: boolean;
  initialize(options: StorageOptions): Promise<void>;
  /** Overwrites `remotePath` when it already exists. */
  upload(localPath: string, remotePath: string): Promise<void>;
  /** Creates missing parent directories of `localPath`. */
  download(remotePath: string, localPath: string): Promise<void>;
  exists(remotePath: string): Promise<boolean>;
  /** Deleting an absent object is not an error. */
  delete(remotePath: string): Promise<void>;
  generateShareLink(remotePath: string, expirationMs: number): Promise<string>;
  /** Idempotent. */
  release(): Promise<void>;
}

export function missingOptions(options: StorageOptions, required: readonly string[]): string[] {
  return required.filter((key) => !options[key]?.trim());
}

/** Throws one ConfigurationError naming every missing or empty key. */
export function requireOptions(options: StorageOptions, required: readonly string[], label: string): void {
  const missing = missingOptions(options, required);
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing ${label} configuration: ${missing.join(", ")}`, missing);
  }
}

export function option(options: StorageOptions, key: string): string {
  return options[key]?.trim() ?? "";
}

export function optionalOption(options: StorageOptions, key: string): string | undefined {
  const value = options[key]?.trim();
  return value ? value : undefined;
}

export function unsupportedSharing(name: string): UnsupportedOperationError {
  return new UnsupportedOperationError(`Sharing is not supported by the ${name} storage provider.`);
}

export function notInitialized(name: string): ConfigurationError {
  return new ConfigurationError(`Storage provider ${name} is not initialized or was already released.`);
}

export function normalizeRemotePath(remotePath: string): string {
  const trimmed = remotePath.replace(/\\/g, "/").replace(/^\/+/, "").replace(/\/+/g, "/");
  if (!trimmed) {
    throw new ConfigurationError("Remote path cannot be empty", ["remotePath"]);
  }
  return trimmed;
}

/** Streams an HTTP response body to `localPath`, creating its parent directories. */
export async function saveResponseBody(response: Response, localPath: string): Promise<void> {
  if (!response.body) {
    throw new TransferError(`Empty response body for ${localPath}`);
  }
  await mkdir(path.dirname(localPath), { recursive: true });
  await pipeline(Readable.fromWeb(response.body), createWriteStream(localPath));
}

/**
 * Runs `task` against `storage` and releases it on every exit path. A release
 * failure is logged and never replaces the task's own error.
 */
export async function withStorage<T>(
  storage: StorageAdapter,
  task: (storage: StorageAdapter) => Promise<T>,
  logger?: Logger
): Promise<T> {
  try {
    return await task(storage);
  } finally {
    try {
      await storage.release();
    } catch (error) {
      logger?.warn({ storageType: storage.name, err: errorMessage(error) }, "Storage release failed");
    }
  }
}
