import { createReadStream, createWriteStream } from "node:fs";
import { mkdir, stat } from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
  type S3ClientConfig
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import type { StorageOptions } from "@backhaul/shared";
import { ConfigurationError, NotFoundError, TransferError, toTransferError } from "../../../core/errors.js";
import type { Logger } from "../../../core/logger.js";
import {
  normalizeRemotePath,
  notInitialized,
  option,
  optionalOption,
  MAX_PRESIGN_SECONDS,
  requireOptions,
  type StorageAdapter
} from "../storage-adapter.js";

export interface S3Variant {
  name: string;
  label: string;
  required: readonly string[];
  toClientConfig(options: StorageOptions): { bucket: string; config: S3ClientConfig };
}

export const amazonS3Variant: S3Variant = {
  name: "s3",
  label: "S3",
  required: ["accessKeyId", "secretAccessKey", "region", "bucketName"],
  toClientConfig(options) {
    const endpoint = optionalOption(options, "endpoint");
    return {
      bucket: option(options, "bucketName"),
      config: {
        region: option(options, "region"),
        credentials: {
          accessKeyId: option(options, "accessKeyId"),
          secretAccessKey: option(options, "secretAccessKey")
        },
        ...(endpoint ? { endpoint, forcePathStyle: true } : {})
      }
    };
  }
};

/** Backblaze B2 through its S3-compatible endpoint. */
export const backblazeB2Variant: S3Variant = {
  name: "b2",
  label: "Backblaze B2",
  required: ["keyId", "applicationKey", "serviceUrl", "bucketName"],
  toClientConfig(options) {
    const serviceUrl = option(options, "serviceUrl");
    return {
      bucket: option(options, "bucketName"),
      config: {
        region: optionalOption(options, "region") ?? regionFromB2Endpoint(serviceUrl),
        endpoint: serviceUrl,
        forcePathStyle: true,
        credentials: {
          accessKeyId: option(options, "keyId"),
          secretAccessKey: option(options, "applicationKey")
        }
      }
    };
  }
};

export function regionFromB2Endpoint(serviceUrl: string): string {
  const match = /s3\.([a-z0-9-]+)\.backblazeb2\.com/i.exec(serviceUrl);
  return match?.[1] ?? "us-west-004";
}

function isNotFound(error: unknown): boolean {
  if (!(error instanceof S3ServiceException)) {
    return false;
  }
  return error.name === "NoSuchKey" || error.name === "NotFound" || error.$metadata.httpStatusCode === 404;
}

export class S3Adapter implements StorageAdapter {
  readonly supportsSharing = true;
  private client: S3Client | null = null;
  private bucket = "";

  constructor(
    private readonly logger: Logger,
    private readonly variant: S3Variant = amazonS3Variant
  ) {}

  get name(): string {
    return this.variant.name;
  }

  async initialize(options: StorageOptions): Promise<void> {
    requireOptions(options, this.variant.required, this.variant.label);
    const { bucket, config } = this.variant.toClientConfig(options);
    const client = new S3Client(config);
    try {
      await client.send(new HeadBucketCommand({ Bucket: bucket }));
    } catch (error) {
      client.destroy();
      if (isNotFound(error)) {
        throw new ConfigurationError(`${this.variant.label} bucket '${bucket}' not found or not accessible`, ["bucketName"], {
          cause: error
        });
      }
      throw toTransferError(error, `Connecting to ${this.variant.label} bucket ${bucket}`);
    }
    this.client = client;
    this.bucket = bucket;
    this.logger.info({ storageType: this.name, bucket }, "Connected to bucket");
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    const client = this.session();
    const info = await stat(localPath).catch(() => null);
    if (!info?.isFile()) {
      throw new NotFoundError(`Source file not found: ${localPath}`);
    }
    try {
      await client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: normalizeRemotePath(remotePath),
          Body: createReadStream(localPath),
          ContentLength: info.size
        })
      );
    } catch (error) {
      throw toTransferError(error, `Upload of ${localPath} to ${this.variant.label}`);
    }
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    const client = this.session();
    try {
      const response = await client.send(new GetObjectCommand({ Bucket: this.bucket, Key: normalizeRemotePath(remotePath) }));
      if (!(response.Body instanceof Readable)) {
        throw new TransferError(`${this.variant.label} returned no readable body for ${remotePath}`);
      }
      await mkdir(path.dirname(localPath), { recursive: true });
      await pipeline(response.Body, createWriteStream(localPath));
    } catch (error) {
      if (isNotFound(error)) {
        throw new NotFoundError(`Object not found in ${this.variant.label}: ${remotePath}`, { cause: error });
      }
      throw toTransferError(error, `Download of ${remotePath} from ${this.variant.label}`);
    }
  }

  async exists(remotePath: string): Promise<boolean> {
    const client = this.session();
    try {
      await client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: normalizeRemotePath(remotePath) }));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw toTransferError(error, `Lookup of ${remotePath} in ${this.variant.label}`);
    }
  }

  async delete(remotePath: string): Promise<void> {
    const client = this.session();
    try {
      await client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: normalizeRemotePath(remotePath) }));
    } catch (error) {
      if (isNotFound(error)) {
        return;
      }
      throw toTransferError(error, `Delete of ${remotePath} from ${this.variant.label}`);
    }
  }

  async generateShareLink(remotePath: string, expirationMs: number): Promise<string> {
    const client = this.session();
    const expiresIn = Math.ceil(expirationMs / 1000);
    if (expiresIn < 1 || expiresIn > MAX_PRESIGN_SECONDS) {
      throw new ConfigurationError(`Share link expiration must be between 1 second and ${MAX_PRESIGN_SECONDS} seconds`, [
        "expiration"
      ]);
    }
    try {
      return await getSignedUrl(client, new GetObjectCommand({ Bucket: this.bucket, Key: normalizeRemotePath(remotePath) }), {
        expiresIn
      });
    } catch (error) {
      throw toTransferError(error, `Signing a share link for ${remotePath}`);
    }
  }

  async release(): Promise<void> {
    this.client?.destroy();
    this.client = null;
  }

  private session(): S3Client {
    if (!this.client) {
      throw notInitialized(this.name);
    }
    return this.client;
  }
}
