import { mkdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import SftpClient from "ssh2-sftp-client";
import type { StorageOptions } from "@backhaul/shared";
import { ConfigurationError, NotFoundError, toTransferError } from "../../../core/errors.js";
import type { Logger } from "../../../core/logger.js";
import {
  normalizeRemotePath,
  notInitialized,
  option,
  missingOptions,
  optionalOption,
  unsupportedSharing,
  type StorageAdapter
} from "../storage-adapter.js";

export const DEFAULT_SFTP_PORT = 22;

/** Either a password or a private key file must be present. Every problem is reported at once. */
export function validateSftpOptions(options: StorageOptions): void {
  const problems = missingOptions(options, ["host", "username"]);
  if (!optionalOption(options, "password") && !optionalOption(options, "privateKeyPath")) {
    problems.push("password", "privateKeyPath");
  }
  const port = optionalOption(options, "port");
  if (port !== undefined && !/^\d+$/.test(port)) {
    problems.push("port");
  }
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid SFTP configuration: ${problems.join(", ")}`, problems);
  }
}

export class SftpAdapter implements StorageAdapter {
  readonly name = "sftp";
  readonly supportsSharing = false;
  private client: SftpClient | null = null;
  private basePath = "";

  constructor(private readonly logger: Logger) {}

  async initialize(options: StorageOptions): Promise<void> {
    validateSftpOptions(options);
    const host = option(options, "host");
    const keyPath = optionalOption(options, "privateKeyPath");
    let privateKey: Buffer | undefined;
    if (keyPath) {
      privateKey = await readFile(keyPath).catch((error: unknown) => {
        throw new ConfigurationError(`SFTP private key not readable: ${keyPath}`, ["privateKeyPath"], { cause: error });
      });
    }

    const client = new SftpClient();
    try {
      await client.connect({
        host,
        port: Number(optionalOption(options, "port") ?? DEFAULT_SFTP_PORT),
        username: option(options, "username"),
        ...(privateKey
          ? { privateKey, passphrase: optionalOption(options, "passphrase") }
          : { password: option(options, "password") })
      });
    } catch (error) {
      throw toTransferError(error, `Connecting to SFTP server ${host}`);
    }
    this.client = client;
    this.basePath = (optionalOption(options, "basePath") ?? "").replace(/\\/g, "/").replace(/\/+$/, "");
    this.logger.info({ storageType: this.name, host }, "Connected to SFTP server");
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    const client = this.session();
    const info = await stat(localPath).catch(() => null);
    if (!info?.isFile()) {
      throw new NotFoundError(`Source file not found: ${localPath}`);
    }
    const target = this.resolve(remotePath);
    try {
      const remoteDir = path.posix.dirname(target);
      if (remoteDir !== "." && remoteDir !== "/" && !(await client.exists(remoteDir))) {
        await client.mkdir(remoteDir, true);
      }
      await client.fastPut(localPath, target);
    } catch (error) {
      throw toTransferError(error, `Upload of ${localPath} to SFTP`);
    }
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    const client = this.session();
    const source = this.resolve(remotePath);
    try {
      if (!(await client.exists(source))) {
        throw new NotFoundError(`File not found on SFTP server: ${remotePath}`);
      }
      await mkdir(path.dirname(localPath), { recursive: true });
      await client.fastGet(source, localPath);
    } catch (error) {
      throw toTransferError(error, `Download of ${remotePath} from SFTP`);
    }
  }

  async exists(remotePath: string): Promise<boolean> {
    const client = this.session();
    try {
      return (await client.exists(this.resolve(remotePath))) === "-";
    } catch (error) {
      throw toTransferError(error, `Lookup of ${remotePath} on SFTP`);
    }
  }

  async delete(remotePath: string): Promise<void> {
    const client = this.session();
    try {
      await client.delete(this.resolve(remotePath), true);
    } catch (error) {
      throw toTransferError(error, `Delete of ${remotePath} from SFTP`);
    }
  }

  async generateShareLink(): Promise<string> {
    throw unsupportedSharing(this.name);
  }

  async release(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) {
      await client.end();
      this.logger.debug({ storageType: this.name }, "SFTP connection closed");
    }
  }

  private session(): SftpClient {
    if (!this.client) {
      throw notInitialized(this.name);
    }
    return this.client;
  }

  private resolve(remotePath: string): string {
    const normalized = normalizeRemotePath(remotePath);
    return this.basePath ? `${this.basePath}/${normalized}` : normalized;
  }
}
