import { open, readFile, stat } from "node:fs/promises";
import { Dropbox, DropboxResponseError } from "dropbox";
import type { StorageOptions } from "@backhaul/shared";
import { ConfigurationError, NotFoundError, TransferError, toTransferError } from "../../../core/errors.js";
import type { Logger } from "../../../core/logger.js";
import {
  missingOptions,
  normalizeRemotePath,
  notInitialized,
  option,
  saveResponseBody,
  type StorageAdapter
} from "../storage-adapter.js";

/** Single-request uploads are capped at 150 MiB; larger files go through an upload session. */
const SINGLE_UPLOAD_LIMIT = 150 * 1024 * 1024;
const SESSION_CHUNK_BYTES = 8 * 1024 * 1024;

export function dropboxPath(remotePath: string): string {
  return `/${normalizeRemotePath(remotePath)}`;
}

export function errorSummary(error: unknown): string {
  if (!(error instanceof DropboxResponseError)) {
    return "";
  }
  const body: unknown = error.error;
  if (typeof body === "object" && body !== null && "error_summary" in body && typeof body.error_summary === "string") {
    return body.error_summary;
  }
  return "";
}

function isNotFound(error: unknown): boolean {
  return error instanceof DropboxResponseError && error.status === 409 && errorSummary(error).includes("not_found");
}

/** Accepts a long-lived access token, or a refresh token with the app key pair. */
export function validateDropboxOptions(options: StorageOptions): void {
  if (option(options, "accessToken")) {
    return;
  }
  const missing = missingOptions(options, ["refreshToken", "appKey", "appSecret"]);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing Dropbox configuration: provide accessToken, or refreshToken, appKey and appSecret (missing: ${["accessToken", ...missing].join(", ")})`,
      ["accessToken", ...missing]
    );
  }
}

export class DropboxAdapter implements StorageAdapter {
  readonly name = "dropbox";
  readonly supportsSharing = true;
  private client: Dropbox | null = null;

  constructor(private readonly logger: Logger) {}

  async initialize(options: StorageOptions): Promise<void> {
    validateDropboxOptions(options);
    const accessToken = option(options, "accessToken");
    // The SDK falls back to its bundled fetch polyfill unless one is supplied.
    const runtimeFetch = (input: string, init?: RequestInit): Promise<Response> => fetch(input, init);
    const client = accessToken
      ? new Dropbox({ accessToken, fetch: runtimeFetch })
      : new Dropbox({
          refreshToken: option(options, "refreshToken"),
          clientId: option(options, "appKey"),
          clientSecret: option(options, "appSecret"),
          fetch: runtimeFetch
        });
    try {
      const account = await client.usersGetCurrentAccount();
      this.logger.info({ storageType: this.name, accountId: account.result.account_id }, "Connected to Dropbox");
    } catch (error) {
      throw toTransferError(error, "Connecting to Dropbox");
    }
    this.client = client;
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    const client = this.session();
    const info = await stat(localPath).catch(() => null);
    if (!info?.isFile()) {
      throw new NotFoundError(`Source file not found: ${localPath}`);
    }
    const target = dropboxPath(remotePath);
    try {
      if (info.size <= SINGLE_UPLOAD_LIMIT) {
        const contents = await readFile(localPath);
        await client.filesUpload({ path: target, contents, mode: { ".tag": "overwrite" } });
        return;
      }
      await this.uploadInSession(client, localPath, target, info.size);
    } catch (error) {
      throw toTransferError(error, `Upload of ${localPath} to Dropbox`);
    }
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    const client = this.session();
    let link: string;
    try {
      link = (await client.filesGetTemporaryLink({ path: dropboxPath(remotePath) })).result.link;
    } catch (error) {
      if (isNotFound(error)) {
        throw new NotFoundError(`File not found in Dropbox: ${remotePath}`, { cause: error });
      }
      throw toTransferError(error, `Download of ${remotePath} from Dropbox`);
    }
    try {
      const response = await fetch(link);
      if (!response.ok) {
        throw new TransferError(`Dropbox content request returned ${response.status}`);
      }
      await saveResponseBody(response, localPath);
    } catch (error) {
      throw toTransferError(error, `Download of ${remotePath} from Dropbox`);
    }
  }

  async exists(remotePath: string): Promise<boolean> {
    const client = this.session();
    try {
      await client.filesGetMetadata({ path: dropboxPath(remotePath) });
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw toTransferError(error, `Lookup of ${remotePath} in Dropbox`);
    }
  }

  async delete(remotePath: string): Promise<void> {
    const client = this.session();
    try {
      await client.filesDeleteV2({ path: dropboxPath(remotePath) });
    } catch (error) {
      if (isNotFound(error)) {
        return;
      }
      throw toTransferError(error, `Delete of ${remotePath} from Dropbox`);
    }
  }

  async generateShareLink(remotePath: string, expirationMs: number): Promise<string> {
    const client = this.session();
    const target = dropboxPath(remotePath);
    const expires = new Date(Date.now() + expirationMs).toISOString().replace(/\.\d{3}Z$/, "Z");
    try {
      const created = await client.sharingCreateSharedLinkWithSettings({
        path: target,
        settings: {
          requested_visibility: { ".tag": "public" },
          audience: { ".tag": "public" },
          access: { ".tag": "viewer" },
          expires
        }
      });
      return created.result.url;
    } catch (error) {
      if (!errorSummary(error).startsWith("shared_link_already_exists")) {
        throw toTransferError(error, `Creating a Dropbox shared link for ${remotePath}`);
      }
    }
    // An existing link keeps its own expiry unless it is moved to the requested one.
    try {
      const existing = await client.sharingListSharedLinks({ path: target, direct_only: true });
      const url = existing.result.links[0]?.url;
      if (!url) {
        throw new TransferError(`Dropbox reported an existing shared link for ${remotePath} but listed none`);
      }
      const modified = await client.sharingModifySharedLinkSettings({ url, settings: { expires }, remove_expiration: false });
      return modified.result.url;
    } catch (error) {
      throw toTransferError(error, `Updating the Dropbox shared link for ${remotePath}`);
    }
  }

  async release(): Promise<void> {
    this.client = null;
  }

  private session(): Dropbox {
    if (!this.client) {
      throw notInitialized(this.name);
    }
    return this.client;
  }

  private async uploadInSession(client: Dropbox, localPath: string, target: string, size: number): Promise<void> {
    const handle = await open(localPath, "r");
    try {
      const buffer = Buffer.alloc(SESSION_CHUNK_BYTES);
      let offset = 0;
      let sessionId = "";
      while (offset < size) {
        const { bytesRead } = await handle.read(buffer, 0, SESSION_CHUNK_BYTES, offset);
        const chunk = Buffer.from(buffer.subarray(0, bytesRead));
        const last = offset + bytesRead >= size;
        if (offset === 0) {
          sessionId = (await client.filesUploadSessionStart({ contents: chunk, close: false })).result.session_id;
        } else if (!last) {
          await client.filesUploadSessionAppendV2({ cursor: { session_id: sessionId, offset }, contents: chunk });
        } else {
          await client.filesUploadSessionFinish({
            cursor: { session_id: sessionId, offset },
            commit: { path: target, mode: { ".tag": "overwrite" } },
            contents: chunk
          });
        }
        offset += bytesRead;
      }
      this.logger.debug({ storageType: this.name, target, size }, "Session upload finished");
    } finally {
      await handle.close();
    }
  }
}
