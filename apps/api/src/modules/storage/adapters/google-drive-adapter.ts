import { createReadStream, createWriteStream } from "node:fs";
import { mkdir, stat } from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { auth, drive, type drive_v3 } from "@googleapis/drive";
import type { StorageOptions } from "@backhaul/shared";
import { NotFoundError, httpStatusOf, toTransferError } from "../../../core/errors.js";
import type { Logger } from "../../../core/logger.js";
import {
  normalizeRemotePath,
  notInitialized,
  option,
  optionalOption,
  requireOptions,
  unsupportedSharing,
  type StorageAdapter
} from "../storage-adapter.js";

const FOLDER_MIME = "application/vnd.google-apps.folder";
export const DEFAULT_DRIVE_FOLDER = "Backhaul Backups";

export function escapeDriveQuery(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

/**
 * Google Drive through a stored OAuth refresh token. Remote paths map onto a
 * folder tree under one backup root folder; folder ids are cached per session.
 */
export class GoogleDriveAdapter implements StorageAdapter {
  readonly name = "gdrive";
  readonly supportsSharing = false;
  private service: drive_v3.Drive | null = null;
  private rootFolderId = "";
  private readonly folderCache = new Map<string, string>();

  constructor(private readonly logger: Logger) {}

  async initialize(options: StorageOptions): Promise<void> {
    requireOptions(options, ["client_id", "client_secret", "refresh_token"], "Google Drive");
    const client = new auth.OAuth2(option(options, "client_id"), option(options, "client_secret"));
    client.setCredentials({ refresh_token: option(options, "refresh_token") });
    const service = drive({ version: "v3", auth: client });
    const folderName = optionalOption(options, "backup_folder_name") ?? DEFAULT_DRIVE_FOLDER;

    try {
      this.service = service;
      this.rootFolderId = await this.findOrCreateFolder(folderName, "root");
    } catch (error) {
      this.service = null;
      throw toTransferError(error, "Connecting to Google Drive");
    }
    this.logger.info({ storageType: this.name, folderName }, "Connected to Google Drive");
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    const service = this.session();
    const info = await stat(localPath).catch(() => null);
    if (!info?.isFile()) {
      throw new NotFoundError(`Source file not found: ${localPath}`);
    }
    const normalized = normalizeRemotePath(remotePath);
    try {
      const parentId = await this.resolveFolder(path.posix.dirname(normalized), true);
      const fileName = path.posix.basename(normalized);
      const existingId = await this.findChild(fileName, parentId, false);
      if (existingId) {
        await service.files.update({ fileId: existingId, media: { body: createReadStream(localPath) } });
      } else {
        await service.files.create({
          requestBody: { name: fileName, parents: [parentId] },
          media: { body: createReadStream(localPath) },
          fields: "id"
        });
      }
    } catch (error) {
      throw toTransferError(error, `Upload of ${localPath} to Google Drive`);
    }
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    const service = this.session();
    const fileId = await this.requireFileId(remotePath);
    try {
      const response = await service.files.get({ fileId, alt: "media" }, { responseType: "stream" });
      await mkdir(path.dirname(localPath), { recursive: true });
      await pipeline(response.data, createWriteStream(localPath));
    } catch (error) {
      if (httpStatusOf(error) === 404) {
        throw new NotFoundError(`File not found in Google Drive: ${remotePath}`, { cause: error });
      }
      throw toTransferError(error, `Download of ${remotePath} from Google Drive`);
    }
  }

  async exists(remotePath: string): Promise<boolean> {
    this.session();
    return (await this.lookupFileId(remotePath)) !== null;
  }

  async delete(remotePath: string): Promise<void> {
    const service = this.session();
    const fileId = await this.lookupFileId(remotePath);
    if (!fileId) {
      return;
    }
    try {
      await service.files.delete({ fileId });
    } catch (error) {
      if (httpStatusOf(error) === 404) {
        return;
      }
      throw toTransferError(error, `Delete of ${remotePath} from Google Drive`);
    }
  }

  async generateShareLink(): Promise<string> {
    throw unsupportedSharing(this.name);
  }

  async release(): Promise<void> {
    this.service = null;
    this.folderCache.clear();
  }

  private session(): drive_v3.Drive {
    if (!this.service) {
      throw notInitialized(this.name);
    }
    return this.service;
  }

  private async requireFileId(remotePath: string): Promise<string> {
    const fileId = await this.lookupFileId(remotePath);
    if (!fileId) {
      throw new NotFoundError(`File not found in Google Drive: ${remotePath}`);
    }
    return fileId;
  }

  private async lookupFileId(remotePath: string): Promise<string | null> {
    const normalized = normalizeRemotePath(remotePath);
    try {
      const parentId = await this.resolveFolder(path.posix.dirname(normalized), false);
      if (!parentId) {
        return null;
      }
      return await this.findChild(path.posix.basename(normalized), parentId, false);
    } catch (error) {
      throw toTransferError(error, `Lookup of ${remotePath} in Google Drive`);
    }
  }

  private async resolveFolder(folderPath: string, create: true): Promise<string>;
  private async resolveFolder(folderPath: string, create: boolean): Promise<string | null>;
  private async resolveFolder(folderPath: string, create: boolean): Promise<string | null> {
    const parts = folderPath.split("/").filter((part) => part && part !== ".");
    let parentId = this.rootFolderId;
    let currentPath = "";
    for (const part of parts) {
      currentPath = currentPath ? `${currentPath}/${part}` : part;
      const cached = this.folderCache.get(currentPath);
      if (cached) {
        parentId = cached;
        continue;
      }
      const folderId = create
        ? await this.findOrCreateFolder(part, parentId)
        : await this.findChild(part, parentId, true);
      if (!folderId) {
        return null;
      }
      this.folderCache.set(currentPath, folderId);
      parentId = folderId;
    }
    return parentId;
  }

  private async findChild(name: string, parentId: string, folder: boolean): Promise<string | null> {
    const service = this.session();
    const mimeFilter = folder ? ` and mimeType='${FOLDER_MIME}'` : ` and mimeType!='${FOLDER_MIME}'`;
    const response = await service.files.list({
      q: `name='${escapeDriveQuery(name)}' and '${escapeDriveQuery(parentId)}' in parents${mimeFilter} and trashed=false`,
      fields: "files(id, name)",
      spaces: "drive",
      pageSize: 1
    });
    return response.data.files?.[0]?.id ?? null;
  }

  private async findOrCreateFolder(name: string, parentId: string): Promise<string> {
    const existing = await this.findChild(name, parentId, true);
    if (existing) {
      return existing;
    }
    const created = await this.session().files.create({
      requestBody: { name, mimeType: FOLDER_MIME, parents: [parentId] },
      fields: "id"
    });
    if (!created.data.id) {
      throw new Error(`Google Drive did not return an id for folder ${name}`);
    }
    return created.data.id;
  }
}
