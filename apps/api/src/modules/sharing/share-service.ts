import { randomUUID } from "node:crypto";
import { stat } from "node:fs/promises";
import path from "node:path";
import type { ShareLink } from "@backhaul/shared";
import { ConfigurationError, NotFoundError, errorMessage } from "../../core/errors.js";
import type { Logger } from "../../core/logger.js";
import { unsupportedSharing, withStorage } from "../storage/storage-adapter.js";
import type { StorageRegistry } from "../storage/storage-registry.js";

export function shareRemotePath(localPath: string, id: string = randomUUID()): string {
  return `shared/${id}/${path.basename(localPath)}`;
}

export class ShareService {
  constructor(
    private readonly registry: StorageRegistry,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Uploads `localPath` under a fresh `shared/` prefix and returns a time-limited
   * link. When the link cannot be issued the uploaded object is deleted again.
   */
  async shareFile(localPath: string, storageType: string, expirationMs: number): Promise<ShareLink> {
    if (!Number.isFinite(expirationMs) || expirationMs <= 0) {
      throw new ConfigurationError("Share link expiration must be a positive duration", ["expiration"]);
    }
    const absolute = path.resolve(localPath);
    const info = await stat(absolute).catch(() => null);
    if (!info?.isFile()) {
      throw new NotFoundError(`File to share not found: ${absolute}`);
    }

    const storage = await this.registry.resolve(storageType);
    return withStorage(
      storage,
      async (backend) => {
        if (!backend.supportsSharing) {
          throw unsupportedSharing(backend.name);
        }
        const remotePath = shareRemotePath(absolute);
        await backend.upload(absolute, remotePath);

        let url: string;
        try {
          url = await backend.generateShareLink(remotePath, expirationMs);
        } catch (error) {
          try {
            await backend.delete(remotePath);
          } catch (cleanupError) {
            this.logger.warn(
              { remotePath, storageType: backend.name, err: errorMessage(cleanupError) },
              "Could not delete shared object after link failure"
            );
          }
          throw error;
        }

        const expiresAt = new Date(this.now().getTime() + expirationMs).toISOString();
        this.logger.info({ remotePath, storageType: backend.name, expiresAt }, "Share link issued");
        return { remotePath, expiresAt, url };
      },
      this.logger
    );
  }
}
