import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { RestoreResult } from "@backhaul/shared";
import type { AppConfig } from "../../config/app-config.js";
import { AuthenticationError } from "../../core/errors.js";
import type { Logger } from "../../core/logger.js";
import { ENCRYPTED_SUFFIX, artifactKind, type ArchiveService } from "../archive/archive-service.js";
import type { EncryptionService } from "../crypto/encryption-service.js";
import { requirePassword, type PasswordProvider } from "../crypto/password-provider.js";
import { normalizeRemotePath, withStorage } from "../storage/storage-adapter.js";
import type { StorageRegistry } from "../storage/storage-registry.js";
import type { FileStateRepository } from "./repository/file-state-repository.js";

export type RestoreEngineDeps = {
  config: AppConfig;
  registry: StorageRegistry;
  state: FileStateRepository;
  archive: ArchiveService;
  encryption: EncryptionService;
  passwords: PasswordProvider;
  logger: Logger;
  tempRoot?: string;
};

export class RestoreService {
  constructor(private readonly deps: RestoreEngineDeps) {}

  /** Storage recorded for `remotePath`, else the global default. */
  storageTypeFor(remotePath: string): string {
    return this.deps.state.findByRemotePath(remotePath)?.storageType ?? this.deps.config.globalStorageType;
  }

  async restoreFromBackup(backupPath: string, targetDir: string, storageOverride?: string): Promise<RestoreResult> {
    const { registry, archive, encryption, passwords, logger } = this.deps;
    const remotePath = normalizeRemotePath(backupPath);
    const fileName = path.posix.basename(remotePath);
    const kind = artifactKind(fileName);
    const target = path.resolve(targetDir);
    const storageType = (storageOverride ?? this.storageTypeFor(remotePath)).toLowerCase();
    const workDir = await mkdtemp(path.join(this.deps.tempRoot ?? os.tmpdir(), "backhaul-restore-"));

    try {
      let artifactPath = path.join(workDir, fileName);
      const storage = await registry.resolve(storageType);
      await withStorage(storage, (backend) => backend.download(remotePath, artifactPath), logger);

      if (fileName.toLowerCase().endsWith(ENCRYPTED_SUFFIX)) {
        const password = await requirePassword(passwords, "restoring an encrypted backup");
        const decrypted = artifactPath.slice(0, -ENCRYPTED_SUFFIX.length);
        try {
          await encryption.decryptFile(artifactPath, decrypted, password);
        } catch (error) {
          if (error instanceof AuthenticationError) {
            passwords.clearPassword();
          }
          throw error;
        }
        artifactPath = decrypted;
      }

      if (kind === "tar.gz") {
        const tarPath = path.join(workDir, "archive.tar");
        await archive.gunzip(artifactPath, tarPath);
        artifactPath = tarPath;
      }

      const summary = await archive.extract(artifactPath, target, kind === "zip" ? "zip" : "tar");
      logger.info(
        { remotePath, storageType, targetDir: target, fileCount: summary.fileCount, totalBytes: summary.totalBytes },
        "Restore completed"
      );
      return { backupPath: remotePath, targetDir: target, ...summary };
    } catch (error) {
      logger.error({ remotePath, storageType, targetDir: target, err: error }, "Restore failed");
      throw error;
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}
