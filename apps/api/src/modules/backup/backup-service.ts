import { mkdtemp, rm, stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { performance } from "node:perf_hooks";
import type { BackupRecord, BackupType } from "@backhaul/shared";
import { storageTypeForPath, type AppConfig } from "../../config/app-config.js";
import { BackupStageError, NotFoundError, type BackupStage } from "../../core/errors.js";
import type { Logger } from "../../core/logger.js";
import { ENCRYPTED_SUFFIX, type ArchiveService } from "../archive/archive-service.js";
import { selectFiles, selectListedFiles, type FileSelection } from "../archive/file-selection.js";
import type { EncryptionService } from "../crypto/encryption-service.js";
import { requirePassword, type PasswordProvider } from "../crypto/password-provider.js";
import { withStorage, type StorageAdapter } from "../storage/storage-adapter.js";
import type { StorageRegistry } from "../storage/storage-registry.js";
import { nextManifest, planChanges, type ChangePlan } from "./change-detection.js";
import type { FileStateRepository } from "./repository/file-state-repository.js";
import type { RetentionService } from "./retention-service.js";

export type BackupEngineDeps = {
  config: AppConfig;
  registry: StorageRegistry;
  state: FileStateRepository;
  archive: ArchiveService;
  encryption: EncryptionService;
  passwords: PasswordProvider;
  logger: Logger;
  retention?: RetentionService;
  tempRoot?: string;
  now?: () => Date;
};

type BackupSource = {
  sourcePath: string;
  /** Directory backups honour `backup.type`; explicit file lists are archived as given. */
  tracksChanges: boolean;
  select(): Promise<FileSelection>;
};

export function sanitizeName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9._-]/g, "_");
  return sanitized || "root";
}

/** `20240102T030405678Z` for 2024-01-02T03:04:05.678Z. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").replace(".", "");
}

export function artifactName(sourcePath: string, date: Date, extension: string, encrypted: boolean): string {
  const base = `backup_${sanitizeName(path.basename(path.resolve(sourcePath)))}_${formatTimestamp(date)}.${extension}`;
  return encrypted ? `${base}${ENCRYPTED_SUFFIX}` : base;
}

export function remotePathFor(sourcePath: string, artifact: string): string {
  return `backups/${sanitizeName(path.basename(path.resolve(sourcePath)))}/${artifact}`;
}

/**
 * Archive, optionally compress and encrypt, then upload one directory. Every
 * failure is reported as a BackupStageError naming the stage that failed.
 */
export class BackupService {
  private readonly now: () => Date;
  private readonly tempRoot: string;

  constructor(private readonly deps: BackupEngineDeps) {
    this.now = deps.now ?? (() => new Date());
    this.tempRoot = deps.tempRoot ?? os.tmpdir();
  }

  /**
   * Resolves to null without uploading when an incremental or differential
   * backup finds nothing changed.
   */
  async backupDirectory(sourcePath: string, storageOverride?: string): Promise<BackupRecord | null> {
    const absolute = path.resolve(sourcePath);
    return this.run(
      {
        sourcePath: absolute,
        tracksChanges: true,
        select: () => selectFiles(absolute, this.deps.config.archive)
      },
      storageOverride
    );
  }

  /** Backs up only `files` (relative to or inside `baseDirectory`). */
  async backupFiles(files: readonly string[], baseDirectory: string, storageOverride?: string): Promise<BackupRecord> {
    const absolute = path.resolve(baseDirectory);
    const record = await this.run(
      {
        sourcePath: absolute,
        tracksChanges: false,
        select: async () => {
          const { selection, missing } = await selectListedFiles(files, absolute, this.deps.config.archive);
          if (missing.length > 0) {
            throw new NotFoundError(`Files not found under ${absolute}: ${missing.join(", ")}`);
          }
          return selection;
        }
      },
      storageOverride
    );
    if (!record) {
      throw new Error(`Backup of listed files under ${absolute} recorded nothing`);
    }
    return record;
  }

  private async plan(source: BackupSource, selection: FileSelection): Promise<ChangePlan | null> {
    const { config, state, logger } = this.deps;
    if (!source.tracksChanges || config.backup.type === "full") {
      return null;
    }
    const lastFull = state.lastFullBackup(source.sourcePath);
    return planChanges(
      selection.files,
      config.backup.type,
      {
        manifest: state.manifest(source.sourcePath),
        lastFullBackupMs: lastFull ? Date.parse(lastFull.timestampUtc) : null
      },
      logger.child({ sourcePath: source.sourcePath })
    );
  }

  private async run(source: BackupSource, storageOverride?: string): Promise<BackupRecord | null> {
    const { config, registry, state, archive, encryption, passwords, logger } = this.deps;
    const { sourcePath } = source;
    const started = performance.now();
    const progress: { stage: BackupStage; workDir: string | null } = { stage: "resolve", workDir: null };
    let stored: BackupRecord | null;

    try {
      const storageType = (storageOverride ?? storageTypeForPath(config, sourcePath)).toLowerCase();
      const storage = await registry.resolve(storageType);

      stored = await withStorage(
        storage,
        async (backend: StorageAdapter) => {
          progress.stage = "validate";
          const info = await stat(sourcePath).catch(() => null);
          if (!info?.isDirectory()) {
            throw new NotFoundError(`Source directory not found: ${sourcePath}`);
          }
          const password = config.encryption.enabled ? await requirePassword(passwords, "encrypted backups") : null;
          progress.workDir = await mkdtemp(path.join(this.tempRoot, "backhaul-backup-"));
          const startedAt = this.now();

          progress.stage = "archive";
          const selection = await source.select();
          const thresholdBytes = config.archive.sizeThresholdMB * 1024 * 1024;
          if (selection.totalBytes > thresholdBytes) {
            logger.warn(
              { sourcePath, sizeBytes: selection.totalBytes, thresholdMB: config.archive.sizeThresholdMB },
              "Directory exceeds size threshold"
            );
          }
          if (selection.skipped.length > 0) {
            logger.debug({ sourcePath, skipped: selection.skipped.length }, "Files excluded from backup");
          }
          const plan = await this.plan(source, selection);
          if (plan && plan.backupType !== "full" && plan.files.length === 0) {
            logger.info({ sourcePath, backupType: plan.backupType }, "No changes since the last backup, skipping upload");
            return null;
          }
          const files = plan ? plan.files : selection.files;
          const backupType: BackupType | undefined = plan ? plan.backupType : source.tracksChanges ? "full" : undefined;
          const format = config.archive.format;
          let artifactPath = path.join(progress.workDir, `archive.${format}`);
          let extension: string = format;
          await archive.createArchive(files, artifactPath, format);

          progress.stage = "compress";
          if (format === "tar" && config.archive.compress) {
            const compressed = `${artifactPath}.gz`;
            await archive.gzip(artifactPath, compressed);
            artifactPath = compressed;
            extension = "tar.gz";
          }

          progress.stage = "encrypt";
          if (password) {
            const encrypted = `${artifactPath}${ENCRYPTED_SUFFIX}`;
            await encryption.encryptFile(artifactPath, encrypted, password);
            artifactPath = encrypted;
          }

          progress.stage = "upload";
          const name = artifactName(sourcePath, startedAt, extension, password !== null);
          const remotePath = remotePathFor(sourcePath, name);
          await backend.upload(artifactPath, remotePath);
          const { size: storedBytes } = await stat(artifactPath);

          progress.stage = "record";
          const manifest = plan ? await nextManifest(plan, state.manifest(sourcePath)) : undefined;
          return state.record(
            sourcePath,
            {
              sourcePath,
              remotePath,
              timestampUtc: startedAt.toISOString(),
              sizeBytesOriginal: files.reduce((total, file) => total + file.size, 0),
              sizeBytesStored: storedBytes,
              storageType: backend.name,
              encrypted: password !== null,
              fileCount: files.length,
              ...(backupType ? { backupType } : {})
            },
            manifest
          );
        },
        logger
      );
    } catch (error) {
      const failure = error instanceof BackupStageError ? error : new BackupStageError(progress.stage, error);
      logger.error({ sourcePath, stage: failure.stage, err: failure }, "Backup failed");
      throw failure;
    } finally {
      if (progress.workDir) {
        await rm(progress.workDir, { recursive: true, force: true });
      }
    }

    if (!stored) {
      return null;
    }
    logger.info(
      {
        sourcePath,
        backupType: stored.backupType,
        remotePath: stored.remotePath,
        storageType: stored.storageType,
        fileCount: stored.fileCount,
        sizeBytesOriginal: stored.sizeBytesOriginal,
        sizeBytesStored: stored.sizeBytesStored,
        elapsedMs: Math.round(performance.now() - started)
      },
      "Backup completed"
    );

    if (this.deps.retention) {
      await this.deps.retention.apply(sourcePath);
    }
    return stored;
  }
}
