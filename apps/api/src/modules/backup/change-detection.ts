import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import type { BackupType } from "@backhaul/shared";
import type { Logger } from "../../core/logger.js";
import type { SelectedFile } from "../archive/file-selection.js";
import type { FileFingerprint, FileManifest } from "./repository/types.js";

export async function sha256File(filePath: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

export type ChangeBaseline = {
  /** Fingerprints from earlier backups of the directory. */
  manifest: FileManifest;
  /** Start of the newest full backup, or null when there is none. */
  lastFullBackupMs: number | null;
};

export type ChangePlan = {
  /** `full` when the requested kind has no baseline to compare against. */
  backupType: BackupType;
  files: SelectedFile[];
  /** Digests computed while comparing, reused for the next manifest. */
  digests: Map<string, string>;
};

/**
 * Picks the files a backup of `requested` kind has to archive. A file missing
 * from the manifest is always new. Incremental backups compare size, then
 * SHA-256 when the modification time moved; differential backups take every
 * file modified after the last full backup.
 */
export async function planChanges(
  files: readonly SelectedFile[],
  requested: BackupType,
  baseline: ChangeBaseline,
  logger: Logger
): Promise<ChangePlan> {
  const digests = new Map<string, string>();
  const hasBaseline =
    requested === "incremental"
      ? Object.keys(baseline.manifest).length > 0
      : requested === "differential" && baseline.lastFullBackupMs !== null;
  if (!hasBaseline) {
    if (requested !== "full") {
      logger.info({ requested }, "No earlier backup to compare against, running a full backup");
    }
    return { backupType: "full", files: [...files], digests };
  }

  const changed: SelectedFile[] = [];
  for (const file of files) {
    const previous = baseline.manifest[file.relativePath];
    if (!previous) {
      changed.push(file);
      continue;
    }
    if (requested === "differential") {
      if (file.mtimeMs > (baseline.lastFullBackupMs ?? Number.NEGATIVE_INFINITY)) {
        changed.push(file);
      }
      continue;
    }
    if (file.size !== previous.size) {
      changed.push(file);
      continue;
    }
    if (file.mtimeMs <= previous.mtimeMs) {
      continue;
    }
    try {
      const digest = await sha256File(file.absolutePath);
      digests.set(file.relativePath, digest);
      if (digest !== previous.sha256) {
        changed.push(file);
      }
    } catch (error) {
      logger.warn({ filePath: file.absolutePath, err: error }, "Could not hash file, including it in the backup");
      changed.push(file);
    }
  }

  logger.info({ backupType: requested, changed: changed.length, total: files.length }, "Selected changed files");
  return { backupType: requested, files: changed, digests };
}

/**
 * Manifest to store after a successful backup. A full backup replaces the
 * previous manifest, so deleted files drop out; other kinds update the
 * entries of the files they archived.
 */
export async function nextManifest(plan: ChangePlan, previous: FileManifest): Promise<FileManifest> {
  const next: FileManifest = plan.backupType === "full" ? {} : { ...previous };
  for (const file of plan.files) {
    const fingerprint: FileFingerprint = {
      size: file.size,
      mtimeMs: file.mtimeMs,
      sha256: plan.digests.get(file.relativePath) ?? (await sha256File(file.absolutePath))
    };
    next[file.relativePath] = fingerprint;
  }
  return next;
}
