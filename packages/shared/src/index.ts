export type StorageType =
  | "local"
  | "s3"
  | "b2"
  | "azure"
  | "gcp"
  | "gdrive"
  | "dropbox"
  | "github"
  | "sftp";

export type StorageOptions = Readonly<Record<string, string>>;

export interface BackupTarget {
  path: string;
  storageType?: string;
}

/**
 * `full` archives every selected file. `incremental` archives files changed
 * since the previous backup, `differential` those changed since the last full one.
 */
export type BackupType = "full" | "incremental" | "differential";

export interface BackupRecord {
  sourcePath: string;
  remotePath: string;
  timestampUtc: string;
  sizeBytesOriginal: number;
  sizeBytesStored: number;
  storageType: string;
  encrypted: boolean;
  fileCount: number;
  /** Absent for explicit file-list backups and for records written before backup types existed. */
  backupType?: BackupType;
}

export interface RestoreResult {
  backupPath: string;
  targetDir: string;
  fileCount: number;
  totalBytes: number;
}

export interface ShareLink {
  remotePath: string;
  expiresAt: string;
  url: string;
}

export type WatchPathState = "idle" | "pending" | "backing_up";

export interface WatchPathStatus {
  path: string;
  storageType: string;
  state: WatchPathState;
  followUp: boolean;
  usePolling: boolean;
  lastError: string | null;
  lastBackupAt: string | null;
}
