import type { BackupRecord } from "@backhaul/shared";
import { z } from "zod";

export const STATE_VERSION = 1;

export const BACKUP_TYPES = ["full", "incremental", "differential"] as const;

/** What a file looked like when it was last archived. */
export const fileFingerprintSchema = z.object({
  size: z.number().nonnegative(),
  mtimeMs: z.number(),
  sha256: z.string().regex(/^[0-9a-f]{64}$/)
});

export type FileFingerprint = z.infer<typeof fileFingerprintSchema>;

/** Fingerprints keyed by `/`-separated path relative to the source directory. */
export type FileManifest = Record<string, FileFingerprint>;

export const fileManifestSchema = z.record(z.string(), fileFingerprintSchema);

export interface PersistedState {
  version: typeof STATE_VERSION;
  records: Record<string, BackupRecord[]>;
  files: Record<string, FileManifest>;
}

/** Unknown fields are stripped; `fileCount` arrived later and defaults to 0. */
export const backupRecordSchema = z.object({
  sourcePath: z.string().min(1),
  remotePath: z.string().min(1),
  timestampUtc: z.string().datetime({ offset: true }),
  sizeBytesOriginal: z.number().nonnegative(),
  sizeBytesStored: z.number().nonnegative(),
  storageType: z.string().min(1),
  encrypted: z.boolean(),
  fileCount: z.number().int().nonnegative().default(0),
  backupType: z.enum(BACKUP_TYPES).optional()
});

export const persistedStateSchema = z.object({
  version: z.number().int().positive(),
  records: z.record(z.string(), z.array(z.unknown())),
  files: z.record(z.string(), z.unknown()).default({})
});
