import type { BackupRecord } from "@backhaul/shared";

/** Narrows a directory backup to the record it wrote, failing the test when it skipped. */
export async function uploaded(task: Promise<BackupRecord | null>): Promise<BackupRecord> {
  const record = await task;
  if (!record) {
    throw new Error("Expected the backup to upload an archive");
  }
  return record;
}
