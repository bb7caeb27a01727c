import type { BackupRecord } from "@backhaul/shared";
import type { RetentionSettings } from "../../config/app-config.js";
import { errorMessage } from "../../core/errors.js";
import type { Logger } from "../../core/logger.js";
import { withStorage } from "../storage/storage-adapter.js";
import type { StorageRegistry } from "../storage/storage-registry.js";
import type { FileStateRepository } from "./repository/file-state-repository.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export type RetentionOutcome = {
  deleted: string[];
  failed: string[];
};

/**
 * Records to prune. The newest `keepLastPerDirectory` (at least one) survive,
 * as does anything younger than `maxAgeDays` when that rule is on.
 */
export function selectBackupsToDelete(
  history: readonly BackupRecord[],
  settings: Pick<RetentionSettings, "keepLastPerDirectory" | "maxAgeDays">,
  now: Date = new Date()
): BackupRecord[] {
  const newestFirst = [...history].sort((left, right) => Date.parse(right.timestampUtc) - Date.parse(left.timestampUtc));
  const keepLast = Math.max(1, settings.keepLastPerDirectory);
  const cutoff = settings.maxAgeDays > 0 ? now.getTime() - settings.maxAgeDays * DAY_MS : null;
  return newestFirst.filter((record, index) => {
    if (index < keepLast) {
      return false;
    }
    return cutoff === null || Date.parse(record.timestampUtc) < cutoff;
  });
}

export class RetentionService {
  constructor(
    private readonly settings: RetentionSettings,
    private readonly registry: StorageRegistry,
    private readonly state: FileStateRepository,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Never throws; failures are logged and the affected records stay in state. */
  async apply(sourcePath: string): Promise<RetentionOutcome> {
    const outcome: RetentionOutcome = { deleted: [], failed: [] };
    if (!this.settings.enabled) {
      return outcome;
    }
    const doomed = selectBackupsToDelete(this.state.history(sourcePath), this.settings, this.now());
    if (doomed.length === 0) {
      return outcome;
    }

    const byStorage = new Map<string, BackupRecord[]>();
    for (const record of doomed) {
      const group = byStorage.get(record.storageType) ?? [];
      group.push(record);
      byStorage.set(record.storageType, group);
    }

    for (const [storageType, records] of byStorage) {
      try {
        const storage = await this.registry.resolve(storageType);
        await withStorage(
          storage,
          async (backend) => {
            for (const record of records) {
              try {
                await backend.delete(record.remotePath);
                outcome.deleted.push(record.remotePath);
              } catch (error) {
                outcome.failed.push(record.remotePath);
                this.logger.warn(
                  { sourcePath, remotePath: record.remotePath, storageType, err: errorMessage(error) },
                  "Retention delete failed"
                );
              }
            }
          },
          this.logger
        );
      } catch (error) {
        outcome.failed.push(...records.map((record) => record.remotePath));
        this.logger.warn({ sourcePath, storageType, err: errorMessage(error) }, "Retention could not open storage");
      }
    }

    if (outcome.deleted.length > 0) {
      try {
        await this.state.remove(sourcePath, outcome.deleted);
      } catch (error) {
        this.logger.warn({ sourcePath, err: errorMessage(error) }, "Retention could not update state");
      }
      this.logger.info({ sourcePath, deleted: outcome.deleted.length, failed: outcome.failed.length }, "Retention applied");
    }
    return outcome;
  }
}
