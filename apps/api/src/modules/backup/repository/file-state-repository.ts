import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { BackupRecord } from "@backhaul/shared";
import { StateCorruptionError, errorMessage, hasErrorCode } from "../../../core/errors.js";
import type { Logger } from "../../../core/logger.js";
import {
  STATE_VERSION,
  backupRecordSchema,
  fileManifestSchema,
  persistedStateSchema,
  type FileManifest,
  type PersistedState
} from "./types.js";

export const DEFAULT_HISTORY_LIMIT = 50;

function stateKey(sourcePath: string): string {
  return path.resolve(sourcePath);
}

function toDocumentRecords(records: ReadonlyMap<string, BackupRecord[]>): Record<string, BackupRecord[]> {
  return Object.fromEntries([...records.entries()].map(([key, history]) => [key, [...history]]));
}

type StateContents = {
  records: Map<string, BackupRecord[]>;
  files: Map<string, FileManifest>;
};

/**
 * Backup progress per source directory, persisted as one JSON document.
 * Reads are served from memory; every mutation is written through a single
 * promise queue with a temp-file-and-rename, so concurrent writers never
 * interleave.
 */
export class FileStateRepository {
  private records = new Map<string, BackupRecord[]>();
  private files = new Map<string, FileManifest>();
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly stateFilePath: string,
    private readonly logger: Logger,
    private readonly historyLimit = DEFAULT_HISTORY_LIMIT
  ) {}

  /** Never throws: a missing or damaged file yields an empty store. */
  async load(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.stateFilePath, "utf8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        this.logger.info({ stateFile: this.stateFilePath }, "No state file yet, starting empty");
      } else {
        const corruption = new StateCorruptionError(`Cannot read state file: ${errorMessage(error)}`, { cause: error });
        this.logger.warn({ stateFile: this.stateFilePath, err: corruption }, "State file unreadable, starting empty");
      }
      this.records = new Map();
      this.files = new Map();
      return;
    }

    try {
      const contents = this.parse(raw);
      this.records = contents.records;
      this.files = contents.files;
    } catch (error) {
      this.logger.warn({ stateFile: this.stateFilePath, err: error }, "State file corrupt, starting empty");
      this.records = new Map();
      this.files = new Map();
    }
  }

  /**
   * Appends a record. A timestamp not strictly after the latest one for the
   * same path is moved to latest + 1 ms. Returns the record as stored.
   * `manifest`, when given, replaces the directory's file fingerprints in the
   * same write.
   */
  record(sourcePath: string, record: BackupRecord, manifest?: FileManifest): Promise<BackupRecord> {
    return this.enqueue(async () => {
      const key = stateKey(sourcePath);
      const history = this.records.get(key) ?? [];
      const latest = history.at(-1);
      let timestamp = Date.parse(record.timestampUtc);
      if (latest) {
        const latestMs = Date.parse(latest.timestampUtc);
        if (!(timestamp > latestMs)) {
          timestamp = latestMs + 1;
        }
      }
      const stored: BackupRecord = { ...record, sourcePath: key, timestampUtc: new Date(timestamp).toISOString() };
      const next = new Map(this.records);
      next.set(key, [...history, stored].slice(-this.historyLimit));
      const nextFiles = manifest ? new Map(this.files).set(key, { ...manifest }) : this.files;
      await this.persist(next, nextFiles);
      this.records = next;
      this.files = nextFiles;
      return stored;
    });
  }

  /** Drops the records with the given remote paths for `sourcePath`. */
  remove(sourcePath: string, remotePaths: readonly string[]): Promise<number> {
    return this.enqueue(async () => {
      const key = stateKey(sourcePath);
      const history = this.records.get(key) ?? [];
      const doomed = new Set(remotePaths);
      const kept = history.filter((item) => !doomed.has(item.remotePath));
      const removed = history.length - kept.length;
      if (removed === 0) {
        return 0;
      }
      const next = new Map(this.records);
      if (kept.length > 0) {
        next.set(key, kept);
      } else {
        next.delete(key);
      }
      await this.persist(next, this.files);
      this.records = next;
      return removed;
    });
  }

  latest(sourcePath: string): BackupRecord | null {
    return this.records.get(stateKey(sourcePath))?.at(-1) ?? null;
  }

  /** Oldest first. */
  history(sourcePath: string): BackupRecord[] {
    return [...(this.records.get(stateKey(sourcePath)) ?? [])];
  }

  /** The newest record written by a full backup, or null. */
  lastFullBackup(sourcePath: string): BackupRecord | null {
    const history = this.records.get(stateKey(sourcePath)) ?? [];
    for (let index = history.length - 1; index >= 0; index -= 1) {
      const item = history[index];
      if (item?.backupType === "full") {
        return item;
      }
    }
    return null;
  }

  /** Fingerprints of the files last archived from `sourcePath`. */
  manifest(sourcePath: string): FileManifest {
    return { ...this.files.get(stateKey(sourcePath)) };
  }

  findByRemotePath(remotePath: string): BackupRecord | null {
    for (const history of this.records.values()) {
      const match = history.find((item) => item.remotePath === remotePath);
      if (match) {
        return match;
      }
    }
    return null;
  }

  paths(): string[] {
    return [...this.records.keys()].sort();
  }

  snapshot(): Record<string, BackupRecord[]> {
    return toDocumentRecords(this.records);
  }

  /** Resolves once every write queued so far has settled. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const next = this.writeQueue.then(task, task);
    this.writeQueue = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  private parse(raw: string): StateContents {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StateCorruptionError("State file is not valid JSON", { cause: error });
    }
    const parsed = persistedStateSchema.safeParse(json);
    if (!parsed.success) {
      throw new StateCorruptionError(`State file has an unexpected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    if (parsed.data.version > STATE_VERSION) {
      throw new StateCorruptionError(`State file version ${parsed.data.version} is newer than supported ${STATE_VERSION}`);
    }

    const records = new Map<string, BackupRecord[]>();
    let skipped = 0;
    for (const [sourcePath, entries] of Object.entries(parsed.data.records)) {
      const valid: BackupRecord[] = [];
      for (const entry of entries) {
        const item = backupRecordSchema.safeParse(entry);
        if (item.success) {
          valid.push(item.data);
        } else {
          skipped += 1;
        }
      }
      valid.sort((left, right) => Date.parse(left.timestampUtc) - Date.parse(right.timestampUtc));
      if (valid.length > 0) {
        records.set(stateKey(sourcePath), valid.slice(-this.historyLimit));
      }
    }
    if (skipped > 0) {
      this.logger.warn({ stateFile: this.stateFilePath, skipped }, "Skipped malformed backup records");
    }

    const files = new Map<string, FileManifest>();
    for (const [sourcePath, entries] of Object.entries(parsed.data.files)) {
      const manifest = fileManifestSchema.safeParse(entries);
      if (manifest.success) {
        files.set(stateKey(sourcePath), manifest.data);
      } else {
        this.logger.warn({ stateFile: this.stateFilePath, sourcePath }, "Dropped malformed file fingerprints");
      }
    }
    return { records, files };
  }

  /** Memory is only updated by callers after this resolves. */
  private async persist(
    records: ReadonlyMap<string, BackupRecord[]>,
    files: ReadonlyMap<string, FileManifest>
  ): Promise<void> {
    const document: PersistedState = {
      version: STATE_VERSION,
      records: toDocumentRecords(records),
      files: Object.fromEntries(files)
    };
    const directory = path.dirname(this.stateFilePath);
    const tempPath = path.join(directory, `.${path.basename(this.stateFilePath)}.${randomUUID()}.tmp`);
    await mkdir(directory, { recursive: true });
    try {
      await writeFile(tempPath, JSON.stringify(document, null, 2), "utf8");
      await rename(tempPath, this.stateFilePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }
}
