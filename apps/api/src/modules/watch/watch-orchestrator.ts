import { stat } from "node:fs/promises";
import path from "node:path";
import type { BackupRecord, BackupTarget, WatchPathState, WatchPathStatus } from "@backhaul/shared";
import { storageTypeForPath, type AppConfig } from "../../config/app-config.js";
import { errorMessage } from "../../core/errors.js";
import type { Logger } from "../../core/logger.js";
import { FileFilter, selectFiles } from "../archive/file-selection.js";
import type { FileStateRepository } from "../backup/repository/file-state-repository.js";
import {
  chokidarChangeSource,
  shouldForcePolling,
  type ChangeEvent,
  type ChangeSource,
  type ChangeSubscription
} from "./change-source.js";

export interface BackupRunner {
  /** Null when nothing changed since the previous backup. */
  backupDirectory(sourcePath: string, storageOverride?: string): Promise<BackupRecord | null>;
}

export type WatchOrchestratorDeps = {
  config: AppConfig;
  backup: BackupRunner;
  state: FileStateRepository;
  logger: Logger;
  source?: ChangeSource;
};

type WatchControl = {
  target: BackupTarget;
  storageType: string;
  state: WatchPathState;
  followUp: boolean;
  usePolling: boolean;
  subscription: ChangeSubscription | null;
  debounceTimer: NodeJS.Timeout | null;
  inFlight: Promise<void> | null;
  lastError: string | null;
  lastBackupAt: string | null;
};

/**
 * Per watched path: idle -> pending (debounce) -> backing_up -> idle. Changes
 * during a backup set a single follow-up flag, so a burst of edits produces at
 * most one extra cycle. Paths never wait on each other.
 */
export class WatchOrchestrator {
  private readonly controls = new Map<string, WatchControl>();
  private readonly filter: FileFilter;
  private readonly source: ChangeSource;
  private running = false;
  /** Bumped by every start and shutdown so a superseded start stops early. */
  private generation = 0;
  private stopping: Promise<void> | null = null;

  constructor(private readonly deps: WatchOrchestratorDeps) {
    this.filter = new FileFilter(deps.config.archive);
    this.source = deps.source ?? chokidarChangeSource;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(signal?: AbortSignal): Promise<void> {
    if (this.running) {
      return;
    }
    if (this.stopping) {
      await this.stopping;
    }
    this.running = true;
    this.controls.clear();
    const generation = ++this.generation;
    const current = (): boolean => this.running && this.generation === generation;
    const { config, logger } = this.deps;

    for (const target of config.watchTargets) {
      const root = path.resolve(target.path);
      const control: WatchControl = {
        target: { ...target, path: root },
        storageType: target.storageType ?? storageTypeForPath(config, root),
        state: "idle",
        followUp: false,
        usePolling: config.watch.usePolling,
        subscription: null,
        debounceTimer: null,
        inFlight: null,
        lastError: null,
        lastBackupAt: this.deps.state.latest(root)?.timestampUtc ?? null
      };
      this.controls.set(root, control);

      const info = await stat(root).catch(() => null);
      if (!current()) {
        return;
      }
      if (!info?.isDirectory()) {
        control.lastError = `Source directory not found: ${root}`;
        logger.warn({ sourcePath: root }, "Watch source path does not exist or is not a directory");
        continue;
      }
      this.subscribe(control);
    }
    logger.info({ watchCount: this.controls.size }, "Watch mode started");

    if (signal) {
      if (signal.aborted) {
        await this.stop();
        return;
      }
      signal.addEventListener(
        "abort",
        () => {
          this.stop().catch((error: unknown) => {
            logger.error({ err: error }, "Watch shutdown after abort failed");
          });
        },
        { once: true }
      );
    }

    if (config.watch.initialBackup) {
      for (const control of this.controls.values()) {
        if (!current()) {
          break;
        }
        if (control.subscription && (await this.needsInitialBackup(control.target.path)) && current() && control.state === "idle") {
          logger.info({ sourcePath: control.target.path }, "Changes since last backup, running initial backup");
          this.beginBackup(control, "initial");
        }
      }
    }
  }

  /** Stops intake, cancels timers, waits for in-flight backups, flushes state. */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown().finally(() => {
        this.stopping = null;
      });
    }
    return this.stopping;
  }

  status(): WatchPathStatus[] {
    return [...this.controls.values()].map((control) => ({
      path: control.target.path,
      storageType: control.storageType,
      state: control.state,
      followUp: control.followUp,
      usePolling: control.usePolling,
      lastError: control.lastError,
      lastBackupAt: control.lastBackupAt
    }));
  }

  /** Feeds one change notification for `root`; exposed for change sources and tests. */
  notifyChange(root: string, event: ChangeEvent): void {
    const control = this.controls.get(path.resolve(root));
    if (!control || !this.running) {
      return;
    }
    if (this.filter.ignores(path.resolve(event.path), control.target.path)) {
      return;
    }

    switch (control.state) {
      case "idle":
        control.state = "pending";
        this.schedule(control);
        break;
      case "pending":
        this.schedule(control);
        break;
      case "backing_up":
        control.followUp = true;
        break;
    }
  }

  private subscribe(control: WatchControl): void {
    const { config, logger } = this.deps;
    const root = control.target.path;
    control.subscription = this.source.subscribe(
      root,
      {
        usePolling: control.usePolling,
        pollingIntervalMs: config.watch.pollingIntervalMs,
        ignored: (candidate) => this.filter.ignores(path.resolve(candidate), root)
      },
      {
        onChange: (event) => this.notifyChange(root, event),
        onError: (error) => this.onWatcherError(control, error),
        onReady: () => logger.info({ sourcePath: root, usePolling: control.usePolling }, "Watcher ready")
      }
    );
  }

  private onWatcherError(control: WatchControl, error: unknown): void {
    const { logger } = this.deps;
    const root = control.target.path;
    control.lastError = errorMessage(error);
    logger.error({ sourcePath: root, usePolling: control.usePolling, err: error }, "Watcher error");
    if (control.usePolling || !shouldForcePolling(error) || !this.running) {
      return;
    }

    control.usePolling = true;
    const previous = control.subscription;
    control.subscription = null;
    const reopen = async (): Promise<void> => {
      await previous?.close();
      if (this.running && !control.subscription) {
        this.subscribe(control);
        logger.warn({ sourcePath: root }, "Watcher recreated in polling mode");
      }
    };
    reopen().catch((reopenError: unknown) => {
      control.lastError = errorMessage(reopenError);
      logger.error({ sourcePath: root, err: reopenError }, "Recreating watcher in polling mode failed");
    });
  }

  private schedule(control: WatchControl): void {
    if (control.debounceTimer) {
      clearTimeout(control.debounceTimer);
    }
    control.debounceTimer = setTimeout(() => {
      control.debounceTimer = null;
      this.beginBackup(control, "change");
    }, this.deps.config.watch.debounceMs);
  }

  private beginBackup(control: WatchControl, reason: "change" | "initial"): void {
    control.state = "backing_up";
    control.inFlight = this.runBackup(control, reason);
  }

  /** Settles without throwing; a failure leaves the path idle. */
  private async runBackup(control: WatchControl, reason: string): Promise<void> {
    const { backup, logger } = this.deps;
    const root = control.target.path;
    try {
      const record = await backup.backupDirectory(root, control.target.storageType);
      control.lastError = null;
      if (record) {
        control.lastBackupAt = record.timestampUtc;
        logger.info({ sourcePath: root, reason, remotePath: record.remotePath }, "Watch mode backup completed");
      } else {
        logger.info({ sourcePath: root, reason }, "Watch mode backup found nothing to upload");
      }
    } catch (error) {
      control.lastError = errorMessage(error);
      logger.error({ sourcePath: root, reason, err: error }, "Watch mode backup failed");
    } finally {
      control.inFlight = null;
      if (this.running && control.followUp) {
        control.followUp = false;
        control.state = "pending";
        this.schedule(control);
      } else {
        control.followUp = false;
        control.state = "idle";
      }
    }
  }

  private async needsInitialBackup(root: string): Promise<boolean> {
    const latest = this.deps.state.latest(root);
    if (!latest) {
      return true;
    }
    const since = Date.parse(latest.timestampUtc);
    try {
      const selection = await selectFiles(root, this.deps.config.archive);
      return selection.files.some((file) => file.mtimeMs > since);
    } catch (error) {
      this.deps.logger.warn({ sourcePath: root, err: error }, "Could not scan for changes since last backup");
      return false;
    }
  }

  private async shutdown(): Promise<void> {
    const { logger, state } = this.deps;
    this.running = false;
    this.generation += 1;

    const closing: Promise<void>[] = [];
    for (const control of this.controls.values()) {
      if (control.debounceTimer) {
        clearTimeout(control.debounceTimer);
        control.debounceTimer = null;
      }
      if (control.state === "pending") {
        control.state = "idle";
      }
      control.followUp = false;
      if (control.subscription) {
        closing.push(control.subscription.close());
        control.subscription = null;
      }
    }
    const closed = await Promise.allSettled(closing);
    for (const result of closed) {
      if (result.status === "rejected") {
        logger.warn({ err: result.reason }, "Closing watcher failed");
      }
    }

    const inFlight = [...this.controls.values()].flatMap((control) => (control.inFlight ? [control.inFlight] : []));
    await Promise.all(inFlight);
    await state.flush();
    logger.info({ watchCount: this.controls.size }, "Watch mode stopped");
  }
}
