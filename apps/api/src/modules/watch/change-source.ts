import { watch as chokidarWatch } from "chokidar";

export type ChangeKind = "add" | "change" | "unlink" | "addDir" | "unlinkDir";

export type ChangeEvent = {
  kind: ChangeKind;
  path: string;
};

export type ChangeSourceOptions = {
  usePolling: boolean;
  pollingIntervalMs: number;
  ignored?: (candidate: string) => boolean;
};

export type ChangeHandlers = {
  onChange(event: ChangeEvent): void;
  onError(error: unknown): void;
  onReady?(): void;
};

export interface ChangeSubscription {
  close(): Promise<void>;
}

/** Anything that can report filesystem changes below a root directory. */
export interface ChangeSource {
  subscribe(root: string, options: ChangeSourceOptions, handlers: ChangeHandlers): ChangeSubscription;
}

export const chokidarChangeSource: ChangeSource = {
  subscribe(root, options, handlers) {
    const watcher = chokidarWatch(root, {
      ignoreInitial: true,
      usePolling: options.usePolling,
      interval: options.pollingIntervalMs,
      binaryInterval: Math.max(options.pollingIntervalMs, 1200),
      awaitWriteFinish: {
        stabilityThreshold: 800,
        pollInterval: 100
      },
      atomic: true,
      ...(options.ignored ? { ignored: options.ignored } : {})
    });

    const kinds: ChangeKind[] = ["add", "change", "unlink", "addDir", "unlinkDir"];
    for (const kind of kinds) {
      watcher.on(kind, (changedPath: string) => handlers.onChange({ kind, path: changedPath }));
    }
    watcher.on("error", (error: unknown) => handlers.onError(error));
    watcher.on("ready", () => handlers.onReady?.());

    return {
      close: () => watcher.close()
    };
  }
};

/** Watcher failures that polling mode avoids. */
export function shouldForcePolling(error: unknown): boolean {
  const code =
    typeof error === "object" && error !== null && "code" in error && typeof error.code === "string"
      ? error.code.toUpperCase()
      : "";
  if (code === "EMFILE" || code === "ENOSPC" || code === "EPERM" || code === "EACCES") {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  return (
    message.includes("operation not permitted") ||
    message.includes("system limit for number of file watchers reached") ||
    message.includes("too many open files")
  );
}
