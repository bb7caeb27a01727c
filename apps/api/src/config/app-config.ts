import { readFile } from "node:fs/promises";
import path from "node:path";
import type { BackupTarget, BackupType, StorageOptions } from "@backhaul/shared";
import { z } from "zod";
import { ConfigurationError, errorMessage, hasErrorCode } from "../core/errors.js";

const archiveSchema = z.object({
  format: z.enum(["zip", "tar"]).default("zip"),
  compress: z.boolean().default(true),
  excludedPatterns: z.array(z.string().min(1)).default([]),
  excludedPaths: z.array(z.string().min(1)).default([]),
  maxFileSizeMB: z.number().positive().default(1024),
  sizeThresholdMB: z.number().positive().default(500),
  skipHidden: z.boolean().default(false)
});

const watchSchema = z.object({
  debounceMs: z.number().int().nonnegative().default(10_000),
  usePolling: z.boolean().default(false),
  pollingIntervalMs: z.number().int().positive().default(1000),
  initialBackup: z.boolean().default(true)
});

const retentionSchema = z.object({
  enabled: z.boolean().default(false),
  keepLastPerDirectory: z.number().int().default(10),
  maxAgeDays: z.number().int().nonnegative().default(0)
});

const backupSchema = z.object({
  type: z.enum(["full", "incremental", "differential"]).default("full")
});

export const appConfigSchema = z.object({
  globalStorageType: z.string().min(1).default("local"),
  watchTargets: z
    .array(
      z.object({
        path: z.string().min(1),
        storageType: z.string().min(1).optional()
      })
    )
    .default([]),
  storage: z.record(z.string(), z.record(z.string(), z.string())).default({}),
  encryption: z
    .object({
      enabled: z.boolean().default(false),
      iterations: z.number().int().min(1000).default(100_000)
    })
    .default({}),
  backup: backupSchema.default({}),
  archive: archiveSchema.default({}),
  watch: watchSchema.default({}),
  retention: retentionSchema.default({}),
  state: z.object({ historyLimit: z.number().int().positive().default(50) }).default({})
});

export type AppConfigInput = z.input<typeof appConfigSchema>;
export type ArchiveSettings = z.infer<typeof archiveSchema>;
export type WatchSettings = z.infer<typeof watchSchema>;
export type RetentionSettings = z.infer<typeof retentionSchema>;

/** Resolved, validated configuration view the engine works from. */
export interface AppConfig {
  globalStorageType: string;
  watchTargets: BackupTarget[];
  storage: Record<string, StorageOptions>;
  encryption: { enabled: boolean; iterations: number };
  backup: { type: BackupType };
  archive: ArchiveSettings;
  watch: WatchSettings;
  retention: RetentionSettings;
  state: { historyLimit: number };
}

/** Backend options naming a file or directory on this machine. */
const LOCAL_PATH_OPTIONS: Record<string, readonly string[]> = {
  local: ["path"],
  sftp: ["privateKeyPath"],
  gcp: ["credentialPath"]
};

function resolveStorageOptions(name: string, options: StorageOptions, baseDir: string): StorageOptions {
  const pathKeys = LOCAL_PATH_OPTIONS[name] ?? [];
  return Object.fromEntries(
    Object.entries(options).map(([key, value]) => [
      key,
      pathKeys.includes(key) && value.trim() ? path.resolve(baseDir, value.trim()) : value
    ])
  );
}

export function parseAppConfig(input: unknown, baseDir = process.cwd()): AppConfig {
  const parsed = appConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  const data = parsed.data;
  return {
    ...data,
    globalStorageType: data.globalStorageType.toLowerCase(),
    watchTargets: data.watchTargets.map((target) => ({
      path: path.resolve(baseDir, target.path),
      storageType: target.storageType?.toLowerCase()
    })),
    storage: Object.fromEntries(
      Object.entries(data.storage).map(([name, options]) => {
        const normalized = name.toLowerCase();
        return [normalized, resolveStorageOptions(normalized, options, baseDir)];
      })
    ),
    archive: {
      ...data.archive,
      excludedPaths: data.archive.excludedPaths.map((item) => path.resolve(baseDir, item))
    }
  };
}

export async function loadAppConfig(filePath: string): Promise<AppConfig> {
  const absolute = path.resolve(filePath);
  let raw: string;
  try {
    raw = await readFile(absolute, "utf8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return parseAppConfig({});
    }
    throw new ConfigurationError(`Cannot read configuration file ${absolute}: ${errorMessage(error)}`, [], { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Configuration file ${absolute} is not valid JSON`, [], { cause: error });
  }
  return parseAppConfig(json, path.dirname(absolute));
}

/** Storage type configured for a watched directory, falling back to the global default. */
export function storageTypeForPath(config: AppConfig, sourcePath: string): string {
  const normalized = path.resolve(sourcePath);
  const target = config.watchTargets.find((item) => item.path === normalized);
  return target?.storageType ?? config.globalStorageType;
}
