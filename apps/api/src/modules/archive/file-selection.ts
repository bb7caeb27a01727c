import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import type { ArchiveSettings } from "../../config/app-config.js";

export type FileSelectionSettings = Pick<ArchiveSettings, "excludedPatterns" | "excludedPaths" | "maxFileSizeMB" | "skipHidden">;

export type SelectedFile = {
  absolutePath: string;
  /** Always `/`-separated, relative to the archive root. */
  relativePath: string;
  size: number;
  mtimeMs: number;
};

export type SkippedFile = {
  absolutePath: string;
  reason: "pattern" | "path" | "hidden" | "size";
};

export type FileSelection = {
  files: SelectedFile[];
  skipped: SkippedFile[];
  totalBytes: number;
};

/** `*` and `?` wildcards, whole-name and case-insensitive. */
export function wildcardToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, "\\$&").replace(/\*/g, ".*").replace(/\?/g, ".");
  return new RegExp(`^${escaped}$`, "i");
}

function isWithin(candidate: string, parent: string): boolean {
  const relative = path.relative(parent, candidate);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

export class FileFilter {
  private readonly patterns: RegExp[];
  private readonly excludedPaths: string[];
  private readonly maxFileBytes: number;

  constructor(private readonly settings: FileSelectionSettings) {
    this.patterns = settings.excludedPatterns.map(wildcardToRegExp);
    this.excludedPaths = settings.excludedPaths.map((item) => path.resolve(item));
    this.maxFileBytes = settings.maxFileSizeMB * 1024 * 1024;
  }

  /** Reason a path is excluded before its size is known, or null. */
  exclusionReason(absolutePath: string): SkippedFile["reason"] | null {
    const name = path.basename(absolutePath);
    if (this.settings.skipHidden && name.startsWith(".")) {
      return "hidden";
    }
    if (this.excludedPaths.some((excluded) => isWithin(absolutePath, excluded))) {
      return "path";
    }
    if (this.patterns.some((pattern) => pattern.test(name))) {
      return "pattern";
    }
    return null;
  }

  /**
   * Reason the first excluded segment of `absolutePath` below `root` was
   * excluded. Change notifications arrive for arbitrarily deep paths.
   */
  segmentExclusion(absolutePath: string, root: string): SkippedFile["reason"] | null {
    const relative = path.relative(root, absolutePath);
    if (!relative || relative.startsWith("..")) {
      return null;
    }
    let current = root;
    for (const segment of relative.split(path.sep)) {
      current = path.join(current, segment);
      const reason = this.exclusionReason(current);
      if (reason) {
        return reason;
      }
    }
    return null;
  }

  ignores(absolutePath: string, root: string): boolean {
    return this.segmentExclusion(absolutePath, root) !== null;
  }

  exceedsSize(size: number): boolean {
    return size > this.maxFileBytes;
  }
}

/** Walks `root` recursively and applies the filter to every entry. */
export async function selectFiles(root: string, settings: FileSelectionSettings): Promise<FileSelection> {
  const filter = new FileFilter(settings);
  const selection: FileSelection = { files: [], skipped: [], totalBytes: 0 };

  const walk = async (directory: string): Promise<void> => {
    const entries = await readdir(directory, { withFileTypes: true });
    entries.sort((left, right) => left.name.localeCompare(right.name));
    for (const entry of entries) {
      const absolutePath = path.join(directory, entry.name);
      const reason = filter.exclusionReason(absolutePath);
      if (reason) {
        selection.skipped.push({ absolutePath, reason });
        continue;
      }
      if (entry.isDirectory()) {
        await walk(absolutePath);
        continue;
      }
      if (!entry.isFile()) {
        continue;
      }
      const info = await stat(absolutePath);
      if (filter.exceedsSize(info.size)) {
        selection.skipped.push({ absolutePath, reason: "size" });
        continue;
      }
      selection.files.push({
        absolutePath,
        relativePath: path.relative(root, absolutePath).split(path.sep).join("/"),
        size: info.size,
        mtimeMs: info.mtimeMs
      });
      selection.totalBytes += info.size;
    }
  };

  await walk(root);
  return selection;
}

/**
 * Selection from an explicit file list under `baseDirectory`. Entries outside
 * the base directory or missing on disk are returned in `missing`.
 */
export async function selectListedFiles(
  files: readonly string[],
  baseDirectory: string,
  settings: FileSelectionSettings
): Promise<{ selection: FileSelection; missing: string[] }> {
  const filter = new FileFilter(settings);
  const selection: FileSelection = { files: [], skipped: [], totalBytes: 0 };
  const missing: string[] = [];
  const seen = new Set<string>();

  for (const file of files) {
    const absolutePath = path.resolve(baseDirectory, file);
    if (seen.has(absolutePath)) {
      continue;
    }
    seen.add(absolutePath);
    const relative = path.relative(baseDirectory, absolutePath);
    if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
      missing.push(file);
      continue;
    }
    const info = await stat(absolutePath).catch(() => null);
    if (!info?.isFile()) {
      missing.push(file);
      continue;
    }
    const reason = filter.segmentExclusion(absolutePath, baseDirectory);
    if (reason) {
      selection.skipped.push({ absolutePath, reason });
      continue;
    }
    if (filter.exceedsSize(info.size)) {
      selection.skipped.push({ absolutePath, reason: "size" });
      continue;
    }
    selection.files.push({
      absolutePath,
      relativePath: relative.split(path.sep).join("/"),
      size: info.size,
      mtimeMs: info.mtimeMs
    });
    selection.totalBytes += info.size;
  }
  return { selection, missing };
}
