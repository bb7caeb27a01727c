import { createReadStream, createWriteStream } from "node:fs";
import { mkdir, rm } from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { createGunzip, createGzip } from "node:zlib";
import archiver from "archiver";
import extract from "extract-zip";
import { ReadEntry, extract as extractTar, list as listTar } from "tar";
import { ArchiveFormatError, errorMessage } from "../../core/errors.js";
import type { Logger } from "../../core/logger.js";
import type { SelectedFile } from "./file-selection.js";

export type ArchiveFormat = "zip" | "tar";
export type ArtifactKind = "zip" | "tar" | "tar.gz";

export type ExtractionSummary = {
  fileCount: number;
  totalBytes: number;
};

export const ENCRYPTED_SUFFIX = ".enc";

/** Archive kind from an artifact name, ignoring a trailing `.enc`. */
export function artifactKind(fileName: string): ArtifactKind {
  const name = fileName.toLowerCase().endsWith(ENCRYPTED_SUFFIX)
    ? fileName.slice(0, -ENCRYPTED_SUFFIX.length).toLowerCase()
    : fileName.toLowerCase();
  if (name.endsWith(".zip")) return "zip";
  if (name.endsWith(".tar.gz") || name.endsWith(".tgz")) return "tar.gz";
  if (name.endsWith(".tar")) return "tar";
  throw new ArchiveFormatError(`Unrecognized backup archive type: ${fileName}`);
}

function escapes(targetDir: string, entryPath: string): boolean {
  const resolved = path.resolve(targetDir, entryPath);
  const relative = path.relative(targetDir, resolved);
  return relative.startsWith("..") || path.isAbsolute(relative);
}

export class ArchiveService {
  constructor(private readonly logger: Logger) {}

  /** Writes `files` into a zip or an uncompressed tar at `outputPath`. */
  async createArchive(files: readonly SelectedFile[], outputPath: string, format: ArchiveFormat): Promise<void> {
    await mkdir(path.dirname(outputPath), { recursive: true });

    await new Promise<void>((resolve, reject) => {
      const output = createWriteStream(outputPath);
      const archive = format === "zip" ? archiver("zip", { zlib: { level: 9 } }) : archiver("tar");

      output.on("close", resolve);
      output.on("error", reject);
      archive.on("error", reject);
      archive.on("warning", (warning) => {
        this.logger.warn({ err: warning, outputPath }, "Archive warning");
      });

      archive.pipe(output);
      for (const file of files) {
        archive.file(file.absolutePath, { name: file.relativePath });
      }
      archive.finalize().catch(reject);
    });
  }

  async gzip(inputPath: string, outputPath: string): Promise<void> {
    await pipeline(createReadStream(inputPath), createGzip(), createWriteStream(outputPath));
  }

  async gunzip(inputPath: string, outputPath: string): Promise<void> {
    try {
      await pipeline(createReadStream(inputPath), createGunzip(), createWriteStream(outputPath));
    } catch (error) {
      await rm(outputPath, { force: true });
      throw new ArchiveFormatError(`Backup is not valid gzip data: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Extracts into `targetDir`, overwriting existing files. Entries that would
   * land outside `targetDir` fail the extraction.
   */
  async extract(archivePath: string, targetDir: string, kind: ArtifactKind): Promise<ExtractionSummary> {
    const target = path.resolve(targetDir);
    await mkdir(target, { recursive: true });
    return kind === "zip" ? this.extractZip(archivePath, target) : this.extractTarball(archivePath, target);
  }

  private async extractZip(archivePath: string, target: string): Promise<ExtractionSummary> {
    const summary: ExtractionSummary = { fileCount: 0, totalBytes: 0 };
    try {
      await extract(archivePath, {
        dir: target,
        // extract-zip refuses out-of-bound paths itself.
        onEntry: (entry) => {
          if (!entry.fileName.endsWith("/")) {
            summary.fileCount += 1;
            summary.totalBytes += entry.uncompressedSize;
          }
        }
      });
    } catch (error) {
      throw new ArchiveFormatError(`Failed to extract zip archive: ${errorMessage(error)}`, { cause: error });
    }
    return summary;
  }

  private async extractTarball(archivePath: string, target: string): Promise<ExtractionSummary> {
    const summary: ExtractionSummary = { fileCount: 0, totalBytes: 0 };
    const unsafe: string[] = [];

    // Validate every entry before anything is written.
    try {
      await listTar({
        file: archivePath,
        strict: true,
        filter: (entryPath, entry) => {
          if (path.isAbsolute(entryPath) || escapes(target, entryPath)) {
            unsafe.push(entryPath);
          }
          if (entry instanceof ReadEntry && entry.type === "File") {
            summary.fileCount += 1;
            summary.totalBytes += entry.size;
          }
          return false;
        }
      });
    } catch (error) {
      throw new ArchiveFormatError(`Failed to read tar archive: ${errorMessage(error)}`, { cause: error });
    }
    if (unsafe.length > 0) {
      throw new ArchiveFormatError(`Archive entries escape the target directory: ${unsafe.join(", ")}`);
    }

    try {
      await extractTar({ file: archivePath, cwd: target, strict: true });
    } catch (error) {
      throw new ArchiveFormatError(`Failed to extract tar archive: ${errorMessage(error)}`, { cause: error });
    }
    return summary;
  }
}
