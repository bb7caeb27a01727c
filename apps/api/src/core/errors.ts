export type BackupStage = "resolve" | "validate" | "archive" | "compress" | "encrypt" | "upload" | "record";

export class BackhaulError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, statusCode: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class ConfigurationError extends BackhaulError {
  readonly keys: string[];

  constructor(message: string, keys: string[] = [], options?: { cause?: unknown }) {
    super("CONFIGURATION", 400, message, options);
    this.keys = keys;
  }
}

export class NotFoundError extends BackhaulError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("NOT_FOUND", 404, message, options);
  }
}

export class TransferError extends BackhaulError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TRANSFER", 502, message, options);
  }
}

export class AuthenticationError extends BackhaulError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("AUTHENTICATION", 401, message, options);
  }
}

export class UnsupportedOperationError extends BackhaulError {
  constructor(message: string) {
    super("UNSUPPORTED_OPERATION", 501, message);
  }
}

export class StateCorruptionError extends BackhaulError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STATE_CORRUPTION", 500, message, options);
  }
}

export class ArchiveFormatError extends BackhaulError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ARCHIVE_FORMAT", 422, message, options);
  }
}

export class BackupStageError extends BackhaulError {
  readonly stage: BackupStage;

  constructor(stage: BackupStage, cause: unknown) {
    const inner = cause instanceof BackhaulError ? cause : null;
    super(
      inner?.code ?? "BACKUP_FAILED",
      inner?.statusCode ?? 500,
      `Backup failed during ${stage}: ${errorMessage(cause)}`,
      { cause }
    );
    this.stage = stage;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Maps a thrown value from a remote SDK onto the transfer taxonomy, keeping
 * errors that are already classified.
 */
export function toTransferError(error: unknown, action: string): BackhaulError {
  if (error instanceof BackhaulError) {
    return error;
  }
  return new TransferError(`${action} failed: ${errorMessage(error)}`, { cause: error });
}

export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return false;
  }
  const { code } = error;
  return typeof code === "string" && codes.includes(code.toUpperCase());
}

/** HTTP status carried by an SDK error, either directly or on its response. */
export function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("response" in error && typeof error.response === "object" && error.response !== null) {
    const { response } = error;
    if ("status" in response && typeof response.status === "number") {
      return response.status;
    }
  }
  return undefined;
}
