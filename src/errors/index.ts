/**
 * Error types surfaced by the coordination core.
 * Races that belong to normal operation (late acks, lost claims) are outcome values, not errors.
 */

export type CoordinationErrorCode =
  | "DUPLICATE_KEY"
  | "SIZE_LIMIT_EXCEEDED"
  | "FILE_NOT_FOUND"
  | "STORE_WRITE_FAILED";

/** Base error with a machine-readable code. */
export class CoordinationError extends Error {
  public readonly code: CoordinationErrorCode;

  constructor(message: string, code: CoordinationErrorCode) {
    super(message);
    this.name = "CoordinationError";
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** A second request was registered under a key that is still pending. */
export class DuplicateKeyError extends CoordinationError {
  constructor(public readonly key: string) {
    super(`A request is already pending for key: ${key}`, "DUPLICATE_KEY");
    this.name = "DuplicateKeyError";
  }
}

export class SizeLimitExceededError extends CoordinationError {
  constructor(
    public readonly filename: string,
    public readonly sizeBytes: number,
    public readonly maxBytes: number
  ) {
    super(`File too large (max ${formatSizeLimit(maxBytes)})`, "SIZE_LIMIT_EXCEEDED");
    this.name = "SizeLimitExceededError";
  }
}

/** Whole MB, KB below 1 MB, bytes below 1 KB. */
export function formatSizeLimit(bytes: number): string {
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}MB`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}KB`;
  return `${bytes} bytes`;
}

export class FileNotFoundError extends CoordinationError {
  constructor(public readonly filePath: string) {
    super("File not found", "FILE_NOT_FOUND");
    this.name = "FileNotFoundError";
  }
}

/** The persistent store rejected a write; in-memory state was rolled back. */
export class StoreWriteError extends CoordinationError {
  constructor(message: string, public readonly reason?: unknown) {
    super(message, "STORE_WRITE_FAILED");
    this.name = "StoreWriteError";
  }
}

export function isCoordinationError(err: unknown): err is CoordinationError {
  return err instanceof CoordinationError;
}

/** Message from an unknown thrown value. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return "An unknown error occurred";
}
