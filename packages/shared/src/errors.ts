export type ErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "CONFLICT"
  | "STAGE_FAILED"
  | "REPOSITORY_ERROR"
  | "BLOB_STORE_ERROR"
  | "UNAVAILABLE";

export type StageName = "metadata" | "thumbnails" | "caption";

type ServiceErrorOptions = {
  details?: Record<string, unknown>;
  cause?: unknown;
};

export class ServiceError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly details: Record<string, unknown> | undefined;

  constructor(code: ErrorCode, statusCode: number, message: string, options: ServiceErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ServiceError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = options.details;
  }

  toJSON(): { code: ErrorCode; message: string; details?: Record<string, unknown> } {
    return this.details ? { code: this.code, message: this.message, details: this.details } : { code: this.code, message: this.message };
  }
}

export class ValidationError extends ServiceError {
  constructor(message: string, options?: ServiceErrorOptions) {
    super("VALIDATION_ERROR", 400, message, options);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends ServiceError {
  constructor(message: string, options?: ServiceErrorOptions) {
    super("NOT_FOUND", 404, message, options);
    this.name = "NotFoundError";
  }
}

export class ConflictError extends ServiceError {
  constructor(message: string, options?: ServiceErrorOptions) {
    super("CONFLICT", 409, message, options);
    this.name = "ConflictError";
  }
}

export class RepositoryError extends ServiceError {
  constructor(message: string, options?: ServiceErrorOptions) {
    super("REPOSITORY_ERROR", 500, message, options);
    this.name = "RepositoryError";
  }
}

export class BlobStoreError extends ServiceError {
  readonly missing: boolean;
  readonly alreadyExists: boolean;

  constructor(message: string, options: ServiceErrorOptions & { missing?: boolean; alreadyExists?: boolean } = {}) {
    super("BLOB_STORE_ERROR", 500, message, options);
    this.name = "BlobStoreError";
    this.missing = options.missing ?? false;
    this.alreadyExists = options.alreadyExists ?? false;
  }
}

export class UnavailableError extends ServiceError {
  constructor(message: string, options?: ServiceErrorOptions) {
    super("UNAVAILABLE", 503, message, options);
    this.name = "UnavailableError";
  }
}

/** Raised by a derivation stage; the coordinator turns it into a `FAILED` item. */
export class StageFailure extends ServiceError {
  readonly stage: StageName;

  constructor(stage: StageName, cause: unknown) {
    super("STAGE_FAILED", 500, `${stage} stage failed: ${errorMessage(cause)}`, { details: { stage }, cause });
    this.name = "StageFailure";
    this.stage = stage;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message.trim() || err.name;
  }
  const text = String(err ?? "").trim();
  return text || "Unknown error";
}
