import type { ValidationIssue } from "./types/api";

// Base for every error the service raises on purpose. Anything else reaching
// the HTTP layer is treated as an unexpected 500.
export abstract class AppError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Malformed or out-of-range input. Raised before anything is persisted.
export class ValidationError extends AppError {
  readonly status = 400;
  readonly code = "VALIDATION_FAILED";

  constructor(readonly issues: ValidationIssue[]) {
    super(`Invalid input: ${issues.map((issue) => `${issue.field} ${issue.message}`).join(", ")}`);
  }
}

export class NotFoundError extends AppError {
  readonly status = 404;
  readonly code = "NOT_FOUND";

  constructor(message: string) {
    super(message);
  }

  static session(sessionId: string): NotFoundError {
    return new NotFoundError(`Session ${sessionId} not found`);
  }

  // Public lookups only echo the share id the caller already holds.
  static sharedSession(shareId: string): NotFoundError {
    return new NotFoundError(`Shared session ${shareId} not found`);
  }
}

// Backend I/O failed twice in a row for one operation.
export class StorageUnavailableError extends AppError {
  readonly status = 503;
  readonly code = "STORAGE_UNAVAILABLE";

  constructor(
    readonly operation: string,
    cause: unknown,
  ) {
    super(`Storage unavailable during ${operation}`, { cause });
  }
}

// Another session already owns the share id; the caller mints a new one.
export class ShareIdTakenError extends AppError {
  readonly status = 409;
  readonly code = "SHARE_ID_TAKEN";

  constructor(
    readonly shareId: string,
    options?: { cause?: unknown },
  ) {
    super(`Share id ${shareId} is already assigned`, options);
  }
}

export class IdSpaceExhaustedError extends AppError {
  readonly status = 500;
  readonly code = "ID_SPACE_EXHAUSTED";

  constructor(readonly attempts: number) {
    super(`Could not mint an unused share id after ${attempts} attempts`);
  }
}
