/**
 * Failure taxonomy for the voice pipeline, plus HTTP errors for the API.
 *
 * Every pipeline failure carries a `kind` that is written to the job record
 * as `errorKind`, and `toJobError()` renders the `errorMessage` text.
 */

export const FAILURE_KINDS = [
  "TranscriptionFailure",
  "TimeoutFailure",
  "ExtractionFailure",
  "ValidationFailure",
  "StorageFailure",
] as const;

export type FailureKind = (typeof FAILURE_KINDS)[number];

/** Base class of every classified pipeline failure. */
export abstract class PipelineFailure extends Error {
  abstract readonly kind: FailureKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }

  toJobError(): string {
    return `${this.kind}: ${this.message}`;
  }
}

/** Audio unreachable, unsupported, oversized, or no speech recognised. */
export class TranscriptionFailure extends PipelineFailure {
  readonly kind = "TranscriptionFailure" as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TranscriptionFailure";
  }
}

/** An external call ran past its budget. */
export class TimeoutFailure extends PipelineFailure {
  readonly kind = "TimeoutFailure" as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TimeoutFailure";
  }
}

/** The model answered with something that is not a usable candidate event. */
export class ExtractionFailure extends PipelineFailure {
  readonly kind = "ExtractionFailure" as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ExtractionFailure";
  }
}

/** The merged candidate event breaks an invariant. */
export class ValidationFailure extends PipelineFailure {
  readonly kind = "ValidationFailure" as const;
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(issues.join("; "));
    this.name = "ValidationFailure";
    this.issues = issues;
  }
}

/** A job or event store write failed. */
export class StorageFailure extends PipelineFailure {
  readonly kind = "StorageFailure" as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StorageFailure";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

/**
 * Maps anything thrown by a stage onto the taxonomy. Typed failures pass
 * through, aborts become timeouts, the rest take the stage's fallback kind.
 */
export function classifyError(err: unknown, fallback: FailureKind): PipelineFailure {
  if (err instanceof PipelineFailure) return err;
  if (isAbortError(err)) return new TimeoutFailure(errorMessage(err), { cause: err });

  const message = errorMessage(err);
  switch (fallback) {
    case "TranscriptionFailure":
      return new TranscriptionFailure(message, { cause: err });
    case "TimeoutFailure":
      return new TimeoutFailure(message, { cause: err });
    case "ExtractionFailure":
      return new ExtractionFailure(message, { cause: err });
    case "ValidationFailure":
      return new ValidationFailure([message]);
    case "StorageFailure":
      return new StorageFailure(message, { cause: err });
  }
}

export interface ErrorResponse {
  error: string;
  code: string;
  details?: unknown;
}

/** Base HTTP error with status code and machine-readable code. */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = "AppError";
    this.statusCode = statusCode;
    this.code = code;
  }

  toJSON(): ErrorResponse {
    return { error: this.message, code: this.code };
  }
}

/** 400 -- request body failed validation. */
export class BadRequestError extends AppError {
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 400, "BAD_REQUEST");
    this.name = "BadRequestError";
    this.details = details;
  }

  toJSON(): ErrorResponse {
    return {
      error: this.message,
      code: this.code,
      ...(this.details !== undefined ? { details: this.details } : {}),
    };
  }
}

/** 401 -- missing or wrong API key. */
export class UnauthorizedError extends AppError {
  constructor(message = "Unauthorized: Invalid or missing API key") {
    super(message, 401, "UNAUTHORIZED");
    this.name = "UnauthorizedError";
  }
}

/** 404 -- unknown resource. */
export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super(message, 404, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

/** 503 -- the job was stored but could not be handed to the queue. */
export class ServiceUnavailableError extends AppError {
  constructor(message = "Service unavailable") {
    super(message, 503, "SERVICE_UNAVAILABLE");
    this.name = "ServiceUnavailableError";
  }
}
