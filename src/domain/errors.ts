/**
 * Error taxonomy shared by the domain, application and HTTP layers.
 *
 * Every error carries a type code and an HTTP-equivalent status so the
 * boundary can map it without knowing where it was raised.
 */
export type AppErrorType =
  | "AppError"
  | "InfrastructureError"
  | "ValidationError"
  | "StoreUnavailable"
  | "BackendError"
  | "BackendUnavailable";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly statusCode: number;
  public readonly metadata: AppErrorMetadata | undefined;

  constructor(
    message: string,
    type: AppErrorType = "AppError",
    statusCode = 500,
    metadata?: AppErrorMetadata,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.type = type;
    this.statusCode = statusCode;
    this.metadata = metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class InfrastructureError extends AppError {
  constructor(message: string, statusCode = 500, metadata?: AppErrorMetadata) {
    super(message, "InfrastructureError", statusCode, metadata);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, "ValidationError", 400, metadata);
  }
}

/** The persistence store could not be reached or queried. */
export class StoreUnavailableError extends AppError {
  constructor(
    message = "Database not available",
    metadata?: AppErrorMetadata,
    cause?: unknown
  ) {
    super(message, "StoreUnavailable", 503, metadata, { cause });
  }
}

/** The inference backend answered with a non-success status. */
export class BackendError extends AppError {
  public readonly upstreamStatus: number | undefined;

  constructor(upstreamStatus: number | undefined, cause?: unknown) {
    super("AI service error", "BackendError", 502, { upstreamStatus }, { cause });
    this.upstreamStatus = upstreamStatus;
  }
}

/** The inference backend was unreachable, timed out or failed mid-request. */
export class BackendUnavailableError extends AppError {
  constructor(cause?: unknown) {
    super("AI service unavailable", "BackendUnavailable", 503, undefined, {
      cause,
    });
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
