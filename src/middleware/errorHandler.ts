/**
 * Global error handling middleware.
 *
 * Maps the error taxonomy to HTTP responses:
 * - AppError subclasses keep their own status (400 validation, 502 backend
 *   error, 503 backend or store unavailable)
 * - body-parser style errors with a 4xx `status` become ValidationError
 * - anything else is an InfrastructureError answered with a generic 500
 *
 * Responses share one envelope: { error: { message, code, details } }.
 */
import {
  AppError,
  InfrastructureError,
  ValidationError,
  isAppError,
} from "@domain/errors";
import {
  describeError,
  logger as defaultLogger,
  type LoggerPort,
} from "@infra/logging/Logger";
import type { NextFunction, Request, Response } from "express";

function clientErrorStatus(err: unknown): number | undefined {
  if (!err || typeof err !== "object" || !("status" in err)) {
    return undefined;
  }

  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500
    ? status
    : undefined;
}

export function toAppError(err: unknown): AppError {
  if (isAppError(err)) {
    return err;
  }

  if (clientErrorStatus(err) !== undefined) {
    return new ValidationError(describeError(err).message);
  }

  return new InfrastructureError("Internal Server Error", 500);
}

export function createErrorHandler(logger: LoggerPort = defaultLogger) {
  return function errorHandler(
    err: unknown,
    req: Pick<Request, "method" | "originalUrl">,
    res: Pick<Response, "status">,
    _next: NextFunction
  ): void {
    const appError = toAppError(err);
    const status = appError.statusCode;

    logger.log(status >= 500 ? "error" : "warn", "Request failed", {
      method: req.method,
      url: req.originalUrl,
      type: appError.type,
      statusCode: status,
      message: appError.message,
      originalError: appError === err ? undefined : describeError(err).message,
    });

    res.status(status).json({
      error: {
        message: appError.message,
        code: appError.type,
        details: appError.metadata ?? {},
      },
    });
  };
}
