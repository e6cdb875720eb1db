import { Request, Response, NextFunction } from "express";
import { logger } from "./logger";

export class ApiError extends Error {
  statusCode: number;
  data?: unknown;

  constructor(message: string, statusCode = 500, data?: unknown) {
    super(message);
    this.name = "ApiError";
    this.statusCode = statusCode;
    this.data = data;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed input, rejected before any task or session work starts. */
export class ValidationError extends ApiError {
  constructor(message: string, data?: unknown) {
    super(message, 400, data);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string) {
    super(message, 404);
    this.name = "NotFoundError";
  }
}

/** A generation turn was requested for a story whose session has not been primed. */
export class SessionNotReadyError extends ApiError {
  readonly storyId: string;

  constructor(storyId: string) {
    super(`Session for story ${storyId} is not initialized; call ensure or rebuild first`, 409, { storyId });
    this.name = "SessionNotReadyError";
    this.storyId = storyId;
  }
}

/**
 * Uniform failure from a text or image provider: connection errors, timeouts,
 * non-2xx responses and responses that could not be interpreted.
 */
export class ProviderError extends ApiError {
  readonly provider: string;
  readonly retryable: boolean;

  constructor(provider: string, message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(`${provider}: ${message}`, 502, { provider });
    this.name = "ProviderError";
    this.provider = provider;
    this.retryable = options.retryable ?? false;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}

// Express error-handling middleware
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  const status = err instanceof ApiError ? err.statusCode : 500;
  const message = errorMessage(err) || "Internal Server Error";
  const data = err instanceof ApiError ? err.data ?? null : null;
  if (status >= 500) {
    logger.error({ err, url: req.originalUrl, method: req.method }, "[HTTP] Request failed");
  }
  res.status(status).json({
    responseStatus: "error",
    message,
    data,
  });
}
