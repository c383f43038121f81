import { Request, Response, NextFunction, RequestHandler } from "express";
import type { Logger } from "winston";
import { ErrorCategory, SyncError } from "../errors/sync.errors";

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public isOperational = true,
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

/**
 * HTTP status for an error thrown out of a route
 */
export const statusForError = (err: Error): number => {
  if (err instanceof AppError) return err.statusCode;
  if (!(err instanceof SyncError)) return 500;

  switch (err.category) {
    case ErrorCategory.AUTH:
      return 401;
    case ErrorCategory.STORAGE:
      return err.kind === "notFound" ? 404 : 502;
    case ErrorCategory.CONFLICT:
    case ErrorCategory.OPERATION:
      return 409;
    case ErrorCategory.NETWORK:
    case ErrorCategory.CIRCUIT:
      return 503;
    default:
      return 500;
  }
};

export interface ErrorHandlerOptions {
  exposeStack: boolean;
}

export const createErrorHandler = (logger: Logger, options: ErrorHandlerOptions) => {
  return (err: Error, req: Request, res: Response, _next: NextFunction) => {
    const statusCode = statusForError(err);
    const message = err.message || "Internal Server Error";

    logger.error("Error handler caught exception", {
      error: message,
      code: err instanceof SyncError ? err.code : undefined,
      stack: err.stack,
      path: req.path,
      method: req.method,
      requestId: req.id,
      statusCode,
    });

    const response: { error: string; path: string; code?: string; stack?: string } = {
      error: message,
      path: req.path,
    };

    if (err instanceof SyncError) {
      response.code = err.code;
    }

    if (options.exposeStack) {
      response.stack = err.stack;
    }

    res.status(statusCode).json(response);
  };
};

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    error: "Route not found",
    path: req.path,
  });
};

// Async error wrapper
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};
