/// <reference path="../types/express.d.ts" />
import { Request, Response, NextFunction, RequestHandler } from "express";
import { logger } from "../utils/logger";
import { captureException } from "../services/sentry";

export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public isOperational = true,
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(404, `${resource} not found`);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

function isJsonParseError(err: Error): boolean {
  return err instanceof SyntaxError && "body" in err;
}

export function errorHandler(
  err: Error | AppError,
  req: Request,
  res: Response,
  _next: NextFunction,
) {
  if (isJsonParseError(err)) {
    err = new AppError(400, "Invalid JSON body");
  }

  const isAppError = err instanceof AppError;
  const statusCode = err instanceof AppError ? err.statusCode : 500;
  const message = isAppError ? err.message : "Internal server error";
  const isOperational = err instanceof AppError ? err.isOperational : false;

  if (statusCode >= 500 && !isOperational) {
    captureException(err, {
      method: req.method,
      url: req.url,
      correlationId: req.correlationId,
    });
  }

  const context = {
    path: req.path,
    method: req.method,
    statusCode,
    message,
    isOperational,
  };

  if (statusCode >= 500) {
    logger.error("Request error", context, err);
  } else {
    logger.warn("Request error", context);
  }

  if (process.env.NODE_ENV === "production" && !isOperational) {
    res.status(500).json({
      error: "Internal server error",
      message: "An unexpected error occurred",
    });
  } else {
    res.status(statusCode).json({
      error: message,
      stack: process.env.NODE_ENV === "development" ? err.stack : undefined,
    });
  }
}

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
