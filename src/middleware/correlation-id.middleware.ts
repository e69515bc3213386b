/// <reference path="../types/express.d.ts" />
import { Request, Response, NextFunction } from "express";
import { randomUUID } from "crypto";
import { setCorrelationId } from "../utils/logger";

/**
 * Propagates X-Request-ID (or mints a UUID) onto the request, the response
 * headers and the logger's async context.
 */
export function correlationIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const correlationId = req.get("X-Request-ID") || randomUUID();

  req.correlationId = correlationId;
  res.setHeader("X-Request-ID", correlationId);
  setCorrelationId(correlationId);

  next();
}
