import type { Request, Response, NextFunction } from "express";
import logger from "../config/logger.js";
import { env } from "../config/env.js";
import { sendGenericError } from "../routes/error.routes.js";

export function notFound(_req: Request, res: Response): void {
  res.status(404).json({ message: "Not found." });
}

// Express and http-errors tag client errors with `status` or `statusCode`
export function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const status =
    "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  return typeof status === "number" && status >= 400 && status < 500
    ? status
    : undefined;
}

// Last stop for anything thrown or passed to next(err)
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const error = err instanceof Error ? err : new Error(String(err));
  const status = clientErrorStatus(err);

  if (status !== undefined) {
    logger.warn("Client error", {
      status,
      error: error.message,
      method: req.method,
      url: req.originalUrl,
    });
  } else {
    logger.error("Unhandled error", {
      error: error.message,
      stack: error.stack,
      method: req.method,
      url: req.originalUrl,
    });
  }

  // Express closes the connection itself once the response has started
  if (res.headersSent) {
    next(err);
    return;
  }

  if (status !== undefined) {
    res.status(status).json({ message: error.message });
    return;
  }

  if (env.isDev) {
    res.status(500).json({ message: error.message, stack: error.stack });
    return;
  }

  sendGenericError(res);
}
