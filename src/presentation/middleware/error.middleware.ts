import { NextFunction, Request, Response } from "express";
import { AppError } from "../../domain/errors/app.errors";
import { failureResult } from "../dto/summarize-audio.dto";
import { createLogger } from "../../infrastructure/logging/logger";

const logger = createLogger("ErrorHandler");

function statusOf(err: unknown): number {
  if (err instanceof AppError) {
    return err.statusCode;
  }
  // body-parser and other http-errors style errors
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 500;
}

export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const statusCode = statusOf(err);
  const message =
    statusCode >= 500 && !(err instanceof AppError)
      ? "Internal server error"
      : err instanceof Error
        ? err.message
        : "Request failed";

  logger.error(`Unhandled error (${statusCode})`, err);
  res.status(statusCode).json(failureResult(message));
}

export function notFound(_req: Request, res: Response): void {
  res.status(404).json({ message: "Route not found" });
}
