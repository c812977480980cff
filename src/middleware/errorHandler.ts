import type { Request, Response, NextFunction } from "express";
import { logger } from "../lib/logger.js";
import { config } from "../config/index.js";

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code?: string
  ) {
    super(message);
    this.name = "AppError";
  }
}

/** Log stack only in dev/test, or in prod when LOG_STACK_IN_PROD and 500 non-AppError. Never log headers/cookies/body. */
function shouldLogStack(statusCode: number, isAppError: boolean): boolean {
  if (config.NODE_ENV !== "production") return true;
  return config.LOG_STACK_IN_PROD === true && statusCode === 500 && !isAppError;
}

/** Body parsers flag oversized or malformed payloads with `status`/`type`. */
function parserStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("type" in err) || !("status" in err)) return undefined;
  if (typeof err.type !== "string" || !err.type.startsWith("entity.")) return undefined;
  return typeof err.status === "number" ? err.status : undefined;
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars -- Express 4-arg signature
  _next: NextFunction
): void {
  const requestId = req.requestId;
  const bodyStatus = parserStatus(err);
  const normalized =
    err instanceof AppError
      ? err
      : bodyStatus !== undefined
        ? new AppError("Invalid request body", bodyStatus, "INVALID_BODY")
        : err;
  const isAppError = normalized instanceof AppError;
  const statusCode = isAppError ? normalized.statusCode : 500;
  const serverMessage = isAppError
    ? normalized.message
    : normalized instanceof Error
      ? normalized.message
      : "Internal server error";

  logger.error(serverMessage, {
    requestId,
    statusCode,
    method: req.method,
    path: req.path,
    ...(normalized instanceof Error && shouldLogStack(statusCode, isAppError) && { stack: normalized.stack }),
  });

  const isProduction = process.env.NODE_ENV === "production";
  let body: Record<string, unknown>;

  if (isProduction) {
    if (isAppError && normalized.statusCode < 500) {
      body = {
        error: normalized.message,
        ...(requestId && { requestId }),
        ...(normalized.code && { code: normalized.code }),
      };
    } else {
      body = {
        error: "Internal server error",
        ...(requestId && { requestId }),
      };
    }
  } else {
    body = {
      error: isAppError || process.env.NODE_ENV === "development" ? serverMessage : "Internal server error",
      ...(requestId && { requestId }),
      ...(statusCode === 404 && { path: req.method + " " + req.originalUrl }),
      ...(isAppError && normalized.code && { code: normalized.code }),
    };
  }

  res.status(statusCode).json(body);
}
