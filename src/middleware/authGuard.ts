import type { Request, Response, NextFunction } from "express";
import jwt from "jsonwebtoken";
import { config } from "../config/index.js";
import { AppError } from "./errorHandler.js";

/** Bearer header first; the auth cookie covers same-origin pages (wait page polling). */
function readAccessToken(req: Request): string | undefined {
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith("Bearer ")) return authHeader.slice(7);
  const cookies: Record<string, unknown> = req.cookies ?? {};
  const fromCookie = cookies[config.AUTH_COOKIE_NAME];
  return typeof fromCookie === "string" && fromCookie ? fromCookie : undefined;
}

export function authGuard(req: Request, _res: Response, next: NextFunction): void {
  const token = readAccessToken(req);

  if (!token) {
    next(new AppError("Unauthorized", 401, "UNAUTHORIZED"));
    return;
  }

  try {
    const verifyOptions: jwt.VerifyOptions & { complete?: false } = { issuer: config.JWT_ISSUER };
    if (config.JWT_AUDIENCE) verifyOptions.audience = config.JWT_AUDIENCE;
    const decoded = jwt.verify(token, config.JWT_ACCESS_SECRET, verifyOptions);
    if (typeof decoded === "string" || typeof decoded.sub !== "string") {
      next(new AppError("Invalid or expired token", 401, "UNAUTHORIZED"));
      return;
    }
    const role = typeof decoded.role === "string" ? decoded.role : undefined;
    req.user = { ...decoded, sub: decoded.sub, userId: decoded.sub, role };
    next();
  } catch {
    next(new AppError("Invalid or expired token", 401, "UNAUTHORIZED"));
  }
}
