import type { Request, Response, NextFunction } from "express";
import { randomUUID } from "node:crypto";

const INBOUND_REQUEST_ID = /^[A-Za-z0-9._-]{8,128}$/;

/** Reuses a sane inbound x-request-id (set by the proxy), otherwise generates one. */
export function requestId(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const inbound = req.get("x-request-id");
  const id = inbound && INBOUND_REQUEST_ID.test(inbound) ? inbound : randomUUID();
  req.requestId = id;
  res.locals.requestId = id;
  res.setHeader("x-request-id", id);
  next();
}
