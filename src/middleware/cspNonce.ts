import type { IncomingMessage } from "node:http";
import type { Request, Response, NextFunction } from "express";
import { randomBytes } from "node:crypto";

const nonces = new WeakMap<IncomingMessage, string>();

/** Per-request nonce for the inline scripts of the redirect and wait pages. Must run before helmet. */
export function cspNonce(req: Request, _res: Response, next: NextFunction): void {
  nonces.set(req, randomBytes(16).toString("base64"));
  next();
}

export function getCspNonce(req: IncomingMessage): string | undefined {
  return nonces.get(req);
}

/** helmet directive value: `'nonce-…'` for the current request. */
export function nonceDirective(req: IncomingMessage): string {
  const nonce = nonces.get(req);
  return nonce ? `'nonce-${nonce}'` : "'none'";
}
