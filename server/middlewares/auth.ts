/**
 * Shared-secret check for the internal endpoints (order admin, parser tests).
 * The secret arrives as `secret_key` in the JSON body or in the
 * `x-internal-secret` header.
 */

import crypto from "crypto";
import type { NextFunction, Request, Response } from "express";

function readProvidedSecret(req: Request): string | undefined {
  const header = req.headers["x-internal-secret"];
  if (typeof header === "string" && header) return header;

  const body: unknown = req.body;
  if (body && typeof body === "object" && "secret_key" in body && typeof body.secret_key === "string") {
    return body.secret_key;
  }
  return undefined;
}

function secretsMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export function requireSharedSecret(expected: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expected) {
      console.error("[Auth] INTERNAL_SECRET is not configured, rejecting request");
      return res.status(503).json({ error: "Server secret not configured" });
    }

    const provided = readProvidedSecret(req);
    if (!provided || !secretsMatch(provided, expected)) {
      console.warn(`[Auth] Rejected ${req.method} ${req.path}: bad or missing secret`);
      return res.status(401).json({ error: "Unauthorized" });
    }

    next();
  };
}
