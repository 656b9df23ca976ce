// src/middleware/auth.ts
import type { Request, Response, NextFunction } from "express";
import { timingSafeEqual } from "node:crypto";
import { moduleLogger } from "../logger.js";
import { UnauthorizedError } from "../errors.js";

const log = moduleLogger("auth");

function sameKey(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Header-based auth for /api. Clients send `x-api-key: <API_ACCESS_KEY>`.
 * With no key configured every request passes (development setups).
 */
export function requireApiKey(accessKey: string) {
  if (!accessKey) {
    log.warn("API_ACCESS_KEY is not set; /api is effectively unprotected");
  }

  return (req: Request, _res: Response, next: NextFunction) => {
    if (!accessKey) return next();

    const provided = req.get("x-api-key");
    if (!provided || !sameKey(provided, accessKey)) {
      return next(new UnauthorizedError("Missing or invalid API key"));
    }
    return next();
  };
}
