import type { Request, Response, NextFunction, RequestHandler } from "express";
import crypto from "crypto";

function bearer(req: Request): string | undefined {
  const header = req.headers.authorization;
  if (header?.startsWith("Bearer ")) return header.slice("Bearer ".length).trim();
  const apiKey = req.headers["x-api-key"];
  return typeof apiKey === "string" ? apiKey : undefined;
}

/**
 * Require `Authorization: Bearer <secret>` (or `X-API-Key`).
 * The secret is read per request so admin updates apply immediately.
 * An empty secret disables the check.
 */
export function requireKey(currentSecret: () => string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const secret = currentSecret();
    if (!secret) {
      next();
      return;
    }
    const provided = bearer(req);
    if (
      provided &&
      provided.length === secret.length &&
      crypto.timingSafeEqual(Buffer.from(provided), Buffer.from(secret))
    ) {
      next();
      return;
    }
    res.status(401).json({ error: "Unauthorized" });
  };
}
