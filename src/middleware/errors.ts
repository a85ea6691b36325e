import type { Request, Response, NextFunction, ErrorRequestHandler } from "express";
import { safeErrorMessage } from "../lib/validation.js";

/** Error carrying the HTTP status it should be answered with. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

function statusOf(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  // body-parser attaches `status` to malformed-JSON errors
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 500;
}

export function errorHandler(): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = statusOf(err);
    if (status >= 500) {
      console.error(`[http] ${req.method} ${req.path} failed:`, safeErrorMessage(err, "internal error"));
    }
    res.status(status).json({
      error: status >= 500 ? "Internal server error" : safeErrorMessage(err, "Bad request"),
    });
  };
}
