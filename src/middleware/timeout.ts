import type { Request, Response, NextFunction, RequestHandler } from "express";

/**
 * Request timeout middleware with timeouts based on endpoint type.
 * - Chat completions: 180s (upstream generation can be slow, retries add up)
 * - Admin refresh/recovery: 300s (a batch sign-in over a large pool)
 * - Everything else: 30s
 */
export function requestTimeoutMiddleware(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const timeout = getTimeoutForPath(req.path);
    const start = Date.now();

    const timer = setTimeout(() => {
      if (!res.headersSent) {
        const elapsed = Date.now() - start;
        console.error(
          `[timeout] Request exceeded ${timeout}ms - aborting`,
          `method=${req.method}`,
          `path=${req.path}`,
          `elapsed=${elapsed}ms`
        );

        res.status(408).json({
          error: "Request timeout",
          message: `Request exceeded ${timeout / 1000} second limit`,
          retryable: true,
          timeout_ms: timeout,
          elapsed_ms: elapsed,
        });
      }
    }, timeout);

    res.on("finish", () => clearTimeout(timer));
    res.on("close", () => clearTimeout(timer));

    next();
  };
}

export function getTimeoutForPath(path: string): number {
  if (path.startsWith("/v1/chat/")) {
    return 180_000;
  }

  if (
    path.startsWith("/api/credentials/refresh") ||
    path.startsWith("/api/credentials/recover")
  ) {
    return 300_000;
  }

  return 30_000;
}
