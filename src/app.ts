import express, { type Express } from "express";
import type { AppConfig } from "./config.js";
import type { CredentialPool } from "./credentials/pool.js";
import type { ConfigStore } from "./lib/env-store.js";
import type { Upstream } from "./providers/upstream.js";
import type { RecoveryLoop } from "./credentials/recovery.js";
import { createChatRouter } from "./apis/chat.js";
import { createAdminRouter } from "./apis/admin.js";
import { requireKey } from "./middleware/auth.js";
import { requestTimeoutMiddleware } from "./middleware/timeout.js";
import { errorHandler } from "./middleware/errors.js";

export interface AppDeps {
  config: AppConfig;
  pool: CredentialPool;
  upstream: Upstream;
  store?: ConfigStore;
  recovery?: RecoveryLoop;
}

export function createApp({ config, pool, upstream, store, recovery }: AppDeps): Express {
  const app = express();

  app.use(express.json({ limit: "5mb" }));
  app.use(requestTimeoutMiddleware());

  // --- Free endpoints ---

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      pool: { total: pool.size, failed: pool.failedCount },
    });
  });

  // --- Proxy (API key) ---
  app.use("/v1", requireKey(() => config.apiKey));
  app.use(
    createChatRouter({
      pool,
      upstream,
      modelName: config.upstream.modelName,
      maxAttempts: config.maxUpstreamAttempts,
    }),
  );

  // --- Admin (admin key) ---
  app.use("/api", requireKey(() => config.adminKey));
  app.use(createAdminRouter({ pool, store, config, recovery }));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });
  app.use(errorHandler());

  return app;
}
