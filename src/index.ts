import type { Server } from "http";
import { config, CREDENTIALS_ENV_KEY } from "./config.js";
import { createApp } from "./app.js";
import { CredentialPool } from "./credentials/pool.js";
import { RecoveryLoop } from "./credentials/recovery.js";
import { EnvFileStore } from "./lib/env-store.js";
import { ChatUpstream } from "./providers/upstream.js";

process.title = "credential-pool-proxy";

const store = new EnvFileStore(config.envFile);
const upstream = new ChatUpstream({
  baseUrl: config.upstream.baseUrl,
  model: config.upstream.model,
  modelName: config.upstream.modelName,
});
const pool = new CredentialPool(config.credentials, {
  upstream,
  store,
  storeKey: CREDENTIALS_ENV_KEY,
  healthCheckTimeoutMs: config.upstream.healthCheckTimeoutMs,
  refreshTimeoutMs: config.upstream.refreshTimeoutMs,
  batchConcurrency: config.batchRefreshConcurrency,
});
const recovery = new RecoveryLoop(pool, {
  intervalMs: config.recovery.intervalMs,
  errorBackoffMs: config.recovery.errorBackoffMs,
});

const app = createApp({ config, pool, upstream, store, recovery });

// --- Start ---
let server: Server;

function main() {
  console.log("Initializing credential pool proxy...");
  console.log(`  Environment: ${config.nodeEnv}`);
  console.log(`  Upstream: ${config.upstream.baseUrl} (model ${config.upstream.model})`);
  console.log(`  Pool: ${pool.size} entries`);
  console.log(`  Env file: ${store.exists() ? store.path : "(none, changes are not persisted)"}`);

  if (config.recovery.enabled) {
    recovery.start();
  } else {
    console.log("  Recovery loop disabled (AUTO_REFRESH_TOKENS=false)");
  }

  server = app.listen(config.port, config.host, () => {
    console.log(`\nProxy running on http://${config.host}:${config.port}`);
    console.log(`  Health: http://localhost:${config.port}/health`);
    console.log(`  Chat: http://localhost:${config.port}/v1/chat/completions`);
    console.log(`  Admin: http://localhost:${config.port}/api/credentials`);
    if (!config.apiKey) {
      console.warn("  API_KEY is empty: /v1 endpoints are unauthenticated");
    }
  });
}

// --- Graceful shutdown ---
async function shutdown(signal: string) {
  console.log(`\n${signal} received, shutting down gracefully...`);

  await recovery.stop();

  if (server) {
    await new Promise<void>((resolve) => {
      server.close(() => {
        console.log("  HTTP server closed");
        resolve();
      });
      // Give in-flight requests 10 seconds to complete
      setTimeout(resolve, 10_000).unref();
    });
  }

  console.log("  Shutdown complete");
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err) => {
    console.error("Shutdown error:", err);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));

main();
