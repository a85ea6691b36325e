import "dotenv/config";
import { clampInt } from "./lib/validation.js";

type Env = Record<string, string | undefined>;

function optional(env: Env, key: string, fallback: string): string {
  return env[key] || fallback;
}

function flag(env: Env, key: string, fallback: boolean): boolean {
  const val = env[key];
  if (!val) return fallback;
  return val.toLowerCase() === "true" || val === "1";
}

/**
 * Split a comma-joined credential list. Entries are trimmed and empties dropped;
 * the separator inside composite entries ("----") is left alone.
 */
export function csvEntries(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(",").map((k) => k.trim()).filter(Boolean);
}

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  apiKey: string;
  adminKey: string;
  credentials: string[];
  envFile: string;
  upstream: {
    baseUrl: string;
    model: string;
    modelName: string;
    healthCheckTimeoutMs: number;
    refreshTimeoutMs: number;
  };
  recovery: {
    enabled: boolean;
    intervalMs: number;
    errorBackoffMs: number;
  };
  batchRefreshConcurrency: number;
  maxUpstreamAttempts: number;
}

/** Env key the credential list is read from and mirrored back into. */
export const CREDENTIALS_ENV_KEY = "UPSTREAM_CREDENTIALS";

export function loadConfig(env: Env = process.env): AppConfig {
  const nodeEnv = optional(env, "NODE_ENV", "development");
  const apiKey = optional(env, "API_KEY", "");

  return {
    port: clampInt(env.PORT, 1, 65_535, 8000),
    host: optional(env, "HOST", "0.0.0.0"),
    nodeEnv,
    apiKey,
    adminKey: optional(env, "ADMIN_KEY", apiKey),
    credentials: csvEntries(env[CREDENTIALS_ENV_KEY]),
    envFile: optional(env, "ENV_FILE", ".env"),
    upstream: {
      baseUrl: optional(env, "UPSTREAM_BASE_URL", "https://chat.z.ai").replace(/\/+$/, ""),
      model: optional(env, "UPSTREAM_MODEL", "0727-360B-API"),
      modelName: optional(env, "MODEL_NAME", "GLM-4.5"),
      healthCheckTimeoutMs: clampInt(env.HEALTH_CHECK_TIMEOUT_MS, 1_000, 60_000, 10_000),
      refreshTimeoutMs: clampInt(env.REFRESH_TIMEOUT_MS, 1_000, 120_000, 30_000),
    },
    recovery: {
      enabled: flag(env, "AUTO_REFRESH_TOKENS", true),
      // Intervals are configured in seconds
      intervalMs: clampInt(env.REFRESH_CHECK_INTERVAL, 60, 86_400, 1800) * 1000,
      errorBackoffMs: clampInt(env.RECOVERY_ERROR_BACKOFF, 10, 86_400, 300) * 1000,
    },
    batchRefreshConcurrency: clampInt(env.BATCH_REFRESH_CONCURRENCY, 1, 100, 20),
    maxUpstreamAttempts: clampInt(env.MAX_UPSTREAM_ATTEMPTS, 1, 10, 3),
  };
}

export const config = loadConfig();
