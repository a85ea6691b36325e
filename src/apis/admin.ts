import { Router, type Request, type Response, type NextFunction, type RequestHandler } from "express";
import type { CredentialPool } from "../credentials/pool.js";
import type { ConfigStore } from "../lib/env-store.js";
import type { AppConfig } from "../config.js";
import type { RecoveryLoop } from "../credentials/recovery.js";
import { CREDENTIALS_ENV_KEY, csvEntries } from "../config.js";
import { HttpError } from "../middleware/errors.js";
import { clampInt, field, isObject, safeErrorMessage, sanitizeEntries, truncateSecret } from "../lib/validation.js";

export interface AdminRouterDeps {
  pool: CredentialPool;
  store?: ConfigStore;
  config: AppConfig;
  recovery?: RecoveryLoop;
}

interface ConfigUpdate {
  apiKey?: string;
  adminKey?: string;
  autoRefreshTokens?: boolean;
  /** Seconds. */
  refreshCheckInterval?: number;
}

// Runtime-editable settings and the env keys they are mirrored to
const EDITABLE: Record<keyof ConfigUpdate, string> = {
  apiKey: "API_KEY",
  adminKey: "ADMIN_KEY",
  autoRefreshTokens: "AUTO_REFRESH_TOKENS",
  refreshCheckInterval: "REFRESH_CHECK_INTERVAL",
};
const EDITABLE_FIELDS: Array<keyof ConfigUpdate> = ["apiKey", "adminKey", "autoRefreshTokens", "refreshCheckInterval"];

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Forward rejections to the error handler (Express 4 does not). */
function handle(fn: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

function bodyString(req: Request, key: string): string {
  const body: unknown = req.body;
  const value = isObject(body) ? field(body, key) : undefined;
  if (typeof value !== "string" || !value.trim()) {
    throw new HttpError(400, `Provide '${key}' (string)`);
  }
  return value.trim();
}

function parseConfigUpdate(body: unknown): ConfigUpdate {
  if (!isObject(body)) throw new HttpError(400, "Request body must be a JSON object");
  const update: ConfigUpdate = {};
  for (const key of EDITABLE_FIELDS) {
    const value = field(body, key);
    if (value === undefined) continue;
    switch (key) {
      case "apiKey":
      case "adminKey":
        if (typeof value !== "string") throw new HttpError(400, `Invalid value for '${key}'`);
        update[key] = value.trim();
        break;
      case "autoRefreshTokens":
        if (typeof value !== "boolean") throw new HttpError(400, `Invalid value for '${key}'`);
        update.autoRefreshTokens = value;
        break;
      case "refreshCheckInterval":
        if (typeof value !== "number" || !Number.isInteger(value)) {
          throw new HttpError(400, `Invalid value for '${key}'`);
        }
        update.refreshCheckInterval = clampInt(value, 60, 86_400, 1800);
        break;
    }
  }
  if (Object.keys(update).length === 0) {
    throw new HttpError(400, `Provide at least one of: ${EDITABLE_FIELDS.join(", ")}`);
  }
  return update;
}

function redact(value: string): string {
  return value ? "********" : "";
}

export function createAdminRouter(deps: AdminRouterDeps): Router {
  const { pool, store, config, recovery } = deps;
  const router = Router();

  router.get("/api/credentials", (_req: Request, res: Response) => {
    const { entries, failedEntries } = pool.listState();
    res.json({
      entries,
      count: entries.length,
      failedCount: failedEntries.length,
      failedEntries,
      details: pool.describe(),
    });
  });

  router.post(
    "/api/credentials",
    handle(async (req, res) => {
      const body: unknown = req.body;
      const entries = sanitizeEntries(isObject(body) ? field(body, "credentials") : undefined);
      if (entries === null) {
        throw new HttpError(400, "Provide 'credentials' array of strings");
      }
      if (entries.length === 0) {
        throw new HttpError(400, "At least one non-empty credential is required");
      }
      const count = await pool.replaceAll(entries);
      console.log(`[admin] replaced pool with ${count} entries`);
      res.json({ message: `Updated ${count} credentials`, count, entries: pool.listState().entries });
    }),
  );

  router.delete(
    "/api/credentials",
    handle(async (_req, res) => {
      await pool.clearAll();
      console.log("[admin] cleared pool");
      res.json({ message: "All credentials cleared" });
    }),
  );

  router.post(
    "/api/credentials/test",
    handle(async (req, res) => {
      const credential = bodyString(req, "credential");
      const isValid = await pool.healthCheck(credential);
      res.json({
        credential: truncateSecret(credential),
        isValid,
        message: isValid ? "Credential is valid" : "Credential is invalid",
      });
    }),
  );

  router.post(
    "/api/credentials/refresh",
    handle(async (req, res) => {
      const credential = bodyString(req, "credential");
      const result = await pool.refreshSingle(credential);
      res.status(result.success ? 200 : 422).json(result);
    }),
  );

  router.post(
    "/api/credentials/refresh-all",
    handle(async (req, res) => {
      const body: unknown = req.body;
      const requested = isObject(body) ? field(body, "maxConcurrent") : undefined;
      const maxConcurrent = clampInt(
        typeof requested === "number" || typeof requested === "string" ? requested : undefined,
        1,
        100,
        config.batchRefreshConcurrency,
      );
      const result = await pool.batchRefresh(maxConcurrent);
      res.json({
        message: `Batch refresh done: ${result.refreshedCount} refreshed, ${result.failedCount} failed`,
        ...result,
      });
    }),
  );

  router.post(
    "/api/credentials/recover",
    handle(async (_req, res) => {
      const report = await pool.recoverFailed();
      res.json(report);
    }),
  );

  router.get("/api/config", (_req: Request, res: Response) => {
    res.json({
      port: config.port,
      host: config.host,
      nodeEnv: config.nodeEnv,
      apiKey: redact(config.apiKey),
      adminKey: redact(config.adminKey),
      envFile: config.envFile,
      upstream: config.upstream,
      recovery: config.recovery,
      recoveryRunning: recovery?.isRunning ?? false,
      batchRefreshConcurrency: config.batchRefreshConcurrency,
      maxUpstreamAttempts: config.maxUpstreamAttempts,
    });
  });

  router.put(
    "/api/config",
    handle(async (req, res) => {
      const update = parseConfigUpdate(req.body);
      const updatedFields = EDITABLE_FIELDS.filter((key) => update[key] !== undefined);

      if (update.apiKey !== undefined) config.apiKey = update.apiKey;
      if (update.adminKey !== undefined) config.adminKey = update.adminKey;
      if (update.autoRefreshTokens !== undefined) config.recovery.enabled = update.autoRefreshTokens;
      if (update.refreshCheckInterval !== undefined) {
        config.recovery.intervalMs = update.refreshCheckInterval * 1000;
      }

      if (recovery && (update.autoRefreshTokens !== undefined || update.refreshCheckInterval !== undefined)) {
        await recovery.stop();
        recovery.updateOptions({ intervalMs: config.recovery.intervalMs });
        if (config.recovery.enabled) recovery.start();
      }

      const persistedFields: string[] = [];
      if (store) {
        for (const key of updatedFields) {
          try {
            await store.setValue(EDITABLE[key], String(update[key]));
            persistedFields.push(key);
          } catch (err) {
            console.warn(`[admin] could not write ${EDITABLE[key]}: ${safeErrorMessage(err, "write failed")}`);
          }
        }
      }

      console.log(`[admin] updated config: ${updatedFields.join(", ")}`);
      res.json({ message: `Updated configuration: ${updatedFields.join(", ")}`, updatedFields, persistedFields });
    }),
  );

  router.post(
    "/api/config/reload",
    handle(async (_req, res) => {
      if (!store) {
        throw new HttpError(409, "No config store configured");
      }
      const value = await store.getValue(CREDENTIALS_ENV_KEY);
      if (value === undefined) {
        throw new HttpError(404, `${CREDENTIALS_ENV_KEY} not found in config store`);
      }
      const count = await pool.replaceAll(csvEntries(value));
      console.log(`[admin] reloaded ${count} entries from config store`);
      res.json({ message: "Configuration reloaded", count });
    }),
  );

  return router;
}
