import { Router, type Request, type Response, type NextFunction } from "express";
import type { CredentialPool } from "../credentials/pool.js";
import type { ChatMessage, ChatRequest, Upstream } from "../providers/upstream.js";
import { field, isObject, safeErrorMessage } from "../lib/validation.js";

export interface ChatRouterDeps {
  pool: CredentialPool;
  upstream: Upstream;
  modelName: string;
  maxAttempts: number;
  upstreamTimeoutMs?: number;
}

// Statuses that say the credential itself is the problem
const CREDENTIAL_FAILURES = new Set([401, 403, 429]);

const MAX_MESSAGES = 100;
const MAX_CONTENT_LENGTH = 100_000;

type Validated = { ok: true; request: ChatRequest } | { ok: false; error: string };

export function validateChatRequest(body: unknown): Validated {
  if (!isObject(body)) {
    return { ok: false, error: "Request body must be a JSON object" };
  }
  const messages = field(body, "messages");
  const stream = field(body, "stream");
  const temperature = field(body, "temperature");
  const maxTokens = field(body, "max_tokens");
  const model = field(body, "model");

  if (!Array.isArray(messages) || messages.length === 0) {
    return { ok: false, error: "Provide 'messages' array with at least one message" };
  }
  if (messages.length > MAX_MESSAGES) {
    return { ok: false, error: `Maximum ${MAX_MESSAGES} messages per request` };
  }

  const parsed: ChatMessage[] = [];
  for (const msg of messages) {
    if (!isObject(msg)) {
      return { ok: false, error: "Each message must have 'role' and 'content' (string)" };
    }
    const role = field(msg, "role");
    const content = field(msg, "content");
    if (typeof role !== "string" || !role || typeof content !== "string" || !content) {
      return { ok: false, error: "Each message must have 'role' and 'content' (string)" };
    }
    if (content.length > MAX_CONTENT_LENGTH) {
      return { ok: false, error: "Message content exceeds 100k character limit" };
    }
    parsed.push({ role, content });
  }

  if (stream !== undefined && typeof stream !== "boolean") {
    return { ok: false, error: "'stream' must be a boolean" };
  }

  return {
    ok: true,
    request: {
      messages: parsed,
      stream: stream ?? false,
      ...(typeof model === "string" ? { model } : {}),
      ...(typeof temperature === "number" ? { temperature } : {}),
      ...(typeof maxTokens === "number" ? { max_tokens: maxTokens } : {}),
    },
  };
}

/** Resolves once `res` can take more data, or the client has gone. */
function drained(res: Response): Promise<void> {
  return new Promise((resolve) => {
    if (res.destroyed) {
      resolve();
      return;
    }
    const done = () => {
      res.off("drain", done);
      res.off("close", done);
      resolve();
    };
    res.on("drain", done);
    res.on("close", done);
  });
}

/** Copy the upstream response to the client unchanged. */
async function relay(upstreamRes: globalThis.Response, res: Response): Promise<void> {
  res.status(upstreamRes.status);
  const contentType = upstreamRes.headers.get("content-type");
  if (contentType) res.setHeader("Content-Type", contentType);
  if (contentType?.includes("text/event-stream")) {
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
  }

  if (!upstreamRes.body) {
    res.end();
    return;
  }

  const reader = upstreamRes.body.getReader();
  res.on("close", () => {
    reader.cancel().catch((err: unknown) => {
      console.debug(`[chat] cancel after client disconnect: ${safeErrorMessage(err, "cancel failed")}`);
    });
  });

  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    if (!res.write(value)) await drained(res);
  }
  res.end();
}

export function createChatRouter(deps: ChatRouterDeps): Router {
  const { pool, upstream, modelName, maxAttempts } = deps;
  const upstreamTimeoutMs = deps.upstreamTimeoutMs ?? 170_000;
  const router = Router();

  router.get("/v1/models", (_req: Request, res: Response) => {
    res.json({
      object: "list",
      data: [{ id: modelName, object: "model", created: 0, owned_by: "upstream" }],
    });
  });

  async function complete(req: Request, res: Response): Promise<void> {
    const validated = validateChatRequest(req.body);
    if (!validated.ok) {
      res.status(400).json({ error: validated.error });
      return;
    }
    const { request } = validated;

    let upstreamStatus = 0;
    const attempts = Math.max(1, Math.min(maxAttempts, pool.size || 1));

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const token = await pool.acquire();
      if (!token) {
        res.setHeader("Retry-After", "30");
        res.status(503).json({ error: "No upstream credentials available", retryable: true });
        return;
      }

      let upstreamRes: globalThis.Response;
      try {
        upstreamRes = await upstream.chatCompletion(token, request, AbortSignal.timeout(upstreamTimeoutMs));
      } catch (err) {
        console.error(`[chat] attempt ${attempt}/${attempts} upstream error: ${safeErrorMessage(err, "request failed")}`);
        continue;
      }

      upstreamStatus = upstreamRes.status;
      if (CREDENTIAL_FAILURES.has(upstreamStatus)) {
        await upstreamRes.body?.cancel();
        console.warn(`[chat] attempt ${attempt}/${attempts} rejected credential: HTTP ${upstreamStatus}`);
        await pool.markFailed(token);
        continue;
      }

      if (!upstreamRes.ok) {
        await upstreamRes.body?.cancel();
        console.error(`[chat] upstream error: status=${upstreamStatus}`);
        res.setHeader("Retry-After", "5");
        res.status(503).json({ error: "Upstream temporarily unavailable", retryable: true, upstreamStatus });
        return;
      }

      await pool.markSuccess(token);
      try {
        await relay(upstreamRes, res);
      } catch (err) {
        console.error(`[chat] relay interrupted: ${safeErrorMessage(err, "stream error")}`);
        if (!res.headersSent) {
          res.status(502).json({ error: "Upstream stream interrupted" });
        } else {
          res.end();
        }
      }
      return;
    }

    res.setHeader("Retry-After", "5");
    res.status(503).json({ error: "Upstream temporarily unavailable", retryable: true, upstreamStatus });
  }

  router.post("/v1/chat/completions", (req: Request, res: Response, next: NextFunction) => {
    complete(req, res).catch(next);
  });

  return router;
}
