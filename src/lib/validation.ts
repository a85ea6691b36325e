// --- Numeric input ---

export function clampInt(val: string | number | undefined, min: number, max: number, fallback: number): number {
  if (val === undefined || val === "") return fallback;
  const n = typeof val === "number" ? Math.trunc(val) : parseInt(val, 10);
  if (isNaN(n)) return fallback;
  return Math.max(min, Math.min(max, n));
}

// --- Credential lists ---

/**
 * Normalize a credential list coming from a request body.
 * Returns null when the input is not an array of strings.
 */
export function sanitizeEntries(input: unknown): string[] | null {
  if (!Array.isArray(input)) return null;
  const out: string[] = [];
  for (const item of input) {
    if (typeof item !== "string") return null;
    const trimmed = item.trim();
    if (trimmed) out.push(trimmed);
  }
  return out;
}

// --- Safe error messages ---

export function safeErrorMessage(err: unknown, fallback: string): string {
  if (err instanceof Error) {
    const msg = err.message;
    if (msg.includes("://") && msg.includes("@")) return fallback;
    if (msg.startsWith("/") || msg.includes("\\")) return fallback;
    if (msg.length > 200) return fallback;
    return msg;
  }
  return fallback;
}

// --- Log truncation ---

const SECRET_PREFIX = 8;

/** Truncate a token or pool entry for logging: first 8 chars only. */
export function truncateSecret(secret: string): string {
  if (!secret) return "(empty)";
  if (secret.length <= SECRET_PREFIX) return `${secret.slice(0, 2)}...`;
  return `${secret.slice(0, SECRET_PREFIX)}...`;
}

// --- Untyped request bodies ---

export function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Read a property off a parsed JSON body without asserting its shape. */
export function field(obj: object, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(obj, key) ? Reflect.get(obj, key) : undefined;
}
