/**
 * Pool entry encoding.
 *
 * An entry is stored as a single string (it has to survive a round trip through a
 * comma-separated env var) and decoded once, when it enters the pool:
 *
 *   token                           -> bare
 *   email----password               -> pending (can sign in, no token yet)
 *   email----password----token      -> composite
 *   anything else with a separator  -> malformed
 */

export const ENTRY_SEPARATOR = "----";

export interface BareEntry {
  kind: "bare";
  raw: string;
  token: string;
}

export interface CompositeEntry {
  kind: "composite";
  raw: string;
  email: string;
  password: string;
  token: string;
}

export interface PendingEntry {
  kind: "pending";
  raw: string;
  email: string;
  password: string;
}

export interface MalformedEntry {
  kind: "malformed";
  raw: string;
  reason: string;
}

export type CredentialEntry = BareEntry | CompositeEntry | PendingEntry | MalformedEntry;

/** Entries that can be re-authenticated. */
export type RefreshableEntry = CompositeEntry | PendingEntry;

/** What the credential index stores for every known representation of an entry. */
export interface CredentialRecord {
  email: string;
  password: string;
  hasCredentials: boolean;
  rawComposite: string | null;
  token: string | null;
}

export function decodeEntry(raw: string): CredentialEntry {
  if (!raw.includes(ENTRY_SEPARATOR)) {
    return { kind: "bare", raw, token: raw };
  }

  const parts = raw.split(ENTRY_SEPARATOR);
  if (parts.some((p) => p.length === 0)) {
    return { kind: "malformed", raw, reason: "empty segment" };
  }
  if (parts.length === 2) {
    const [email, password] = parts;
    return { kind: "pending", raw, email, password };
  }
  if (parts.length === 3) {
    const [email, password, token] = parts;
    return { kind: "composite", raw, email, password, token };
  }
  return { kind: "malformed", raw, reason: `expected 1-3 segments, got ${parts.length}` };
}

export function encodeComposite(email: string, password: string, token: string): string {
  return [email, password, token].join(ENTRY_SEPARATOR);
}

export function compositeEntry(email: string, password: string, token: string): CompositeEntry {
  return { kind: "composite", raw: encodeComposite(email, password, token), email, password, token };
}

/** The string sent upstream as the bearer token, if the entry has one. */
export function effectiveToken(entry: CredentialEntry): string | null {
  switch (entry.kind) {
    case "bare":
    case "composite":
      return entry.token;
    case "pending":
    case "malformed":
      return null;
  }
}

export function isRefreshable(entry: CredentialEntry): entry is RefreshableEntry {
  return entry.kind === "composite" || entry.kind === "pending";
}

export function toRecord(entry: CredentialEntry): CredentialRecord {
  switch (entry.kind) {
    case "bare":
      return { email: "", password: "", hasCredentials: false, rawComposite: null, token: entry.token };
    case "composite":
      return { email: entry.email, password: entry.password, hasCredentials: true, rawComposite: entry.raw, token: entry.token };
    case "pending":
      return { email: entry.email, password: entry.password, hasCredentials: true, rawComposite: entry.raw, token: null };
    case "malformed":
      return { email: "", password: "", hasCredentials: false, rawComposite: null, token: null };
  }
}

/** Every string an entry can be looked up by: its raw form and, when different, its token. */
export function aliasesOf(entry: CredentialEntry): string[] {
  const token = effectiveToken(entry);
  if (token === null || token === entry.raw) return [entry.raw];
  return [entry.raw, token];
}
