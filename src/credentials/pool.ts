/**
 * Credential pool.
 *
 * Hands out upstream tokens round-robin, skipping entries currently marked failed,
 * and repairs itself: failed entries are re-probed, re-authenticated when they carry
 * an email and password, and evicted when that does not bring them back.
 *
 * Usage:
 *   const pool = new CredentialPool(["tok1", "a@b.c----pw----tok2"], { upstream });
 *   const token = await pool.acquire();
 *   // ...call upstream...
 *   await pool.markFailed(token); // or markSuccess(token)
 *
 * Every read-modify-write of pool state runs under one mutex. Network calls
 * (probe, sign-in) never do.
 */

import type { ConfigStore } from "../lib/env-store.js";
import type { Upstream } from "../providers/upstream.js";
import { Mutex, Semaphore } from "../lib/concurrency.js";
import { safeErrorMessage, truncateSecret } from "../lib/validation.js";
import {
  ENTRY_SEPARATOR,
  aliasesOf,
  compositeEntry,
  decodeEntry,
  effectiveToken,
  isRefreshable,
  toRecord,
  type CompositeEntry,
  type CredentialEntry,
  type CredentialRecord,
} from "./entry.js";

export interface PoolOptions {
  upstream: Upstream;
  /** Where the entry list is mirrored after every mutation. Optional. */
  store?: ConfigStore;
  storeKey?: string;
  healthCheckTimeoutMs?: number;
  refreshTimeoutMs?: number;
  batchConcurrency?: number;
}

export interface RefreshResult {
  success: boolean;
  message: string;
  /** The new composite entry, on success. */
  entry?: string;
}

export interface BatchRefreshResult {
  refreshedCount: number;
  failedCount: number;
  totalCount: number;
  updatedEntries: string[];
}

export interface RecoveryReport {
  checked: number;
  recovered: number;
  refreshed: number;
  evicted: number;
}

export interface PoolState {
  entries: string[];
  failedEntries: string[];
}

export interface EntryView {
  index: number;
  kind: CredentialEntry["kind"];
  email: string | null;
  token: string | null;
  failed: boolean;
}

interface BatchTarget {
  position: number;
  entry: CredentialEntry;
  email: string;
  password: string;
}

interface Replacement {
  position: number;
  previous: CredentialEntry;
  next: CompositeEntry;
}

const DEFAULT_STORE_KEY = "UPSTREAM_CREDENTIALS";

/** Loggable name for an entry: the account email, or a token prefix. */
function label(entry: CredentialEntry): string {
  if (entry.kind === "composite" || entry.kind === "pending") return entry.email;
  return truncateSecret(entry.raw);
}

function extractToken(body: unknown): string | null {
  if (typeof body !== "object" || body === null || !("token" in body)) return null;
  const token = body.token;
  if (typeof token !== "string" || token.length === 0) return null;
  // A token containing either separator could not be stored back as one entry
  if (token.includes(ENTRY_SEPARATOR) || token.includes(",")) return null;
  return token;
}

export class CredentialPool {
  private entries: CredentialEntry[] = [];
  private readonly index = new Map<string, CredentialRecord>();
  private positions = new Map<string, number>();
  private readonly failed = new Set<string>();
  private cursor = 0;
  /** Bumped on every change to entry order or membership. */
  private version = 0;
  private readonly mutex = new Mutex();

  private readonly upstream: Upstream;
  private readonly store?: ConfigStore;
  private readonly storeKey: string;
  private readonly healthCheckTimeoutMs: number;
  private readonly refreshTimeoutMs: number;
  private readonly batchConcurrency: number;

  constructor(entries: string[], options: PoolOptions) {
    this.upstream = options.upstream;
    this.store = options.store;
    this.storeKey = options.storeKey ?? DEFAULT_STORE_KEY;
    this.healthCheckTimeoutMs = options.healthCheckTimeoutMs ?? 10_000;
    this.refreshTimeoutMs = options.refreshTimeoutMs ?? 30_000;
    this.batchConcurrency = options.batchConcurrency ?? 20;

    this.load(entries);
    if (this.entries.length > 0) {
      console.log(`[pool] initialized with ${this.entries.length} entries`);
    } else {
      console.warn("[pool] initialized with no entries");
    }
  }

  get size(): number {
    return this.entries.length;
  }

  get failedCount(): number {
    return this.failed.size;
  }

  // --- Rotation ---

  /**
   * Next usable token, round-robin. When every entry is marked failed the failed
   * set is treated as stale: it is cleared and the first entry that has a token,
   * counting from position 0, is returned.
   */
  async acquire(): Promise<string | null> {
    if (this.entries.length === 0) return null;

    return this.mutex.runExclusive(() => {
      const total = this.entries.length;
      if (total === 0) return null;

      for (let attempts = 0; attempts < total; attempts++) {
        const entry = this.entries[this.cursor];
        this.cursor = (this.cursor + 1) % total;

        if (this.failed.has(entry.raw)) continue;

        const token = effectiveToken(entry);
        if (token === null) {
          console.warn(`[pool] skipping ${entry.kind} entry ${label(entry)}: no usable token`);
          continue;
        }
        return token;
      }

      if (this.failed.size > 0) {
        console.warn(`[pool] all ${total} entries failed, resetting failed set`);
        this.failed.clear();
        // Entry 0 may be pending or malformed; take the first one that has a token
        for (const entry of this.entries) {
          const token = effectiveToken(entry);
          if (token !== null) return token;
        }
      }

      return null;
    });
  }

  // --- Feedback ---

  async markFailed(token: string): Promise<void> {
    await this.mutex.runExclusive(() => {
      const entry = this.resolve(token);
      if (!entry) {
        console.warn(`[pool] markFailed: ${truncateSecret(token)} is not in the pool`);
        return;
      }
      if (this.failed.has(entry.raw)) return;
      this.failed.add(entry.raw);
      console.warn(`[pool] marked failed: ${label(entry)} (${this.failed.size}/${this.entries.length} failed)`);
    });
  }

  async markSuccess(token: string): Promise<void> {
    await this.mutex.runExclusive(() => {
      const entry = this.resolve(token);
      if (!entry) {
        console.debug(`[pool] markSuccess: ${truncateSecret(token)} is not in the pool`);
        return;
      }
      if (this.failed.delete(entry.raw)) {
        console.log(`[pool] recovered: ${label(entry)}`);
      }
    });
  }

  // --- Upstream checks ---

  /** Probe the upstream with this entry's token. Never throws; any failure is `false`. */
  async healthCheck(entryOrToken: string): Promise<boolean> {
    const token = this.tokenFor(entryOrToken);
    if (!token) {
      console.debug(`[pool] health check skipped for ${truncateSecret(entryOrToken)}: no token`);
      return false;
    }

    try {
      const status = await this.upstream.probe(token, AbortSignal.timeout(this.healthCheckTimeoutMs));
      if (status !== 200) {
        console.debug(`[pool] health check failed for ${truncateSecret(token)}: HTTP ${status}`);
        return false;
      }
      console.debug(`[pool] health check passed for ${truncateSecret(token)}`);
      return true;
    } catch (err) {
      console.debug(`[pool] health check failed for ${truncateSecret(token)}: ${safeErrorMessage(err, "request failed")}`);
      return false;
    }
  }

  /** Sign in again and return the fresh token, or null. No pool side effects. */
  async refresh(email: string, password: string): Promise<string | null> {
    try {
      const { status, body } = await this.upstream.signIn(email, password, AbortSignal.timeout(this.refreshTimeoutMs));
      if (status !== 200) {
        console.error(`[pool] failed to refresh token for ${email}: HTTP ${status}`);
        return null;
      }
      const token = extractToken(body);
      if (!token) {
        console.error(`[pool] no usable token in sign-in response for ${email}`);
        return null;
      }
      console.log(`[pool] refreshed token for ${email}`);
      return token;
    } catch (err) {
      console.error(`[pool] error refreshing token for ${email}: ${safeErrorMessage(err, "sign-in failed")}`);
      return null;
    }
  }

  // --- Refresh ---

  async refreshSingle(value: string): Promise<RefreshResult> {
    const target = this.resolve(value);
    if (!target) {
      return { success: false, message: "Entry not found in pool" };
    }

    const record = this.index.get(target.raw);
    if (!record || !record.hasCredentials || !record.email || !record.password) {
      return { success: false, message: "No credentials available for this entry" };
    }

    const token = await this.refresh(record.email, record.password);
    if (!token) {
      return { success: false, message: `Failed to refresh token for ${record.email}` };
    }

    const next = compositeEntry(record.email, record.password, token);
    const committed = await this.mutex.runExclusive(() => this.replaceEntry(target.raw, next));
    if (!committed) {
      console.warn(`[pool] ${record.email} left the pool while its token was refreshing`);
      return { success: false, message: "Entry left the pool during refresh" };
    }

    await this.persist();
    return { success: true, message: `Refreshed token for ${record.email}`, entry: next.raw };
  }

  /**
   * Re-authenticate every entry that has an email and password, with at most
   * `maxConcurrent` sign-ins in flight. Results are merged into a snapshot of the
   * pool taken before the first sign-in and committed in one step.
   */
  async batchRefresh(maxConcurrent: number = this.batchConcurrency): Promise<BatchRefreshResult> {
    const { snapshot, version } = await this.mutex.runExclusive(() => ({
      snapshot: [...this.entries],
      version: this.version,
    }));

    const targets: BatchTarget[] = [];
    snapshot.forEach((entry, position) => {
      if (!isRefreshable(entry)) return;
      const record = this.index.get(entry.raw);
      // The decoded entry is authoritative when the index has nothing better
      const email = record?.email || entry.email;
      const password = record?.password || entry.password;
      if (email && password) targets.push({ position, entry, email, password });
    });

    if (targets.length === 0) {
      return { refreshedCount: 0, failedCount: 0, totalCount: 0, updatedEntries: [] };
    }

    console.log(`[pool] starting batch refresh for ${targets.length} entries (max ${maxConcurrent} concurrent)`);

    const gate = new Semaphore(maxConcurrent);
    const results = await Promise.allSettled(
      targets.map((target) =>
        gate.use(async () => ({ target, token: await this.refresh(target.email, target.password) })),
      ),
    );

    const merged = [...snapshot];
    const replacements: Replacement[] = [];
    let failedCount = 0;

    results.forEach((result, i) => {
      if (result.status === "rejected") {
        console.error(`[pool] refresh task for ${targets[i].email} failed: ${safeErrorMessage(result.reason, "unknown error")}`);
        failedCount++;
        return;
      }
      const { target, token } = result.value;
      if (!token) {
        failedCount++;
        return;
      }
      const next = compositeEntry(target.email, target.password, token);
      merged[target.position] = next;
      replacements.push({ position: target.position, previous: target.entry, next });
    });

    const applied = await this.mutex.runExclusive(() => this.commitBatch(version, merged, replacements));
    failedCount += replacements.length - applied.length;

    if (applied.length > 0) await this.persist();

    console.log(`[pool] batch refresh done: ${applied.length} refreshed, ${failedCount} failed`);
    return {
      refreshedCount: applied.length,
      failedCount,
      totalCount: targets.length,
      updatedEntries: applied.map((e) => e.raw),
    };
  }

  // --- Recovery ---

  /**
   * One recovery cycle over the entries failed at the time of the call.
   * Recovered entries go back into rotation; entries that cannot be refreshed,
   * or still fail after a successful refresh, are evicted together at the end.
   * An aborted `signal` ends the cycle before the next network call.
   */
  async recoverFailed(signal?: AbortSignal): Promise<RecoveryReport> {
    const report: RecoveryReport = { checked: 0, recovered: 0, refreshed: 0, evicted: 0 };
    const suspects = [...this.failed];
    if (suspects.length === 0) return report;

    console.log(`[recovery] checking ${suspects.length} failed entries`);
    const doomed: string[] = [];

    for (const raw of suspects) {
      if (signal?.aborted) {
        console.log(`[recovery] cycle cancelled after ${report.checked} of ${suspects.length} entries`);
        break;
      }
      const entry = this.resolve(raw);
      // Removed, replaced or recovered since the snapshot
      if (!entry || !this.failed.has(raw)) continue;
      report.checked++;

      if (await this.healthCheck(raw)) {
        await this.markSuccess(raw);
        report.recovered++;
        continue;
      }

      if (!isRefreshable(entry)) {
        console.warn(`[recovery] ${label(entry)} has no credentials to refresh, evicting`);
        doomed.push(raw);
        continue;
      }

      if (signal?.aborted) continue;
      const result = await this.refreshSingle(raw);
      if (!result.success || !result.entry) {
        console.warn(`[recovery] ${label(entry)} still failed: ${result.message}`);
        continue;
      }
      report.refreshed++;
      if (signal?.aborted) continue;

      if (await this.healthCheck(result.entry)) {
        console.log(`[recovery] ${label(entry)} recovered after refresh`);
        report.recovered++;
      } else {
        console.warn(`[recovery] ${label(entry)} still unhealthy after refresh, evicting`);
        doomed.push(result.entry);
      }
    }

    if (doomed.length > 0) {
      report.evicted = await this.mutex.runExclusive(() => this.evict(doomed));
      if (report.evicted > 0) await this.persist();
    }

    console.log(
      `[recovery] cycle done: checked=${report.checked} recovered=${report.recovered} refreshed=${report.refreshed} evicted=${report.evicted}`,
    );
    return report;
  }

  // --- Administration ---

  async replaceAll(entries: string[]): Promise<number> {
    const count = await this.mutex.runExclusive(() => {
      this.load(entries);
      return this.entries.length;
    });
    console.log(`[pool] replaced entries: ${count} loaded`);
    await this.persist();
    return count;
  }

  async clearAll(): Promise<void> {
    await this.mutex.runExclusive(() => this.load([]));
    console.log("[pool] cleared all entries");
    await this.persist();
  }

  /** Copies of the current lists. Read without the lock. */
  listState(): PoolState {
    return {
      entries: this.entries.map((e) => e.raw),
      failedEntries: [...this.failed],
    };
  }

  /** Redacted per-entry view: no passwords, tokens truncated. */
  describe(): EntryView[] {
    return this.entries.map((entry, index) => {
      const token = effectiveToken(entry);
      return {
        index,
        kind: entry.kind,
        email: entry.kind === "composite" || entry.kind === "pending" ? entry.email : null,
        token: token === null ? null : truncateSecret(token),
        failed: this.failed.has(entry.raw),
      };
    });
  }

  /** Index record for any known representation of an entry. */
  lookup(value: string): CredentialRecord | undefined {
    return this.index.get(value);
  }

  // --- Internals (callers hold the lock, or run before the pool is shared) ---

  private resolve(value: string): CredentialEntry | undefined {
    const position = this.positions.get(value);
    return position === undefined ? undefined : this.entries[position];
  }

  private tokenFor(value: string): string | null {
    const record = this.index.get(value);
    if (record) return record.token;
    return effectiveToken(decodeEntry(value));
  }

  private load(raws: string[]): void {
    this.entries = raws.map((r) => r.trim()).filter(Boolean).map(decodeEntry);
    this.index.clear();
    for (const entry of this.entries) {
      this.indexEntry(entry);
      if (entry.kind === "malformed") {
        console.warn(`[pool] malformed entry ${truncateSecret(entry.raw)}: ${entry.reason}`);
      }
    }
    this.failed.clear();
    this.cursor = 0;
    this.reindex();
    this.version++;
  }

  private indexEntry(entry: CredentialEntry): void {
    const record = toRecord(entry);
    for (const alias of aliasesOf(entry)) {
      this.index.set(alias, record);
    }
  }

  /** Rebuild the alias -> first position map. */
  private reindex(): void {
    const positions = new Map<string, number>();
    this.entries.forEach((entry, i) => {
      for (const alias of aliasesOf(entry)) {
        if (!positions.has(alias)) positions.set(alias, i);
      }
    });
    this.positions = positions;
  }

  /** Drop index records no pool entry answers to any more. */
  private pruneAliases(aliases: string[]): void {
    for (const alias of aliases) {
      if (!this.positions.has(alias)) this.index.delete(alias);
    }
  }

  private keepCursorInRange(): void {
    if (this.entries.length === 0) {
      this.cursor = 0;
    } else {
      this.cursor %= this.entries.length;
    }
  }

  private swap(position: number, next: CompositeEntry): CredentialEntry {
    const previous = this.entries[position];
    this.entries[position] = next;
    this.failed.delete(previous.raw);
    this.indexEntry(next);
    return previous;
  }

  private replaceEntry(oldRaw: string, next: CompositeEntry): boolean {
    const position = this.positions.get(oldRaw);
    if (position === undefined) return false;
    const previous = this.swap(position, next);
    this.reindex();
    this.pruneAliases(aliasesOf(previous));
    this.version++;
    return true;
  }

  private commitBatch(version: number, merged: CredentialEntry[], replacements: Replacement[]): CompositeEntry[] {
    if (replacements.length === 0) return [];

    if (this.version === version) {
      this.entries = merged;
      for (const { previous, next } of replacements) {
        this.failed.delete(previous.raw);
        this.indexEntry(next);
      }
      this.reindex();
      this.pruneAliases(replacements.flatMap((r) => aliasesOf(r.previous)));
      this.version++;
      return replacements.map((r) => r.next);
    }

    // The pool changed while sign-ins were in flight: apply each result to
    // wherever its entry sits now
    console.warn("[pool] pool changed during batch refresh, applying results by entry");
    const applied: CompositeEntry[] = [];
    for (const { previous, next } of replacements) {
      if (this.replaceEntry(previous.raw, next)) {
        applied.push(next);
      } else {
        console.warn(`[pool] ${label(previous)} left the pool during batch refresh`);
      }
    }
    return applied;
  }

  private evict(raws: string[]): number {
    let removed = 0;
    for (const raw of raws) {
      const position = this.positions.get(raw);
      if (position === undefined) continue;

      const [gone] = this.entries.splice(position, 1);
      if (position < this.cursor) this.cursor--;
      this.failed.delete(gone.raw);
      this.reindex();
      this.pruneAliases(aliasesOf(gone));
      removed++;
      console.warn(`[pool] evicted ${label(gone)}`);
    }

    if (removed > 0) {
      this.keepCursorInRange();
      this.version++;
    }
    return removed;
  }

  private async persist(): Promise<void> {
    if (!this.store) return;
    const value = this.entries.map((e) => e.raw).join(",");
    try {
      await this.store.setValue(this.storeKey, value);
    } catch (err) {
      console.error(`[pool] could not persist entries: ${safeErrorMessage(err, "write failed")}`);
    }
  }
}
