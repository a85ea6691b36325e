import { describe, test, expect, beforeEach, vi } from "vitest";
import { CredentialPool } from "../src/credentials/pool.js";
import { FakeUpstream, MemoryStore } from "./fakes.js";

let upstream: FakeUpstream;
let store: MemoryStore;

function makePool(entries: string[]): CredentialPool {
  return new CredentialPool(entries, { upstream, store, storeKey: "UPSTREAM_CREDENTIALS" });
}

async function acquireN(pool: CredentialPool, n: number): Promise<Array<string | null>> {
  const out: Array<string | null> = [];
  for (let i = 0; i < n; i++) out.push(await pool.acquire());
  return out;
}

beforeEach(() => {
  upstream = new FakeUpstream();
  store = new MemoryStore();
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
  vi.spyOn(console, "debug").mockImplementation(() => {});
});

// --- Rotation ---

describe("acquire", () => {
  test("returns null for an empty pool", async () => {
    expect(await makePool([]).acquire()).toBeNull();
  });

  test("visits every entry once per lap, in pool order", async () => {
    const pool = makePool(["a", "b", "c"]);
    expect(await acquireN(pool, 3)).toEqual(["a", "b", "c"]);
    // Cursor is back at the start
    expect(await pool.acquire()).toBe("a");
  });

  test("returns the derived token of composite entries", async () => {
    const pool = makePool(["u@e.com----pw----tokB"]);
    expect(await pool.acquire()).toBe("tokB");
  });

  test("skips failed entries until they are marked successful", async () => {
    const pool = makePool(["a", "b", "c"]);
    await pool.markFailed("b");

    expect(await acquireN(pool, 3)).toEqual(["a", "c", "a"]);

    await pool.markSuccess("b");
    expect(await pool.acquire()).toBe("b");
  });

  test("bare and composite scenario: failed set resets when every entry is failed", async () => {
    const pool = makePool(["tokA", "u@e.com----pw----tokB"]);

    await pool.markFailed("tokA");
    expect(await pool.acquire()).toBe("tokB");

    await pool.markFailed("tokB");
    expect(await pool.acquire()).toBe("tokA");
    expect(pool.listState().failedEntries).toEqual([]);

    // Failures can be recorded again after the reset
    await pool.markFailed("tokA");
    expect(pool.listState().failedEntries).toEqual(["tokA"]);
  });

  test("exhaustion returns entry 0 regardless of cursor", async () => {
    const pool = makePool(["a", "b", "c"]);
    await pool.acquire(); // cursor -> 1
    for (const t of ["a", "b", "c"]) await pool.markFailed(t);

    expect(await pool.acquire()).toBe("a");
  });

  test("exhaustion falls through a tokenless entry 0 to the first token", async () => {
    const pool = makePool(["p@e.com----pw", "tokA"]);
    await pool.markFailed("tokA");

    expect(await pool.acquire()).toBe("tokA");
    expect(pool.listState().failedEntries).toEqual([]);
  });

  test("skips entries without a token", async () => {
    const pool = makePool(["a@b.c----pw", "tok1", "x----y----z----w"]);
    expect(await acquireN(pool, 2)).toEqual(["tok1", "tok1"]);
  });

  test("returns null when no entry has a token and none are failed", async () => {
    const pool = makePool(["a@b.c----pw"]);
    expect(await pool.acquire()).toBeNull();
  });

  test("concurrent callers each get a distinct entry within one lap", async () => {
    const pool = makePool(["a", "b", "c", "d"]);
    const tokens = await Promise.all([pool.acquire(), pool.acquire(), pool.acquire(), pool.acquire()]);
    expect([...tokens].sort()).toEqual(["a", "b", "c", "d"]);
  });
});

// --- Feedback ---

describe("markFailed / markSuccess", () => {
  test("stores the pool entry, not the token", async () => {
    const pool = makePool(["x@y.z----pw----tokX"]);
    await pool.markFailed("tokX");
    expect(pool.listState().failedEntries).toEqual(["x@y.z----pw----tokX"]);
    expect(pool.failedCount).toBe(1);
  });

  test("resolves by the raw entry as well", async () => {
    const pool = makePool(["x@y.z----pw----tokX"]);
    await pool.markFailed("x@y.z----pw----tokX");
    await pool.markSuccess("tokX");
    expect(pool.listState().failedEntries).toEqual([]);
  });

  test("ignores unknown tokens", async () => {
    const pool = makePool(["a"]);
    await pool.markFailed("nope");
    await pool.markSuccess("nope");
    expect(pool.listState().failedEntries).toEqual([]);
  });

  test("marking twice keeps a single failed record", async () => {
    const pool = makePool(["a", "b"]);
    await pool.markFailed("a");
    await pool.markFailed("a");
    expect(pool.listState().failedEntries).toEqual(["a"]);
  });
});

// --- Health probe ---

describe("healthCheck", () => {
  test("is true when the upstream answers 200 for the entry's token", async () => {
    upstream.healthy.add("tokB");
    const pool = makePool(["u@e.com----pw----tokB"]);

    expect(await pool.healthCheck("u@e.com----pw----tokB")).toBe(true);
    expect(upstream.probeCalls).toEqual(["tokB"]);
    expect(upstream.lastSignal).toBeInstanceOf(AbortSignal);
  });

  test("probes strings that are not in the pool", async () => {
    upstream.healthy.add("outside");
    const pool = makePool([]);
    expect(await pool.healthCheck("outside")).toBe(true);
    expect(await pool.healthCheck("v@e.com----pw----outside")).toBe(true);
  });

  test("normalizes non-200 and network errors to false", async () => {
    upstream.probeErrors.add("boom");
    const pool = makePool(["bad", "boom"]);
    expect(await pool.healthCheck("bad")).toBe(false);
    expect(await pool.healthCheck("boom")).toBe(false);
  });

  test("is false without calling upstream when there is no token", async () => {
    const pool = makePool(["a@b.c----pw"]);
    expect(await pool.healthCheck("a@b.c----pw")).toBe(false);
    expect(upstream.probeCalls).toEqual([]);
  });

  test("does not touch pool state", async () => {
    const pool = makePool(["a", "b"]);
    await pool.markFailed("a");
    upstream.healthy.add("a");
    await pool.healthCheck("a");
    expect(pool.listState()).toEqual({ entries: ["a", "b"], failedEntries: ["a"] });
  });
});

// --- Refresh ---

describe("refresh", () => {
  test("returns the token from a successful sign-in", async () => {
    upstream.signIns.set("u@e.com", "fresh");
    expect(await makePool([]).refresh("u@e.com", "pw")).toBe("fresh");
  });

  test("returns null on bad status, missing token, network error or unstorable token", async () => {
    const pool = makePool([]);
    upstream.signIns.set("a@e.com", { status: 500, body: { token: "x" } });
    upstream.signIns.set("b@e.com", { status: 200, body: { user: "b" } });
    upstream.signIns.set("c@e.com", new Error("socket hang up"));
    upstream.signIns.set("d@e.com", "has,comma");

    expect(await pool.refresh("a@e.com", "pw")).toBeNull();
    expect(await pool.refresh("b@e.com", "pw")).toBeNull();
    expect(await pool.refresh("c@e.com", "pw")).toBeNull();
    expect(await pool.refresh("d@e.com", "pw")).toBeNull();
  });
});

describe("refreshSingle", () => {
  test("fails for an entry without credentials and leaves the pool unchanged", async () => {
    const pool = makePool(["a", "u@e.com----pw----tokU"]);
    await pool.markFailed("a");
    const before = pool.listState();

    const result = await pool.refreshSingle("a");

    expect(result).toEqual({ success: false, message: "No credentials available for this entry" });
    expect(pool.listState()).toEqual(before);
    expect(upstream.signInCalls).toEqual([]);
  });

  test("fails for an entry that is not in the pool", async () => {
    const result = await makePool(["a"]).refreshSingle("zzz");
    expect(result).toEqual({ success: false, message: "Entry not found in pool" });
  });

  test("replaces the entry in place and re-indexes it", async () => {
    upstream.signIns.set("u@e.com", "tokNew");
    const pool = makePool(["a", "u@e.com----pw----tokOld", "c"]);

    const result = await pool.refreshSingle("tokOld");

    expect(result).toEqual({
      success: true,
      message: "Refreshed token for u@e.com",
      entry: "u@e.com----pw----tokNew",
    });
    expect(pool.listState().entries).toEqual(["a", "u@e.com----pw----tokNew", "c"]);
    expect(pool.lookup("tokNew")).toEqual({
      email: "u@e.com",
      password: "pw",
      hasCredentials: true,
      rawComposite: "u@e.com----pw----tokNew",
      token: "tokNew",
    });
    expect(pool.lookup("u@e.com----pw----tokNew")?.token).toBe("tokNew");
    expect(pool.lookup("u@e.com----pw----tokOld")).toBeUndefined();
    expect(pool.lookup("tokOld")).toBeUndefined();
  });

  test("clears the failed mark and mirrors the pool to the store", async () => {
    upstream.signIns.set("u@e.com", "tokNew");
    const pool = makePool(["a", "u@e.com----pw----tokOld"]);
    await pool.markFailed("tokOld");

    await pool.refreshSingle("u@e.com----pw----tokOld");

    expect(pool.listState().failedEntries).toEqual([]);
    expect(store.values.get("UPSTREAM_CREDENTIALS")).toBe("a,u@e.com----pw----tokNew");
  });

  test("turns a pending entry into a composite one", async () => {
    upstream.signIns.set("p@e.com", "tokP");
    const pool = makePool(["p@e.com----pw"]);

    const result = await pool.refreshSingle("p@e.com----pw");

    expect(result.success).toBe(true);
    expect(pool.listState().entries).toEqual(["p@e.com----pw----tokP"]);
    expect(await pool.acquire()).toBe("tokP");
  });

  test("leaves the pool unchanged when sign-in fails", async () => {
    const pool = makePool(["u@e.com----pw----tokOld"]);
    const result = await pool.refreshSingle("tokOld");

    expect(result).toEqual({ success: false, message: "Failed to refresh token for u@e.com" });
    expect(pool.listState().entries).toEqual(["u@e.com----pw----tokOld"]);
  });

  test("a failing store does not fail the refresh", async () => {
    upstream.signIns.set("u@e.com", "tokNew");
    store.failWrites = true;
    const pool = makePool(["u@e.com----pw----tokOld"]);

    const result = await pool.refreshSingle("tokOld");

    expect(result.success).toBe(true);
    expect(pool.listState().entries).toEqual(["u@e.com----pw----tokNew"]);
  });

  test("reports failure when the entry is removed while signing in", async () => {
    upstream.signIns.set("u@e.com", "tokNew");
    upstream.signInDelayMs = 20;
    const pool = makePool(["u@e.com----pw----tokOld"]);

    const pending = pool.refreshSingle("tokOld");
    await pool.replaceAll(["other"]);
    const result = await pending;

    expect(result).toEqual({ success: false, message: "Entry left the pool during refresh" });
    expect(pool.listState().entries).toEqual(["other"]);
  });
});

describe("batchRefresh", () => {
  const five = [
    "u1@e.com----pw1----t1",
    "u2@e.com----pw2----t2",
    "u3@e.com----pw3----t3",
    "u4@e.com----pw4----t4",
    "u5@e.com----pw5----t5",
  ];

  test("counts successes and failures and rewrites only refreshed entries", async () => {
    upstream.signIns.set("u1@e.com", "n1");
    upstream.signIns.set("u3@e.com", "n3");
    upstream.signIns.set("u5@e.com", "n5");
    upstream.signInDelayMs = 5;
    const pool = makePool(five);

    const result = await pool.batchRefresh(2);

    expect(result).toEqual({
      refreshedCount: 3,
      failedCount: 2,
      totalCount: 5,
      updatedEntries: ["u1@e.com----pw1----n1", "u3@e.com----pw3----n3", "u5@e.com----pw5----n5"],
    });
    expect(pool.listState().entries).toEqual([
      "u1@e.com----pw1----n1",
      "u2@e.com----pw2----t2",
      "u3@e.com----pw3----n3",
      "u4@e.com----pw4----t4",
      "u5@e.com----pw5----n5",
    ]);
    expect(upstream.maxInFlight).toBeLessThanOrEqual(2);
    expect(upstream.signInCalls).toHaveLength(5);
  });

  test("ignores bare entries", async () => {
    upstream.signIns.set("u@e.com", "n");
    const pool = makePool(["bare", "u@e.com----pw----t"]);

    const result = await pool.batchRefresh(4);

    expect(result.totalCount).toBe(1);
    expect(pool.listState().entries).toEqual(["bare", "u@e.com----pw----n"]);
  });

  test("returns zero counts when nothing can be refreshed", async () => {
    const result = await makePool(["a", "b"]).batchRefresh(4);
    expect(result).toEqual({ refreshedCount: 0, failedCount: 0, totalCount: 0, updatedEntries: [] });
  });

  test("a task that throws counts as a failure without aborting the batch", async () => {
    upstream.signIns.set("u2@e.com", "n2");
    const pool = makePool(five.slice(0, 2));
    vi.spyOn(pool, "refresh").mockRejectedValueOnce(new Error("boom"));

    const result = await pool.batchRefresh(1);

    expect(result.refreshedCount).toBe(1);
    expect(result.failedCount).toBe(1);
    expect(pool.listState().entries).toEqual(["u1@e.com----pw1----t1", "u2@e.com----pw2----n2"]);
  });

  test("applies results by entry when the pool changes mid-batch", async () => {
    upstream.signIns.set("a@x.com", "fresh");
    upstream.signInDelayMs = 20;
    const pool = makePool(["a@x.com----p----t1"]);

    const pending = pool.batchRefresh(2);
    await pool.replaceAll(["other", "a@x.com----p----t1"]);
    const result = await pending;

    expect(result.refreshedCount).toBe(1);
    expect(pool.listState().entries).toEqual(["other", "a@x.com----p----fresh"]);
  });

  test("clears failed marks on refreshed entries and persists once", async () => {
    upstream.signIns.set("u1@e.com", "n1");
    const pool = makePool(five.slice(0, 2));
    await pool.markFailed("t1");
    await pool.markFailed("t2");

    await pool.batchRefresh(2);

    expect(pool.listState().failedEntries).toEqual(["u2@e.com----pw2----t2"]);
    expect(store.writes).toBe(1);
    expect(store.values.get("UPSTREAM_CREDENTIALS")).toBe("u1@e.com----pw1----n1,u2@e.com----pw2----t2");
  });
});

// --- Recovery ---

describe("recoverFailed", () => {
  test("does nothing when no entry is failed", async () => {
    const pool = makePool(["a"]);
    expect(await pool.recoverFailed()).toEqual({ checked: 0, recovered: 0, refreshed: 0, evicted: 0 });
    expect(upstream.probeCalls).toEqual([]);
  });

  test("recovers, refreshes and evicts in one cycle", async () => {
    upstream.healthy.add("tokV");
    upstream.healthy.add("tokNew");
    upstream.signIns.set("u@e.com", "tokNew");
    const pool = makePool(["bare1", "u@e.com----pw----tokOld", "v@e.com----pw----tokV"]);
    for (const t of ["bare1", "tokOld", "tokV"]) await pool.markFailed(t);

    const report = await pool.recoverFailed();

    expect(report).toEqual({ checked: 3, recovered: 2, refreshed: 1, evicted: 1 });
    expect(pool.listState()).toEqual({
      entries: ["u@e.com----pw----tokNew", "v@e.com----pw----tokV"],
      failedEntries: [],
    });
    expect(pool.lookup("bare1")).toBeUndefined();
  });

  test("evicts an entry that still fails after a successful refresh", async () => {
    upstream.signIns.set("u@e.com", "tokNew");
    const pool = makePool(["a", "u@e.com----pw----tokOld"]);
    await pool.markFailed("tokOld");

    const report = await pool.recoverFailed();

    expect(report).toEqual({ checked: 1, recovered: 0, refreshed: 1, evicted: 1 });
    expect(pool.listState()).toEqual({ entries: ["a"], failedEntries: [] });
    expect(pool.lookup("tokNew")).toBeUndefined();
    expect(pool.lookup("u@e.com----pw----tokNew")).toBeUndefined();
    expect(pool.lookup("tokOld")).toBeUndefined();
    expect(store.values.get("UPSTREAM_CREDENTIALS")).toBe("a");
  });

  test("keeps an entry suspected when its refresh fails", async () => {
    const pool = makePool(["u@e.com----pw----tokOld"]);
    await pool.markFailed("tokOld");

    const report = await pool.recoverFailed();

    expect(report).toEqual({ checked: 1, recovered: 0, refreshed: 0, evicted: 0 });
    expect(pool.listState().failedEntries).toEqual(["u@e.com----pw----tokOld"]);
  });

  test("an aborted signal ends the cycle before any network call", async () => {
    const pool = makePool(["a", "b"]);
    await pool.markFailed("a");
    await pool.markFailed("b");
    const controller = new AbortController();
    controller.abort();

    const report = await pool.recoverFailed(controller.signal);

    expect(report).toEqual({ checked: 0, recovered: 0, refreshed: 0, evicted: 0 });
    expect(upstream.probeCalls).toEqual([]);
    expect(pool.listState().failedEntries).toEqual(["a", "b"]);
  });

  test("evicted entries can no longer be resolved", async () => {
    const pool = makePool(["a", "b"]);
    await pool.markFailed("a");
    await pool.recoverFailed();

    await pool.markFailed("a");
    expect(pool.listState()).toEqual({ entries: ["b"], failedEntries: [] });
  });

  test("keeps the cursor on the same next entry after an eviction before it", async () => {
    const pool = makePool(["a", "b", "c"]);
    await acquireN(pool, 2); // cursor -> 2
    await pool.markFailed("a");

    await pool.recoverFailed();

    expect(pool.listState().entries).toEqual(["b", "c"]);
    expect(await pool.acquire()).toBe("c");
  });
});

// --- Administration ---

describe("administration", () => {
  test("replaceAll resets failures and cursor, and persists", async () => {
    const pool = makePool(["a", "b"]);
    await pool.acquire();
    await pool.markFailed("b");

    const count = await pool.replaceAll([" x ", "", "y"]);

    expect(count).toBe(2);
    expect(pool.listState()).toEqual({ entries: ["x", "y"], failedEntries: [] });
    expect(await pool.acquire()).toBe("x");
    expect(store.values.get("UPSTREAM_CREDENTIALS")).toBe("x,y");
  });

  test("clearAll empties the pool", async () => {
    const pool = makePool(["a"]);
    await pool.clearAll();
    expect(pool.listState()).toEqual({ entries: [], failedEntries: [] });
    expect(await pool.acquire()).toBeNull();
    expect(store.values.get("UPSTREAM_CREDENTIALS")).toBe("");
  });

  test("describe redacts passwords and truncates tokens", async () => {
    const pool = makePool(["u@e.com----secretpw----tokenvalue123", "a@b.c----pw"]);
    await pool.markFailed("tokenvalue123");

    expect(pool.describe()).toEqual([
      { index: 0, kind: "composite", email: "u@e.com", token: "tokenval...", failed: true },
      { index: 1, kind: "pending", email: "a@b.c", token: null, failed: false },
    ]);
  });

  test("persistence failures never propagate", async () => {
    store.failWrites = true;
    const pool = makePool([]);
    await expect(pool.replaceAll(["a"])).resolves.toBe(1);
    await expect(pool.clearAll()).resolves.toBeUndefined();
  });

  test("duplicates are kept and rotated separately", async () => {
    const pool = makePool(["a", "a", "b"]);
    expect(await acquireN(pool, 3)).toEqual(["a", "a", "b"]);
  });
});
