import { describe, expect, it } from "vitest";
import type { IdempotencyRecord } from "@billsync/contracts";
import { hashPayload } from "@billsync/shared";
import {
  IdempotencyConflictError,
  IdempotencyInProgressError,
  MissingIdempotencyKeyError,
} from "./errors.js";
import {
  createInMemoryAsyncIdempotencyStore,
  executeIdempotent,
  resolveBeginOutcome,
  type AsyncIdempotencyStore,
} from "./idempotency.js";

// store without an atomic begin, exercising the get/set fallback path
function createGetSetStore<T>(): AsyncIdempotencyStore<T> & {
  records: Map<string, IdempotencyRecord<T>>;
} {
  const records = new Map<string, IdempotencyRecord<T>>();

  return {
    records,
    async get(scope: string, key: string) {
      return records.get(`${scope}:${key}`) ?? null;
    },
    async set(scope: string, key: string, record: IdempotencyRecord<T>) {
      records.set(`${scope}:${key}`, record);
    },
  };
}

describe("executeIdempotent", () => {
  it("requires a key", async () => {
    await expect(
      executeIdempotent({
        scope: "usage.report",
        key: "  ",
        store: createInMemoryAsyncIdempotencyStore<{ quantity: number }>(),
        execute: async () => ({ quantity: 1 }),
      }),
    ).rejects.toBeInstanceOf(MissingIdempotencyKeyError);
  });

  it("replays the stored response for a repeated key", async () => {
    const store = createGetSetStore<{ quantity: number }>();
    let calls = 0;

    const run = () =>
      executeIdempotent({
        scope: "usage.report",
        key: "si_1-2026-03-09",
        payload: { organizationId: "org_1" },
        store,
        now: () => "2026-03-10T00:00:00.000Z",
        execute: async () => {
          calls += 1;
          return { quantity: 42 };
        },
      });

    const first = await run();
    const second = await run();

    expect(first).toEqual({ response: { quantity: 42 }, replayed: false });
    expect(second).toEqual({ response: { quantity: 42 }, replayed: true });
    expect(calls).toBe(1);
    expect(store.records.get("usage.report:si_1-2026-03-09")?.status).toBe(
      "completed",
    );
  });

  it("rejects the same key with another payload", async () => {
    const store = createInMemoryAsyncIdempotencyStore<{ quantity: number }>();

    await executeIdempotent({
      scope: "usage.report",
      key: "k1",
      payload: { organizationId: "org_1" },
      store,
      execute: async () => ({ quantity: 1 }),
    });

    await expect(
      executeIdempotent({
        scope: "usage.report",
        key: "k1",
        payload: { organizationId: "org_2" },
        store,
        execute: async () => ({ quantity: 1 }),
      }),
    ).rejects.toBeInstanceOf(IdempotencyConflictError);
  });

  it("reports in-progress while the first execution is running", async () => {
    const store = createInMemoryAsyncIdempotencyStore<{ quantity: number }>();
    const gate: { release: () => void } = { release: () => undefined };
    const pending = new Promise<void>((resolve) => {
      gate.release = resolve;
    });

    const first = executeIdempotent({
      scope: "usage.report",
      key: "busy",
      store,
      execute: async () => {
        await pending;
        return { quantity: 3 };
      },
    });

    await expect(
      executeIdempotent({
        scope: "usage.report",
        key: "busy",
        store,
        execute: async () => ({ quantity: 3 }),
      }),
    ).rejects.toBeInstanceOf(IdempotencyInProgressError);

    gate.release();
    await expect(first).resolves.toEqual({
      response: { quantity: 3 },
      replayed: false,
    });
  });

  it("allows a retry after a failed attempt", async () => {
    const store = createGetSetStore<{ quantity: number }>();

    await expect(
      executeIdempotent({
        scope: "usage.report",
        key: "retry",
        store,
        execute: async () => {
          throw new Error("provider timeout");
        },
      }),
    ).rejects.toThrow("provider timeout");

    expect(store.records.get("usage.report:retry")).toMatchObject({
      status: "failed",
      errorMessage: "provider timeout",
    });

    const second = await executeIdempotent({
      scope: "usage.report",
      key: "retry",
      store,
      execute: async () => ({ quantity: 7 }),
    });

    expect(second).toEqual({ response: { quantity: 7 }, replayed: false });
  });

  it("takes over a processing record older than the stale window", async () => {
    const store = createGetSetStore<{ quantity: number }>();
    store.records.set("usage.report:crashed", {
      key: "crashed",
      payloadHash: hashPayload(null),
      status: "processing",
      createdAt: "2026-03-10T00:00:00.000Z",
      updatedAt: "2026-03-10T00:00:00.000Z",
    });

    const run = (now: string) =>
      executeIdempotent({
        scope: "usage.report",
        key: "crashed",
        store,
        staleAfterSeconds: 20,
        now: () => now,
        execute: async () => ({ quantity: 5 }),
      });

    await expect(run("2026-03-10T00:00:10.000Z")).rejects.toBeInstanceOf(
      IdempotencyInProgressError,
    );
    await expect(run("2026-03-10T00:00:30.000Z")).resolves.toEqual({
      response: { quantity: 5 },
      replayed: false,
    });
    expect(store.records.get("usage.report:crashed")).toMatchObject({
      status: "completed",
      createdAt: "2026-03-10T00:00:30.000Z",
    });
  });
});

describe("resolveBeginOutcome", () => {
  const record = {
    key: "k",
    payloadHash: "hash_a",
    createdAt: "2026-03-10T00:00:00.000Z",
    updatedAt: "2026-03-10T00:00:00.000Z",
  };

  it("starts a fresh key and restarts a failed one", () => {
    expect(
      resolveBeginOutcome(null, { payloadHash: "hash_a", staleBefore: null }),
    ).toEqual({ outcome: "started" });
    expect(
      resolveBeginOutcome(
        { ...record, status: "failed" },
        { payloadHash: "hash_a", staleBefore: null },
      ),
    ).toEqual({ outcome: "started" });
  });

  it("keeps a processing record without a stale window", () => {
    expect(
      resolveBeginOutcome(
        { ...record, status: "processing" },
        { payloadHash: "hash_a", staleBefore: null },
      ),
    ).toEqual({ outcome: "in_progress" });
  });

  it("checks the payload before the status", () => {
    expect(
      resolveBeginOutcome(
        { ...record, status: "completed", response: 1 },
        { payloadHash: "hash_b", staleBefore: null },
      ),
    ).toEqual({ outcome: "conflict" });
  });
});
