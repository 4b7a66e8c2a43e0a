import type { IdempotencyRecord } from "@billsync/contracts";
import {
  addSecondsToIso,
  describeError,
  hashPayload,
  isBefore,
  utcNowIso,
  type FingerprintFn,
} from "@billsync/shared";
import {
  IdempotencyConflictError,
  IdempotencyInProgressError,
  InternalError,
  MissingIdempotencyKeyError,
} from "./errors.js";

export interface IdempotencyBeginRequest {
  scope: string;
  key: string;
  payloadHash: string;
  startedAt: string;
  /** Processing records last touched before this instant may be taken over. */
  staleBefore: string | null;
}

export type IdempotencyBeginOutcome<TResponse> =
  | { outcome: "started" }
  | { outcome: "replay"; record: IdempotencyRecord<TResponse> }
  | { outcome: "conflict" }
  | { outcome: "in_progress" };

/**
 * Ledger of executions keyed by `(scope, key)`. Stores that can claim a key
 * atomically implement `begin`; others fall back to `get` then `set`.
 */
export interface AsyncIdempotencyStore<TResponse> {
  get(scope: string, key: string): Promise<IdempotencyRecord<TResponse> | null>;
  set(
    scope: string,
    key: string,
    record: IdempotencyRecord<TResponse>,
  ): Promise<void>;
  begin?(request: IdempotencyBeginRequest): Promise<IdempotencyBeginOutcome<TResponse>>;
}

export interface ExecuteIdempotentInput<TPayload, TResponse> {
  scope: string;
  key: string | null;
  payload?: TPayload;
  fingerprint?: FingerprintFn<TPayload>;
  store: AsyncIdempotencyStore<TResponse>;
  execute: () => Promise<TResponse>;
  now?: () => string;
  /** Without it a processing record blocks the key until it settles. */
  staleAfterSeconds?: number;
}

export interface ExecuteIdempotentResult<TResponse> {
  response: TResponse;
  replayed: boolean;
}

export function resolveBeginOutcome<TResponse>(
  existing: IdempotencyRecord<TResponse> | null,
  request: Pick<IdempotencyBeginRequest, "payloadHash" | "staleBefore">,
): IdempotencyBeginOutcome<TResponse> {
  if (!existing) return { outcome: "started" };
  if (existing.payloadHash !== request.payloadHash) return { outcome: "conflict" };

  switch (existing.status) {
    case "completed":
      return { outcome: "replay", record: existing };
    case "failed":
      return { outcome: "started" };
    case "processing":
      return request.staleBefore !== null &&
        isBefore(existing.updatedAt, request.staleBefore)
        ? { outcome: "started" }
        : { outcome: "in_progress" };
  }
}

/** The record written when a key is (re)claimed; the first claim keeps `createdAt`. */
export function startedRecord<TResponse>(
  existing: IdempotencyRecord<TResponse> | null,
  request: IdempotencyBeginRequest,
): IdempotencyRecord<TResponse> {
  return {
    key: request.key,
    payloadHash: request.payloadHash,
    status: "processing",
    createdAt: existing?.createdAt ?? request.startedAt,
    updatedAt: request.startedAt,
  };
}

async function claimKey<TResponse>(
  store: AsyncIdempotencyStore<TResponse>,
  request: IdempotencyBeginRequest,
): Promise<IdempotencyBeginOutcome<TResponse>> {
  if (store.begin) return store.begin(request);

  const existing = await store.get(request.scope, request.key);
  const outcome = resolveBeginOutcome(existing, request);
  if (outcome.outcome === "started") {
    await store.set(request.scope, request.key, startedRecord(existing, request));
  }
  return outcome;
}

function replayedResponse<TResponse>(record: IdempotencyRecord<TResponse>): TResponse {
  if (record.response === undefined) {
    throw new InternalError("Completed idempotency record has no stored response", {
      key: record.key,
    });
  }
  return record.response;
}

/**
 * Runs `execute` at most once per `(scope, key)` and payload. A completed
 * key replays its stored response; a failed one may run again.
 */
export async function executeIdempotent<TPayload, TResponse>(
  input: ExecuteIdempotentInput<TPayload, TResponse>,
): Promise<ExecuteIdempotentResult<TResponse>> {
  const key = input.key?.trim();
  if (!key) throw new MissingIdempotencyKeyError();

  const now = input.now ?? utcNowIso;
  const startedAt = now();
  const payloadHash = input.fingerprint
    ? input.fingerprint(input.payload)
    : hashPayload(input.payload ?? null);

  const request: IdempotencyBeginRequest = {
    scope: input.scope,
    key,
    payloadHash,
    startedAt,
    staleBefore:
      input.staleAfterSeconds !== undefined
        ? addSecondsToIso(startedAt, -input.staleAfterSeconds)
        : null,
  };

  const claimed = await claimKey(input.store, request);
  switch (claimed.outcome) {
    case "conflict":
      throw new IdempotencyConflictError(input.scope, key);
    case "in_progress":
      throw new IdempotencyInProgressError(input.scope, key);
    case "replay":
      return { response: replayedResponse(claimed.record), replayed: true };
    case "started":
      break;
  }

  const settled = { key, payloadHash, createdAt: startedAt };
  let response: TResponse;
  try {
    response = await input.execute();
  } catch (error) {
    await input.store.set(input.scope, key, {
      ...settled,
      status: "failed",
      updatedAt: now(),
      errorMessage: describeError(error, "Unexpected execution failure"),
    });
    throw error;
  }

  await input.store.set(input.scope, key, {
    ...settled,
    status: "completed",
    response,
    updatedAt: now(),
  });
  return { response, replayed: false };
}

export function createInMemoryAsyncIdempotencyStore<
  TResponse,
>(): AsyncIdempotencyStore<TResponse> {
  const records = new Map<string, IdempotencyRecord<TResponse>>();
  const mapKey = (scope: string, key: string) => `${scope}:${key}`;

  return {
    async get(scope, key) {
      return records.get(mapKey(scope, key)) ?? null;
    },
    async set(scope, key, record) {
      records.set(mapKey(scope, key), record);
    },
    async begin(request) {
      const existing = records.get(mapKey(request.scope, request.key)) ?? null;
      const outcome = resolveBeginOutcome(existing, request);
      if (outcome.outcome === "started") {
        records.set(
          mapKey(request.scope, request.key),
          startedRecord(existing, request),
        );
      }
      return outcome;
    },
  };
}
