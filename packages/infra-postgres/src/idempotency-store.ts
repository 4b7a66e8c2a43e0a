import {
  resolveBeginOutcome,
  type AsyncIdempotencyStore,
  type IdempotencyBeginOutcome,
  type IdempotencyBeginRequest,
} from "@billsync/application";
import type { IdempotencyRecord, IdempotencyStatus } from "@billsync/contracts";
import type { Pool } from "pg";
import { withTransaction } from "./pool.js";
import { firstRow, toIso, type TimestampValue } from "./rows.js";

type IdempotencyRow = {
  key: string;
  payload_hash: string;
  status: IdempotencyStatus;
  response: unknown | null;
  error_message: string | null;
  created_at: TimestampValue;
  updated_at: TimestampValue;
};

const COLUMNS = "key, payload_hash, status, response, error_message, created_at, updated_at";

function mapRow<T>(row: IdempotencyRow): IdempotencyRecord<T> {
  const record: IdempotencyRecord<T> = {
    key: row.key,
    payloadHash: row.payload_hash,
    status: row.status,
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at),
  };

  // jsonb round-trips whatever the use case stored under this scope
  if (row.response !== null) record.response = row.response as T;
  if (row.error_message !== null) record.errorMessage = row.error_message;

  return record;
}

export function createPostgresAsyncIdempotencyStore<TResponse>(
  pool: Pool,
): AsyncIdempotencyStore<TResponse> {
  return {
    async get(scope: string, key: string): Promise<IdempotencyRecord<TResponse> | null> {
      const result = await pool.query<IdempotencyRow>(
        `SELECT ${COLUMNS}
           FROM idempotency_records
          WHERE scope = $1 AND key = $2
          LIMIT 1`,
        [scope, key],
      );

      const row = firstRow(result.rows);
      return row ? mapRow<TResponse>(row) : null;
    },

    async set(
      scope: string,
      key: string,
      record: IdempotencyRecord<TResponse>,
    ): Promise<void> {
      await pool.query(
        `INSERT INTO idempotency_records
          (scope, key, payload_hash, status, response, error_message, created_at, updated_at)
         VALUES
          ($1, $2, $3, $4, $5::jsonb, $6, $7::timestamptz, $8::timestamptz)
         ON CONFLICT (scope, key)
         DO UPDATE SET
           payload_hash = EXCLUDED.payload_hash,
           status = EXCLUDED.status,
           response = EXCLUDED.response,
           error_message = EXCLUDED.error_message,
           updated_at = EXCLUDED.updated_at`,
        [
          scope,
          key,
          record.payloadHash,
          record.status,
          record.response === undefined ? null : JSON.stringify(record.response),
          record.errorMessage ?? null,
          record.createdAt,
          record.updatedAt,
        ],
      );
    },

    async begin(
      request: IdempotencyBeginRequest,
    ): Promise<IdempotencyBeginOutcome<TResponse>> {
      const { scope, key, payloadHash, startedAt } = request;

      return withTransaction(pool, async (client) => {
        const inserted = await client.query(
          `INSERT INTO idempotency_records
            (scope, key, payload_hash, status, response, error_message, created_at, updated_at)
           VALUES
            ($1, $2, $3, 'processing', NULL, NULL, $4::timestamptz, $4::timestamptz)
           ON CONFLICT (scope, key) DO NOTHING`,
          [scope, key, payloadHash, startedAt],
        );
        if (inserted.rowCount === 1) return { outcome: "started" };

        const locked = await client.query<IdempotencyRow>(
          `SELECT ${COLUMNS}
             FROM idempotency_records
            WHERE scope = $1 AND key = $2
            FOR UPDATE`,
          [scope, key],
        );
        const row = firstRow(locked.rows);
        const outcome = resolveBeginOutcome(
          row ? mapRow<TResponse>(row) : null,
          request,
        );
        if (outcome.outcome !== "started") return outcome;

        await client.query(
          `UPDATE idempotency_records
              SET status = 'processing',
                  response = NULL,
                  error_message = NULL,
                  updated_at = $3::timestamptz
            WHERE scope = $1 AND key = $2`,
          [scope, key, startedAt],
        );
        return outcome;
      });
    },
  };
}
