import {
  UsageJobLeaseError,
  UsageJobNotFoundError,
  type UsageJobClaimInput,
  type UsageJobLease,
  type UsageJobStore,
  type UsageReportJob,
} from "@billsync/application";
import type { Pool, PoolClient } from "pg";
import { withTransaction } from "./pool.js";
import { firstRow, toIso, type TimestampValue } from "./rows.js";

type UsageJobRow = {
  id: string;
  status: UsageReportJob["status"];
  job_key: string;
  organization_id: string;
  usage_date: string;
  quantity: number | null;
  reason: string | null;
  attempt_count: number;
  max_attempts: number;
  next_attempt_at: TimestampValue;
  last_error: string | null;
  dead_lettered_at: TimestampValue | null;
  lease_owner: string | null;
  lease_token: string | null;
  lease_expires_at: TimestampValue | null;
  created_at: TimestampValue;
  updated_at: TimestampValue;
};

// usage_date is read as text so the driver never shifts it into local time
const COLUMNS = `id, status, job_key, organization_id, usage_date::text AS usage_date, quantity,
  reason, attempt_count, max_attempts, next_attempt_at, last_error, dead_lettered_at,
  lease_owner, lease_token, lease_expires_at, created_at, updated_at`;

const RETURNING_COLUMNS = `jobs.id, jobs.status, jobs.job_key, jobs.organization_id,
  jobs.usage_date::text AS usage_date, jobs.quantity, jobs.reason, jobs.attempt_count,
  jobs.max_attempts, jobs.next_attempt_at, jobs.last_error, jobs.dead_lettered_at,
  jobs.lease_owner, jobs.lease_token, jobs.lease_expires_at, jobs.created_at, jobs.updated_at`;

function mapRow(row: UsageJobRow): UsageReportJob {
  return {
    id: row.id,
    status: row.status,
    jobKey: row.job_key,
    organizationId: row.organization_id,
    usageDate: row.usage_date,
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at),
    ...(row.quantity !== null ? { quantity: row.quantity } : {}),
    ...(row.reason !== null ? { reason: row.reason } : {}),
    attemptCount: row.attempt_count,
    maxAttempts: row.max_attempts,
    nextAttemptAt: toIso(row.next_attempt_at),
    ...(row.last_error !== null ? { lastError: row.last_error } : {}),
    ...(row.dead_lettered_at !== null
      ? { deadLetteredAt: toIso(row.dead_lettered_at) }
      : {}),
    ...(row.lease_owner !== null ? { leaseOwner: row.lease_owner } : {}),
    ...(row.lease_token !== null ? { leaseToken: row.lease_token } : {}),
    ...(row.lease_expires_at !== null
      ? { leaseExpiresAt: toIso(row.lease_expires_at) }
      : {}),
  };
}

async function assertLeaseHeld(
  client: PoolClient,
  jobId: string,
  rowCount: number | null,
): Promise<void> {
  if (rowCount === 1) return;

  const existing = await client.query("SELECT 1 FROM usage_report_jobs WHERE id = $1", [jobId]);
  if (existing.rowCount === 0) {
    throw new UsageJobNotFoundError();
  }
  throw new UsageJobLeaseError();
}

export function createPostgresUsageJobStore(pool: Pool): UsageJobStore {
  async function leasedUpdate(
    jobId: string,
    lease: UsageJobLease,
    assignments: string,
    values: unknown[],
  ): Promise<void> {
    await withTransaction(pool, async (client) => {
      const result = await client.query(
        `UPDATE usage_report_jobs
            SET ${assignments},
                updated_at = now()
          WHERE id = $1 AND lease_owner = $2 AND lease_token = $3`,
        [jobId, lease.workerId, lease.leaseToken, ...values],
      );
      await assertLeaseHeld(client, jobId, result.rowCount);
    });
  }

  return {
    async enqueue(job: UsageReportJob): Promise<boolean> {
      const result = await pool.query(
        `INSERT INTO usage_report_jobs
          (id, status, job_key, organization_id, usage_date, attempt_count, max_attempts,
           next_attempt_at, created_at, updated_at)
         VALUES
          ($1, $2, $3, $4, $5::date, $6, $7, $8::timestamptz, $9::timestamptz, $10::timestamptz)
         ON CONFLICT (job_key) DO NOTHING`,
        [
          job.id,
          job.status,
          job.jobKey,
          job.organizationId,
          job.usageDate,
          job.attemptCount,
          job.maxAttempts,
          job.nextAttemptAt,
          job.createdAt,
          job.updatedAt,
        ],
      );
      return result.rowCount === 1;
    },

    async claimNext(input: UsageJobClaimInput): Promise<UsageReportJob | null> {
      return withTransaction(pool, async (client) => {
        const result = await client.query<UsageJobRow>(
          `WITH candidate AS (
             SELECT id
               FROM usage_report_jobs
              WHERE (status = 'queued' AND next_attempt_at <= now())
                 OR (status = 'processing' AND lease_expires_at <= now())
              ORDER BY created_at
              LIMIT 1
              FOR UPDATE SKIP LOCKED
           )
           UPDATE usage_report_jobs jobs
              SET status = 'processing',
                  lease_owner = $1,
                  lease_token = $2,
                  lease_expires_at = now() + make_interval(secs => $3),
                  updated_at = now()
             FROM candidate
            WHERE jobs.id = candidate.id
           RETURNING ${RETURNING_COLUMNS}`,
          [input.workerId, input.leaseToken, input.leaseSeconds],
        );

        const row = firstRow(result.rows);
        return row ? mapRow(row) : null;
      });
    },

    async renewLease(
      jobId: string,
      lease: UsageJobLease,
      leaseSeconds: number,
    ): Promise<void> {
      await leasedUpdate(
        jobId,
        lease,
        "lease_expires_at = now() + make_interval(secs => $4)",
        [leaseSeconds],
      );
    },

    async get(jobId: string): Promise<UsageReportJob | null> {
      const result = await pool.query<UsageJobRow>(
        `SELECT ${COLUMNS}
           FROM usage_report_jobs
          WHERE id = $1
          LIMIT 1`,
        [jobId],
      );
      const row = firstRow(result.rows);
      return row ? mapRow(row) : null;
    },

    async markCompleted(
      jobId: string,
      quantity: number,
      lease: UsageJobLease,
    ): Promise<void> {
      await leasedUpdate(
        jobId,
        lease,
        `status = 'completed',
         quantity = $4,
         lease_owner = NULL,
         lease_token = NULL,
         lease_expires_at = NULL`,
        [quantity],
      );
    },

    async markRetry(
      jobId: string,
      reason: string,
      nextAttemptAt: string,
      attemptCount: number,
      lease: UsageJobLease,
    ): Promise<void> {
      await leasedUpdate(
        jobId,
        lease,
        `status = 'queued',
         reason = $4,
         last_error = $4,
         next_attempt_at = $5::timestamptz,
         attempt_count = $6,
         lease_owner = NULL,
         lease_token = NULL,
         lease_expires_at = NULL`,
        [reason, nextAttemptAt, attemptCount],
      );
    },

    async markDeadLetter(
      jobId: string,
      reason: string,
      lease: UsageJobLease,
    ): Promise<void> {
      await leasedUpdate(
        jobId,
        lease,
        `status = 'failed',
         reason = $4,
         last_error = $4,
         dead_lettered_at = now(),
         lease_owner = NULL,
         lease_token = NULL,
         lease_expires_at = NULL`,
        [reason],
      );
    },
  };
}
