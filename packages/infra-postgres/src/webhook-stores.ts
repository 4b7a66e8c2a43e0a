import type {
  WebhookAuditRecord,
  WebhookAuditStore,
  WebhookDedupStore,
} from "@billsync/application";
import type { PaymentProviderName } from "@billsync/contracts";
import type { Pool } from "pg";

export function createPostgresWebhookDedupStore(pool: Pool): WebhookDedupStore {
  return {
    async has(provider: PaymentProviderName, idempotencyKey: string): Promise<boolean> {
      const result = await pool.query(
        `SELECT 1
           FROM processed_webhook_events
          WHERE provider = $1 AND idempotency_key = $2`,
        [provider, idempotencyKey],
      );
      return (result.rowCount ?? 0) > 0;
    },

    async markProcessed(
      provider: PaymentProviderName,
      idempotencyKey: string,
    ): Promise<void> {
      await pool.query(
        `INSERT INTO processed_webhook_events (provider, idempotency_key, processed_at)
         VALUES ($1, $2, now())
         ON CONFLICT (provider, idempotency_key) DO NOTHING`,
        [provider, idempotencyKey],
      );
    },
  };
}

export function createPostgresWebhookAuditStore(pool: Pool): WebhookAuditStore {
  return {
    async saveRaw(record: WebhookAuditRecord): Promise<void> {
      await pool.query(
        `INSERT INTO webhook_audit_log
          (provider, trace_id, idempotency_key, event_type, status, reason, raw_body, headers, received_at)
         VALUES
          ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9::timestamptz)`,
        [
          record.provider,
          record.traceId,
          record.idempotencyKey ?? null,
          record.eventType ?? null,
          record.status,
          record.reason ?? null,
          record.rawBody,
          JSON.stringify(record.headers),
          record.receivedAt,
        ],
      );
    },
  };
}
