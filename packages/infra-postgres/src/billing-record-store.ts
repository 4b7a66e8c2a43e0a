import type { BillingRecordStore } from "@billsync/application";
import type { BillingRecord } from "@billsync/contracts";
import type { Pool } from "pg";
import { firstRow, toIso, toNullableIso, type TimestampValue } from "./rows.js";

type BillingRecordRow = {
  organization_id: string;
  provider_customer_id: string | null;
  provider_subscription_id: string | null;
  provider_subscription_item_id: string | null;
  checkout_session_id: string | null;
  checkout_session_created_at: TimestampValue | null;
  plan_key: string | null;
  awaiting_setup: boolean;
  period_end: TimestampValue | null;
  version: number;
  created_at: TimestampValue;
  updated_at: TimestampValue;
};

const COLUMNS = `organization_id, provider_customer_id, provider_subscription_id,
  provider_subscription_item_id, checkout_session_id, checkout_session_created_at,
  plan_key, awaiting_setup, period_end, version, created_at, updated_at`;

function mapRow(row: BillingRecordRow): BillingRecord {
  return {
    organizationId: row.organization_id,
    providerCustomerId: row.provider_customer_id,
    providerSubscriptionId: row.provider_subscription_id,
    providerSubscriptionItemId: row.provider_subscription_item_id,
    checkoutSessionId: row.checkout_session_id,
    checkoutSessionCreatedAt: toNullableIso(row.checkout_session_created_at),
    planKey: row.plan_key,
    awaitingSetup: row.awaiting_setup,
    periodEnd: toNullableIso(row.period_end),
    version: row.version,
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at),
  };
}

export function createPostgresBillingRecordStore(pool: Pool): BillingRecordStore {
  async function get(organizationId: string): Promise<BillingRecord | null> {
    const result = await pool.query<BillingRecordRow>(
      `SELECT ${COLUMNS}
         FROM billing_records
        WHERE organization_id = $1`,
      [organizationId],
    );
    const row = firstRow(result.rows);
    return row ? mapRow(row) : null;
  }

  return {
    get,

    async getOrCreate(organizationId: string): Promise<BillingRecord> {
      await pool.query(
        `INSERT INTO billing_records (organization_id, awaiting_setup, version, created_at, updated_at)
         VALUES ($1, false, 1, now(), now())
         ON CONFLICT (organization_id) DO NOTHING`,
        [organizationId],
      );

      const record = await get(organizationId);
      if (!record) {
        throw new Error(`Billing record for ${organizationId} vanished after insert`);
      }
      return record;
    },

    async compareAndSwap(
      organizationId: string,
      expectedVersion: number,
      next: BillingRecord,
    ): Promise<boolean> {
      const result = await pool.query(
        `UPDATE billing_records
            SET provider_customer_id = $3,
                provider_subscription_id = $4,
                provider_subscription_item_id = $5,
                checkout_session_id = $6,
                checkout_session_created_at = $7::timestamptz,
                plan_key = $8,
                awaiting_setup = $9,
                period_end = $10::timestamptz,
                updated_at = $11::timestamptz,
                version = version + 1
          WHERE organization_id = $1
            AND version = $2`,
        [
          organizationId,
          expectedVersion,
          next.providerCustomerId,
          next.providerSubscriptionId,
          next.providerSubscriptionItemId,
          next.checkoutSessionId,
          next.checkoutSessionCreatedAt,
          next.planKey,
          next.awaitingSetup,
          next.periodEnd,
          next.updatedAt,
        ],
      );
      return result.rowCount === 1;
    },

    async findByProviderCustomerId(customerId: string): Promise<BillingRecord | null> {
      const result = await pool.query<BillingRecordRow>(
        `SELECT ${COLUMNS}
           FROM billing_records
          WHERE provider_customer_id = $1
          LIMIT 1`,
        [customerId],
      );
      const row = firstRow(result.rows);
      return row ? mapRow(row) : null;
    },

    async listMeteredCandidates(): Promise<BillingRecord[]> {
      const result = await pool.query<BillingRecordRow>(
        `SELECT ${COLUMNS}
           FROM billing_records
          WHERE plan_key IS NOT NULL
            AND provider_subscription_item_id IS NOT NULL
          ORDER BY organization_id`,
      );
      return result.rows.map(mapRow);
    },
  };
}
