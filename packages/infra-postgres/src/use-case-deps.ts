import type { BillingStores } from "@billsync/application";
import type { UsageReportedEvent } from "@billsync/contracts";
import type { Pool } from "pg";
import { createPostgresBillingRecordStore } from "./billing-record-store.js";
import { createPostgresEventUsageSource } from "./event-usage-source.js";
import { createPostgresAsyncIdempotencyStore } from "./idempotency-store.js";
import { createPostgresPlanCatalog } from "./plan-catalog.js";
import { createPostgresUsageJobStore } from "./usage-job-store.js";
import {
  createPostgresWebhookAuditStore,
  createPostgresWebhookDedupStore,
} from "./webhook-stores.js";

export function createPostgresBillingStores(pool: Pool): BillingStores {
  return {
    billingRecords: createPostgresBillingRecordStore(pool),
    planCatalog: createPostgresPlanCatalog(pool),
    usageSource: createPostgresEventUsageSource(pool),
    usageJobStore: createPostgresUsageJobStore(pool),
    reportIdempotencyStore: createPostgresAsyncIdempotencyStore<UsageReportedEvent>(pool),
    dedupStore: createPostgresWebhookDedupStore(pool),
    auditStore: createPostgresWebhookAuditStore(pool),
  };
}
