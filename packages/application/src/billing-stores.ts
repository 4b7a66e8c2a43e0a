import type { Plan, UsageReportedEvent } from "@billsync/contracts";
import { parseIsoToEpochMillis, utcNowIso } from "@billsync/shared";
import {
  createInMemoryBillingRecordStore,
  type BillingRecordStore,
} from "./billing-record-store.js";
import {
  createInMemoryWebhookAuditStore,
  createInMemoryWebhookDedupStore,
  type WebhookAuditStore,
  type WebhookDedupStore,
} from "./billing-webhook.js";
import {
  createInMemoryAsyncIdempotencyStore,
  type AsyncIdempotencyStore,
} from "./idempotency.js";
import { createInMemoryPlanCatalog, type PlanCatalog } from "./plan-catalog.js";
import type { EventUsageSource } from "./provider.js";
import { createInMemoryUsageJobStore, type UsageJobStore } from "./usage.js";

/** Every persistence port the billing use cases need, from one backend. */
export interface BillingStores {
  billingRecords: BillingRecordStore;
  planCatalog: PlanCatalog;
  usageSource: EventUsageSource;
  usageJobStore: UsageJobStore;
  reportIdempotencyStore: AsyncIdempotencyStore<UsageReportedEvent>;
  dedupStore: WebhookDedupStore;
  auditStore: WebhookAuditStore;
}

export interface InMemoryEventUsageSource extends EventUsageSource {
  record(organizationId: string, occurredAt: string): void;
}

export function createInMemoryEventUsageSource(): InMemoryEventUsageSource {
  const occurrences = new Map<string, number[]>();

  return {
    record(organizationId, occurredAt) {
      const list = occurrences.get(organizationId) ?? [];
      list.push(parseIsoToEpochMillis(occurredAt));
      occurrences.set(organizationId, list);
    },
    async countEvents(organizationId, startIso, endIso) {
      const start = parseIsoToEpochMillis(startIso);
      const end = parseIsoToEpochMillis(endIso);
      return (occurrences.get(organizationId) ?? []).filter(
        (at) => at >= start && at <= end,
      ).length;
    },
  };
}

export interface InMemoryBillingStoresOptions {
  plans: readonly Plan[];
  now?: () => string;
  usageSource?: EventUsageSource;
}

export function createInMemoryBillingStores(
  options: InMemoryBillingStoresOptions,
): BillingStores {
  const now = options.now ?? utcNowIso;

  return {
    billingRecords: createInMemoryBillingRecordStore(now),
    planCatalog: createInMemoryPlanCatalog(options.plans),
    usageSource: options.usageSource ?? createInMemoryEventUsageSource(),
    usageJobStore: createInMemoryUsageJobStore(now),
    reportIdempotencyStore:
      createInMemoryAsyncIdempotencyStore<UsageReportedEvent>(),
    dedupStore: createInMemoryWebhookDedupStore(),
    auditStore: createInMemoryWebhookAuditStore(),
  };
}
