import type { BillingRecord } from "@billsync/contracts";
import { createEmptyBillingRecord } from "@billsync/domain";
import { utcNowIso } from "@billsync/shared";
import { ConflictError } from "./errors.js";

export interface BillingRecordStore {
  getOrCreate(organizationId: string): Promise<BillingRecord>;
  get(organizationId: string): Promise<BillingRecord | null>;
  /**
   * Writes `next` with `version = expectedVersion + 1` only when the stored
   * version still equals `expectedVersion`.
   */
  compareAndSwap(
    organizationId: string,
    expectedVersion: number,
    next: BillingRecord,
  ): Promise<boolean>;
  findByProviderCustomerId(customerId: string): Promise<BillingRecord | null>;
  listMeteredCandidates(): Promise<BillingRecord[]>;
}

export type BillingRecordMutation = (
  current: BillingRecord,
) => BillingRecord | null | Promise<BillingRecord | null>;

export interface UpdateBillingRecordResult {
  record: BillingRecord;
  changed: boolean;
}

export const DEFAULT_CAS_MAX_ATTEMPTS = 5;

export class BillingRecordConflictError extends ConflictError {
  constructor(organizationId: string, attempts: number) {
    super("Billing record changed concurrently, giving up", {
      organizationId,
      attempts,
    });
  }
}

export async function updateBillingRecordWithRetry(
  store: BillingRecordStore,
  organizationId: string,
  mutate: BillingRecordMutation,
  options: { maxAttempts?: number } = {},
): Promise<UpdateBillingRecordResult> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_CAS_MAX_ATTEMPTS;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    const current = await store.getOrCreate(organizationId);
    const next = await mutate(current);

    if (next === null) {
      return { record: current, changed: false };
    }

    const written: BillingRecord = {
      ...next,
      organizationId,
      version: current.version + 1,
    };

    if (await store.compareAndSwap(organizationId, current.version, written)) {
      return { record: written, changed: true };
    }
  }

  throw new BillingRecordConflictError(organizationId, maxAttempts);
}

export function createInMemoryBillingRecordStore(
  now: () => string = utcNowIso,
): BillingRecordStore {
  const records = new Map<string, BillingRecord>();

  return {
    async getOrCreate(organizationId: string): Promise<BillingRecord> {
      const existing = records.get(organizationId);
      if (existing) return { ...existing };

      const created = createEmptyBillingRecord(organizationId, now());
      records.set(organizationId, created);
      return { ...created };
    },
    async get(organizationId: string): Promise<BillingRecord | null> {
      const existing = records.get(organizationId);
      return existing ? { ...existing } : null;
    },
    async compareAndSwap(
      organizationId: string,
      expectedVersion: number,
      next: BillingRecord,
    ): Promise<boolean> {
      const current = records.get(organizationId);
      if (!current || current.version !== expectedVersion) {
        return false;
      }

      records.set(organizationId, {
        ...next,
        organizationId,
        version: expectedVersion + 1,
      });
      return true;
    },
    async findByProviderCustomerId(
      customerId: string,
    ): Promise<BillingRecord | null> {
      for (const record of records.values()) {
        if (record.providerCustomerId === customerId) return { ...record };
      }
      return null;
    },
    async listMeteredCandidates(): Promise<BillingRecord[]> {
      return [...records.values()]
        .filter(
          (record) =>
            record.planKey !== null && record.providerSubscriptionItemId !== null,
        )
        .map((record) => ({ ...record }));
    },
  };
}
