import type {
  BillingWebhookAuditStatus,
  BillingWebhookEnvelope,
  BillingWebhookProcessResult,
  PaymentProviderName,
} from "@billsync/contracts";
import { describeError } from "@billsync/shared";
import type { WebhookSignatureVerifier } from "./provider.js";
import {
  reconcileWebhookEvent,
  type ReconcileWebhookDeps,
} from "./reconciliation.js";
import { parseWebhookEvent } from "./webhook-event-parser.js";

export const STRIPE_SIGNATURE_HEADER = "stripe-signature";

export interface WebhookDedupStore {
  has(provider: PaymentProviderName, idempotencyKey: string): Promise<boolean>;
  markProcessed(
    provider: PaymentProviderName,
    idempotencyKey: string,
  ): Promise<void>;
}

export interface WebhookAuditRecord {
  provider: PaymentProviderName;
  traceId: string;
  rawBody: string;
  headers: Record<string, string | undefined>;
  receivedAt: string;
  idempotencyKey?: string;
  eventType?: string;
  status: BillingWebhookAuditStatus;
  reason?: string;
}

export interface WebhookAuditStore {
  saveRaw(record: WebhookAuditRecord): Promise<void>;
}

export interface BillingWebhookDeps extends ReconcileWebhookDeps {
  verifier: WebhookSignatureVerifier;
  dedupStore: WebhookDedupStore;
  auditStore: WebhookAuditStore;
}

export function findHeader(
  headers: Record<string, string | undefined>,
  name: string,
): string | undefined {
  const target = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === target) return value;
  }
  return undefined;
}

export async function processBillingWebhook(
  deps: BillingWebhookDeps,
  input: BillingWebhookEnvelope,
): Promise<BillingWebhookProcessResult> {
  const audit = (
    record: Omit<
      WebhookAuditRecord,
      "provider" | "traceId" | "rawBody" | "headers" | "receivedAt"
    >,
  ) =>
    deps.auditStore.saveRaw({
      provider: input.provider,
      traceId: input.traceId,
      rawBody: input.rawBody,
      headers: input.headers,
      receivedAt: input.receivedAt,
      ...record,
    });

  let eventRef: { idempotencyKey: string; eventType: string } | null = null;

  try {
    const verified = await deps.verifier.verify({
      rawBody: input.rawBody,
      signatureHeader: findHeader(input.headers, STRIPE_SIGNATURE_HEADER),
    });
    const event = parseWebhookEvent(verified);
    eventRef = {
      idempotencyKey: event.idempotencyKey,
      eventType: event.providerEventType,
    };

    if (await deps.dedupStore.has(verified.provider, event.idempotencyKey)) {
      const reason = "Duplicate webhook event";
      await audit({ ...eventRef, status: "duplicate", reason });
      return {
        status: "duplicate",
        eventKind: event.kind,
        idempotencyKey: event.idempotencyKey,
        reason,
      };
    }

    const outcome = await reconcileWebhookEvent(deps, event);
    await deps.dedupStore.markProcessed(verified.provider, event.idempotencyKey);

    if (outcome.outcome === "ignored") {
      await audit({ ...eventRef, status: "ignored", reason: outcome.reason });
      return {
        status: "ignored",
        eventKind: event.kind,
        idempotencyKey: event.idempotencyKey,
        reason: outcome.reason,
      };
    }

    await audit({
      ...eventRef,
      status: "processed",
      ...(outcome.outcome === "noop" ? { reason: outcome.reason } : {}),
    });

    return {
      status: "processed",
      eventKind: event.kind,
      idempotencyKey: event.idempotencyKey,
      organizationId: outcome.organizationId,
      ...(outcome.outcome === "noop" ? { reason: outcome.reason } : {}),
    };
  } catch (error) {
    await audit({
      ...(eventRef ?? {}),
      status: "rejected",
      reason: describeError(error),
    });
    throw error;
  }
}

export function createInMemoryWebhookDedupStore(): WebhookDedupStore {
  const processed = new Set<string>();

  return {
    async has(provider, idempotencyKey) {
      return processed.has(`${provider}:${idempotencyKey}`);
    },
    async markProcessed(provider, idempotencyKey) {
      processed.add(`${provider}:${idempotencyKey}`);
    },
  };
}

export interface InMemoryWebhookAuditStore extends WebhookAuditStore {
  readonly records: WebhookAuditRecord[];
}

export function createInMemoryWebhookAuditStore(): InMemoryWebhookAuditStore {
  const records: WebhookAuditRecord[] = [];

  return {
    records,
    async saveRaw(record) {
      records.push(record);
    },
  };
}
