import type { BillingRecord, BillingState, Plan } from "@billsync/contracts";
import { addSecondsToIso, isBefore } from "@billsync/shared";

export const CHECKOUT_SESSION_TTL_HOURS = 24;

export function createEmptyBillingRecord(
  organizationId: string,
  now: string,
): BillingRecord {
  return {
    organizationId,
    providerCustomerId: null,
    providerSubscriptionId: null,
    providerSubscriptionItemId: null,
    checkoutSessionId: null,
    checkoutSessionCreatedAt: null,
    planKey: null,
    awaitingSetup: false,
    periodEnd: null,
    version: 1,
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * Billing state is never stored. Expiry is lazy: a record whose period end
 * has passed reads as expired without any event having been received.
 */
export function deriveBillingState(
  record: BillingRecord,
  now: string,
): BillingState {
  if (record.planKey === null) return "no_plan";
  if (record.awaitingSetup) return "awaiting_setup";
  if (record.periodEnd !== null && isBefore(now, record.periodEnd)) {
    return "active";
  }
  return "expired";
}

export function isBillingActive(record: BillingRecord, now: string): boolean {
  return deriveBillingState(record, now) === "active";
}

export function isCheckoutSessionReusable(
  record: BillingRecord,
  now: string,
  ttlHours = CHECKOUT_SESSION_TTL_HOURS,
): boolean {
  if (!record.checkoutSessionId || !record.checkoutSessionCreatedAt) {
    return false;
  }

  const expiresAt = addSecondsToIso(
    record.checkoutSessionCreatedAt,
    ttlHours * 3600,
  );
  return isBefore(now, expiresAt);
}

export function recordCheckoutSession(
  record: BillingRecord,
  input: { sessionId: string; customerId: string; createdAt: string },
): BillingRecord {
  return {
    ...record,
    providerCustomerId: input.customerId,
    checkoutSessionId: input.sessionId,
    checkoutSessionCreatedAt: input.createdAt,
    updatedAt: input.createdAt,
  };
}

export interface AssignPlanOptions {
  awaitingSetup: boolean;
  now: string;
  // drops subscription references from a lapsed enrollment
  resetSubscription?: boolean;
}

export function assignPlan(
  record: BillingRecord,
  plan: Plan,
  options: AssignPlanOptions,
): BillingRecord {
  const planChanged = record.planKey !== plan.key;

  return {
    ...record,
    planKey: plan.key,
    awaitingSetup: options.awaitingSetup,
    ...(planChanged
      ? { checkoutSessionId: null, checkoutSessionCreatedAt: null }
      : {}),
    ...(options.resetSubscription
      ? { providerSubscriptionId: null, providerSubscriptionItemId: null }
      : {}),
    updatedAt: options.now,
  };
}

export function hasBillingRecordChanged(
  current: BillingRecord,
  next: BillingRecord,
): boolean {
  return (
    current.providerCustomerId !== next.providerCustomerId ||
    current.providerSubscriptionId !== next.providerSubscriptionId ||
    current.providerSubscriptionItemId !== next.providerSubscriptionItemId ||
    current.checkoutSessionId !== next.checkoutSessionId ||
    current.checkoutSessionCreatedAt !== next.checkoutSessionCreatedAt ||
    current.planKey !== next.planKey ||
    current.awaitingSetup !== next.awaitingSetup ||
    current.periodEnd !== next.periodEnd
  );
}
