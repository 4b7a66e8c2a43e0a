import type {
  BillingAnalyticsEventName,
  BillingAnalyticsProperties,
  BillingRecord,
  CardAuthorizedEvent,
  PaymentSucceededEvent,
  Plan,
  SubscriptionCancelledEvent,
  WebhookLineItem,
} from "@billsync/contracts";
import {
  updateBillingRecordWithRetry,
  type BillingRecordStore,
} from "./billing-record-store.js";
import type { AnalyticsSink } from "./provider.js";

export const NOW = "2026-03-10T12:00:00.000Z";

function plan(overrides: Partial<Plan> & Pick<Plan, "key" | "priceId">): Plan {
  return {
    name: overrides.key,
    eventAllowance: 1_000_000,
    isMetered: false,
    selfServe: true,
    isActive: true,
    defaultAwaitingSetup: true,
    customSetupBillingMessage: null,
    imageUrl: null,
    priceString: null,
    ...overrides,
  };
}

export const TEST_PLANS: readonly Plan[] = [
  plan({ key: "growth", name: "Growth", priceId: "price_growth", priceString: "$29/month" }),
  plan({ key: "startup", name: "Startup", priceId: "price_startup", eventAllowance: null }),
  plan({
    key: "metered",
    name: "Pay as you go",
    priceId: "price_metered",
    isMetered: true,
    eventAllowance: null,
  }),
  plan({ key: "enterprise", name: "Enterprise", priceId: "price_enterprise", selfServe: false }),
  plan({ key: "legacy", name: "Legacy", priceId: "price_legacy", isActive: false }),
];

export async function seedBillingRecord(
  store: BillingRecordStore,
  organizationId: string,
  patch: Partial<Omit<BillingRecord, "organizationId" | "version">>,
): Promise<BillingRecord> {
  const { record } = await updateBillingRecordWithRetry(
    store,
    organizationId,
    (current) => ({ ...current, ...patch }),
  );
  return record;
}

export interface CapturedAnalyticsEvent {
  event: BillingAnalyticsEventName;
  organizationId: string;
  properties: BillingAnalyticsProperties;
}

export function createRecordingAnalyticsSink(): AnalyticsSink & {
  captured: CapturedAnalyticsEvent[];
} {
  const captured: CapturedAnalyticsEvent[] = [];
  return {
    captured,
    capture(event, organizationId, properties) {
      captured.push({ event, organizationId, properties });
    },
  };
}

export function lineItem(overrides: Partial<WebhookLineItem> = {}): WebhookLineItem {
  return {
    amount: 2900,
    periodEnd: "2026-04-10T12:00:00.000Z",
    subscriptionItemId: "si_1",
    subscriptionId: "sub_1",
    priceId: "price_growth",
    ...overrides,
  };
}

export function paymentSucceeded(
  overrides: Partial<PaymentSucceededEvent> = {},
): PaymentSucceededEvent {
  return {
    kind: "payment_succeeded",
    idempotencyKey: "evt_paid_1",
    providerEventType: "invoice.payment_succeeded",
    raw: {},
    customerId: "cus_1",
    subscriptionId: "sub_1",
    lineItems: [lineItem()],
    ...overrides,
  };
}

export function cardAuthorized(
  overrides: Partial<CardAuthorizedEvent> = {},
): CardAuthorizedEvent {
  return {
    kind: "card_authorized",
    idempotencyKey: "evt_card_1",
    providerEventType: "payment_intent.amount_capturable_updated",
    raw: {},
    customerId: "cus_1",
    paymentIntentId: "pi_1",
    paymentMethodId: "pm_1",
    ...overrides,
  };
}

export function subscriptionCancelled(
  overrides: Partial<SubscriptionCancelledEvent> = {},
): SubscriptionCancelledEvent {
  return {
    kind: "subscription_cancelled",
    idempotencyKey: "evt_cancel_1",
    providerEventType: "customer.subscription.deleted",
    raw: {},
    customerId: "cus_1",
    subscriptionId: "sub_1",
    ...overrides,
  };
}
