import type {
  BillingRecord,
  CardAuthorizedEvent,
  PaymentSucceededEvent,
  Plan,
  SubscriptionCancelledEvent,
  WebhookLineItem,
} from "@billsync/contracts";
import { createEmptyBillingRecord } from "./billing-record.js";

export const NOW = "2026-03-10T12:00:00.000Z";

export function makePlan(overrides: Partial<Plan> = {}): Plan {
  return {
    key: "growth",
    name: "Growth",
    priceId: "price_growth",
    eventAllowance: 1_000_000,
    isMetered: false,
    selfServe: true,
    isActive: true,
    defaultAwaitingSetup: true,
    customSetupBillingMessage: null,
    imageUrl: null,
    priceString: "$29/month",
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<BillingRecord> = {}): BillingRecord {
  return {
    ...createEmptyBillingRecord("org_1", "2026-03-01T00:00:00.000Z"),
    providerCustomerId: "cus_1",
    ...overrides,
  };
}

export function makeLine(overrides: Partial<WebhookLineItem> = {}): WebhookLineItem {
  return {
    amount: 2900,
    periodEnd: "2026-04-10T12:00:00.000Z",
    subscriptionItemId: "si_1",
    subscriptionId: "sub_A",
    priceId: "price_growth",
    ...overrides,
  };
}

export function makePaymentSucceeded(
  overrides: Partial<PaymentSucceededEvent> = {},
): PaymentSucceededEvent {
  return {
    kind: "payment_succeeded",
    idempotencyKey: "evt_paid_1",
    providerEventType: "invoice.payment_succeeded",
    raw: {},
    customerId: "cus_1",
    subscriptionId: "sub_A",
    lineItems: [makeLine()],
    ...overrides,
  };
}

export function makeCardAuthorized(
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

export function makeSubscriptionCancelled(
  overrides: Partial<SubscriptionCancelledEvent> = {},
): SubscriptionCancelledEvent {
  return {
    kind: "subscription_cancelled",
    idempotencyKey: "evt_cancel_1",
    providerEventType: "customer.subscription.deleted",
    raw: {},
    customerId: "cus_1",
    subscriptionId: "sub_A",
    ...overrides,
  };
}
