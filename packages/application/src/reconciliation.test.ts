import { describe, expect, it } from "vitest";
import { SubscriptionMismatchError } from "@billsync/domain";
import { createRecordingLogger } from "@billsync/shared";
import { createInMemoryBillingRecordStore } from "./billing-record-store.js";
import { MalformedPayloadError, UnknownCustomerError } from "./errors.js";
import { FakeBillingProvider } from "./fake-billing-provider.js";
import { createInMemoryPlanCatalog } from "./plan-catalog.js";
import { reconcileWebhookEvent, type ReconcileWebhookDeps } from "./reconciliation.js";
import {
  NOW,
  TEST_PLANS,
  cardAuthorized,
  createRecordingAnalyticsSink,
  lineItem,
  paymentSucceeded,
  seedBillingRecord,
  subscriptionCancelled,
} from "./test-fixtures.js";

function setup(overrides: Partial<ReconcileWebhookDeps> = {}) {
  const billingRecords = createInMemoryBillingRecordStore(() => NOW);
  const provider = new FakeBillingProvider();
  const analytics = createRecordingAnalyticsSink();
  const logger = createRecordingLogger();

  const deps: ReconcileWebhookDeps = {
    billingRecords,
    planCatalog: createInMemoryPlanCatalog(TEST_PLANS),
    provider,
    analytics,
    logger,
    now: () => NOW,
    ...overrides,
  };

  return { deps, billingRecords, provider, analytics, logger };
}

describe("webhook reconciliation", () => {
  it("activates an organization on its first paid invoice", async () => {
    const { deps, billingRecords, analytics } = setup();
    await seedBillingRecord(billingRecords, "org_1", {
      providerCustomerId: "cus_1",
      planKey: "growth",
      awaitingSetup: true,
    });

    const result = await reconcileWebhookEvent(deps, paymentSucceeded());

    expect(result).toEqual({ outcome: "applied", organizationId: "org_1", effects: 1 });
    expect(await billingRecords.get("org_1")).toMatchObject({
      awaitingSetup: false,
      periodEnd: "2026-04-10T12:00:00.000Z",
      providerSubscriptionId: "sub_1",
      providerSubscriptionItemId: "si_1",
      version: 3,
    });
    expect(analytics.captured).toEqual([
      {
        event: "billing subscription activated",
        organizationId: "org_1",
        properties: {
          plan_key: "growth",
          billing_period_ends: "2026-04-10T12:00:00.000Z",
          organization_id: "org_1",
        },
      },
    ]);
  });

  it("reports a redelivered invoice as a no-op without new effects", async () => {
    const { deps, billingRecords, analytics } = setup();
    await seedBillingRecord(billingRecords, "org_1", {
      providerCustomerId: "cus_1",
      planKey: "growth",
      awaitingSetup: true,
    });

    await reconcileWebhookEvent(deps, paymentSucceeded());
    const second = await reconcileWebhookEvent(deps, paymentSucceeded());

    expect(second).toEqual({
      outcome: "noop",
      organizationId: "org_1",
      reason: "payment already reconciled",
    });
    expect(analytics.captured).toHaveLength(1);
    expect((await billingRecords.get("org_1"))?.version).toBe(3);
  });

  it("ignores an unknown customer whose invoice has no catalog price", async () => {
    const { deps, billingRecords, logger } = setup();

    const result = await reconcileWebhookEvent(
      deps,
      paymentSucceeded({
        customerId: "cus_unknown",
        lineItems: [lineItem({ priceId: "price_other_product" })],
      }),
    );

    expect(result).toEqual({
      outcome: "ignored",
      reason:
        "Received invoice.payment_succeeded for cus_unknown but customer is not in the database.",
    });
    expect(logger.messages("warn")).toEqual([
      "Received invoice.payment_succeeded for cus_unknown but customer is not in the database.",
    ]);
    expect(await billingRecords.findByProviderCustomerId("cus_unknown")).toBeNull();
  });

  it("fails loudly for an unknown customer paying for a catalog plan", async () => {
    const { deps, logger } = setup();

    await expect(
      reconcileWebhookEvent(deps, paymentSucceeded({ customerId: "cus_ghost" })),
    ).rejects.toBeInstanceOf(UnknownCustomerError);
    expect(logger.messages("error")).toEqual([
      "Received invoice.payment_succeeded for cus_ghost but customer is not in the database.",
    ]);
  });

  it("provisions a metered subscription before activating the card", async () => {
    const { deps, billingRecords, provider, analytics } = setup();
    await seedBillingRecord(billingRecords, "org_m", {
      providerCustomerId: "cus_m",
      planKey: "metered",
      awaitingSetup: true,
    });

    const result = await reconcileWebhookEvent(
      deps,
      cardAuthorized({ customerId: "cus_m" }),
    );

    expect(result).toEqual({ outcome: "applied", organizationId: "org_m", effects: 3 });
    expect(provider.meteredSubscriptions).toEqual([
      {
        customerId: "cus_m",
        priceId: "price_metered",
        trialPeriodDays: 0,
        billingCycleAnchor: "2026-04-02T23:59:59.999Z",
        defaultPaymentMethodId: "pm_1",
        idempotencyKey: "sub-evt_card_1",
      },
    ]);
    expect(await billingRecords.get("org_m")).toMatchObject({
      awaitingSetup: false,
      providerSubscriptionId: "sub_fake_1",
      providerSubscriptionItemId: "si_fake_2",
      periodEnd: "2026-04-02T23:59:59.999Z",
    });
    expect(provider.cancelledAuthorizations).toEqual(["pi_1"]);
    expect(provider.defaultPaymentMethods).toEqual([
      { customerId: "cus_m", paymentMethodId: "pm_1" },
    ]);
    expect(analytics.captured.map((entry) => entry.event)).toEqual([
      "billing card validated",
    ]);
  });

  it("anchors a metered subscription after the configured trial", async () => {
    const { deps, billingRecords, provider } = setup({ trialPeriodDays: 30 });
    await seedBillingRecord(billingRecords, "org_m", {
      providerCustomerId: "cus_m",
      planKey: "metered",
      awaitingSetup: true,
    });

    await reconcileWebhookEvent(deps, cardAuthorized({ customerId: "cus_m" }));

    expect(provider.meteredSubscriptions[0]).toMatchObject({
      trialPeriodDays: 30,
      billingCycleAnchor: "2026-05-02T23:59:59.999Z",
    });
  });

  it("commits the record even when a side effect fails", async () => {
    const { deps, billingRecords, provider, analytics, logger } = setup();
    await seedBillingRecord(billingRecords, "org_s", {
      providerCustomerId: "cus_s",
      planKey: "startup",
      awaitingSetup: true,
    });
    provider.failNext("cancelPaymentAuthorization", new Error("network down"));

    const result = await reconcileWebhookEvent(
      deps,
      cardAuthorized({ customerId: "cus_s" }),
    );

    expect(result.outcome).toBe("applied");
    expect(await billingRecords.get("org_s")).toMatchObject({
      awaitingSetup: false,
      periodEnd: "2027-03-10T12:00:00.000Z",
    });
    expect(logger.messages("warn")).toEqual(["Billing side effect failed"]);
    expect(provider.defaultPaymentMethods).toHaveLength(1);
    expect(analytics.captured).toHaveLength(1);
  });

  it("rejects drift between the stored and incoming subscription", async () => {
    const { deps, billingRecords, logger } = setup();
    const seeded = await seedBillingRecord(billingRecords, "org_1", {
      providerCustomerId: "cus_1",
      planKey: "growth",
      providerSubscriptionId: "sub_other",
      periodEnd: "2026-04-01T00:00:00.000Z",
    });

    await expect(
      reconcileWebhookEvent(deps, subscriptionCancelled()),
    ).rejects.toBeInstanceOf(SubscriptionMismatchError);

    expect(await billingRecords.get("org_1")).toEqual(seeded);
    expect(logger.messages("error")).toEqual([
      "Webhook subscription sub_1 does not match subscription on file sub_other",
    ]);
  });

  it("maps a line item without period end to a malformed payload", async () => {
    const { deps, billingRecords } = setup();
    await seedBillingRecord(billingRecords, "org_1", {
      providerCustomerId: "cus_1",
      planKey: "growth",
      awaitingSetup: true,
    });

    await expect(
      reconcileWebhookEvent(
        deps,
        paymentSucceeded({ lineItems: [lineItem({ periodEnd: null })] }),
      ),
    ).rejects.toBeInstanceOf(MalformedPayloadError);
  });

  it("logs a warning when several line items arrive without a stored item", async () => {
    const { deps, billingRecords, logger } = setup();
    await seedBillingRecord(billingRecords, "org_1", {
      providerCustomerId: "cus_1",
      planKey: "growth",
      awaitingSetup: true,
    });

    await reconcileWebhookEvent(
      deps,
      paymentSucceeded({
        lineItems: [lineItem(), lineItem({ subscriptionItemId: "si_2" })],
      }),
    );

    expect(logger.messages("warn")).toEqual([
      "Stripe invoice.payment_succeeded webhook contained more than 1 item (2); using the first one",
    ]);
  });

  it("ignores provider events outside the billing flow", async () => {
    const { deps } = setup();

    await expect(
      reconcileWebhookEvent(deps, {
        kind: "unhandled",
        idempotencyKey: "evt_x",
        providerEventType: "charge.refunded",
        raw: {},
      }),
    ).resolves.toEqual({
      outcome: "ignored",
      reason: "Unhandled event type charge.refunded",
    });
  });
});
