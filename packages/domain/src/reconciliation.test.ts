import { describe, expect, it } from "vitest";
import { deriveBillingState } from "./billing-record.js";
import {
  BillingDomainError,
  MalformedLineItemError,
  SubscriptionMismatchError,
} from "./errors.js";
import { reconcileBillingEvent, type ReconciliationDecision } from "./reconciliation.js";
import {
  NOW,
  makeCardAuthorized,
  makeLine,
  makePaymentSucceeded,
  makePlan,
  makeRecord,
  makeSubscriptionCancelled,
} from "./test-fixtures.js";

function expectApply(decision: ReconciliationDecision) {
  if (decision.outcome !== "apply") {
    throw new Error(`Expected apply, got noop: ${decision.reason}`);
  }
  return decision;
}

describe("payment succeeded reconciliation", () => {
  const awaiting = makeRecord({ planKey: "growth", awaitingSetup: true });

  it("activates an organization awaiting setup", () => {
    const decision = expectApply(
      reconcileBillingEvent({
        record: awaiting,
        plan: makePlan(),
        event: makePaymentSucceeded(),
        now: NOW,
      }),
    );

    expect(decision.next).toMatchObject({
      awaitingSetup: false,
      periodEnd: "2026-04-10T12:00:00.000Z",
      providerSubscriptionId: "sub_A",
      providerSubscriptionItemId: "si_1",
      updatedAt: NOW,
    });
    expect(deriveBillingState(decision.next, NOW)).toBe("active");
    expect(decision.effects).toEqual([
      {
        type: "capture_analytics",
        event: "billing subscription activated",
        organizationId: "org_1",
        properties: {
          plan_key: "growth",
          billing_period_ends: "2026-04-10T12:00:00.000Z",
          organization_id: "org_1",
        },
      },
    ]);
    expect(decision.warnings).toEqual([]);
  });

  it("treats a redelivered payment as a no-op", () => {
    const first = expectApply(
      reconcileBillingEvent({
        record: awaiting,
        plan: makePlan(),
        event: makePaymentSucceeded(),
        now: NOW,
      }),
    );

    const second = reconcileBillingEvent({
      record: first.next,
      plan: makePlan(),
      event: makePaymentSucceeded(),
      now: "2026-03-10T12:05:00.000Z",
    });

    expect(second).toEqual({
      outcome: "noop",
      reason: "payment already reconciled",
      warnings: [],
    });
  });

  it("extends the period on renewal and reports it as paid", () => {
    const active = makeRecord({
      planKey: "growth",
      periodEnd: "2026-04-10T12:00:00.000Z",
      providerSubscriptionId: "sub_A",
      providerSubscriptionItemId: "si_1",
    });

    const decision = expectApply(
      reconcileBillingEvent({
        record: active,
        plan: makePlan(),
        event: makePaymentSucceeded({
          lineItems: [makeLine({ periodEnd: "2026-05-10T12:00:00.000Z" })],
        }),
        now: NOW,
      }),
    );

    expect(decision.next.periodEnd).toBe("2026-05-10T12:00:00.000Z");
    expect(decision.effects).toHaveLength(1);
    expect(decision.effects[0]).toMatchObject({
      type: "capture_analytics",
      event: "billing subscription paid",
    });
  });

  it("never moves the period end backwards for an older renewal", () => {
    const active = makeRecord({
      planKey: "growth",
      periodEnd: "2026-05-10T12:00:00.000Z",
      providerSubscriptionId: "sub_A",
      providerSubscriptionItemId: "si_1",
    });

    const decision = reconcileBillingEvent({
      record: active,
      plan: makePlan(),
      event: makePaymentSucceeded(),
      now: NOW,
    });

    expect(decision.outcome).toBe("noop");
  });

  it("rejects a payment for a different subscription", () => {
    const record = makeRecord({
      planKey: "growth",
      providerSubscriptionId: "sub_B",
    });

    expect(() =>
      reconcileBillingEvent({
        record,
        plan: makePlan(),
        event: makePaymentSucceeded(),
        now: NOW,
      }),
    ).toThrow(SubscriptionMismatchError);
  });

  it("rejects a payment whose line items miss the stored subscription item", () => {
    const record = makeRecord({
      planKey: "growth",
      providerSubscriptionItemId: "si_stored",
    });

    expect(() =>
      reconcileBillingEvent({
        record,
        plan: makePlan(),
        event: makePaymentSucceeded(),
        now: NOW,
      }),
    ).toThrow("Stripe webhook does not match subscription on file");
  });

  it("matches the stored subscription item among several lines", () => {
    const record = makeRecord({
      planKey: "growth",
      awaitingSetup: true,
      providerSubscriptionItemId: "si_2",
    });

    const decision = expectApply(
      reconcileBillingEvent({
        record,
        plan: makePlan(),
        event: makePaymentSucceeded({
          lineItems: [
            makeLine({ subscriptionItemId: "si_other", periodEnd: "2026-09-01T00:00:00.000Z" }),
            makeLine({ subscriptionItemId: "si_2", periodEnd: "2026-04-02T00:00:00.000Z" }),
          ],
        }),
        now: NOW,
      }),
    );

    expect(decision.next.periodEnd).toBe("2026-04-02T00:00:00.000Z");
    expect(decision.warnings).toEqual([]);
  });

  it("uses the first line with a warning when no item is stored", () => {
    const decision = expectApply(
      reconcileBillingEvent({
        record: awaiting,
        plan: makePlan(),
        event: makePaymentSucceeded({
          lineItems: [
            makeLine({ subscriptionItemId: "si_first" }),
            makeLine({ subscriptionItemId: "si_second", periodEnd: "2026-09-01T00:00:00.000Z" }),
          ],
        }),
        now: NOW,
      }),
    );

    expect(decision.next.providerSubscriptionItemId).toBe("si_first");
    expect(decision.next.periodEnd).toBe("2026-04-10T12:00:00.000Z");
    expect(decision.warnings).toEqual([
      "Stripe invoice.payment_succeeded webhook contained more than 1 item (2); using the first one",
    ]);
  });

  it("fails on a line item without a period end", () => {
    expect(() =>
      reconcileBillingEvent({
        record: awaiting,
        plan: makePlan(),
        event: makePaymentSucceeded({ lineItems: [makeLine({ periodEnd: null })] }),
        now: NOW,
      }),
    ).toThrow(MalformedLineItemError);
  });
});

describe("card authorization reconciliation", () => {
  const startupPlan = makePlan({ key: "startup", name: "Startup", priceId: "price_startup" });
  const meteredPlan = makePlan({ key: "metered", name: "Metered", priceId: "price_metered", isMetered: true });

  it("grants a year of access for a validation plan and releases the hold", () => {
    const record = makeRecord({ planKey: "startup", awaitingSetup: true });

    const decision = expectApply(
      reconcileBillingEvent({
        record,
        plan: startupPlan,
        event: makeCardAuthorized(),
        now: NOW,
      }),
    );

    expect(decision.next.awaitingSetup).toBe(false);
    expect(decision.next.periodEnd).toBe("2027-03-10T12:00:00.000Z");
    expect(decision.effects).toEqual([
      { type: "cancel_authorization", paymentIntentId: "pi_1" },
      { type: "set_default_payment_method", customerId: "cus_1", paymentMethodId: "pm_1" },
      {
        type: "capture_analytics",
        event: "billing card validated",
        organizationId: "org_1",
        properties: {
          plan_key: "startup",
          billing_period_ends: "2027-03-10T12:00:00.000Z",
          organization_id: "org_1",
        },
      },
    ]);
  });

  it("skips the default payment method when the intent carries none", () => {
    const record = makeRecord({ planKey: "startup", awaitingSetup: true });

    const decision = expectApply(
      reconcileBillingEvent({
        record,
        plan: startupPlan,
        event: makeCardAuthorized({ paymentMethodId: null }),
        now: NOW,
      }),
    );

    expect(decision.effects.map((effect) => effect.type)).toEqual([
      "cancel_authorization",
      "capture_analytics",
    ]);
  });

  it("stores the provisioned subscription for a metered plan", () => {
    const record = makeRecord({ planKey: "metered", awaitingSetup: true });

    const decision = expectApply(
      reconcileBillingEvent({
        record,
        plan: meteredPlan,
        event: makeCardAuthorized(),
        now: NOW,
        provisionedSubscription: {
          subscriptionId: "sub_metered",
          subscriptionItemId: "si_metered",
          currentPeriodEnd: "2026-04-02T23:59:59.000Z",
        },
      }),
    );

    expect(decision.next).toMatchObject({
      awaitingSetup: false,
      providerSubscriptionId: "sub_metered",
      providerSubscriptionItemId: "si_metered",
      periodEnd: "2026-04-02T23:59:59.000Z",
    });
  });

  it("requires a provisioned subscription for a metered plan", () => {
    const record = makeRecord({ planKey: "metered", awaitingSetup: true });

    try {
      reconcileBillingEvent({
        record,
        plan: meteredPlan,
        event: makeCardAuthorized(),
        now: NOW,
      });
      expect.fail("expected reconciliation to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(BillingDomainError);
      expect(error).toMatchObject({ code: "missing_provisioned_subscription" });
    }
  });

  it("ignores authorizations for subscription plans", () => {
    const record = makeRecord({ planKey: "growth", awaitingSetup: true });

    expect(
      reconcileBillingEvent({
        record,
        plan: makePlan(),
        event: makeCardAuthorized(),
        now: NOW,
      }),
    ).toEqual({
      outcome: "noop",
      reason: "plan growth does not use card authorization",
      warnings: [],
    });
  });

  it("ignores a second authorization once the card is validated", () => {
    const record = makeRecord({
      planKey: "startup",
      awaitingSetup: false,
      periodEnd: "2027-03-10T12:00:00.000Z",
    });

    expect(
      reconcileBillingEvent({
        record,
        plan: startupPlan,
        event: makeCardAuthorized(),
        now: NOW,
      }),
    ).toEqual({ outcome: "noop", reason: "card already validated", warnings: [] });
  });
});

describe("subscription cancellation reconciliation", () => {
  const active = makeRecord({
    planKey: "growth",
    periodEnd: "2026-04-10T12:00:00.000Z",
    providerSubscriptionId: "sub_A",
    providerSubscriptionItemId: "si_1",
  });

  it("ends access now and clears the subscription item", () => {
    const decision = expectApply(
      reconcileBillingEvent({
        record: active,
        plan: makePlan(),
        event: makeSubscriptionCancelled(),
        now: NOW,
      }),
    );

    expect(decision.next.periodEnd).toBe(NOW);
    expect(decision.next.providerSubscriptionItemId).toBeNull();
    expect(deriveBillingState(decision.next, NOW)).toBe("expired");
    expect(decision.effects[0]).toMatchObject({
      event: "billing subscription cancelled",
    });
  });

  it("treats a repeated cancellation as a no-op", () => {
    const first = expectApply(
      reconcileBillingEvent({
        record: active,
        plan: makePlan(),
        event: makeSubscriptionCancelled(),
        now: NOW,
      }),
    );

    expect(
      reconcileBillingEvent({
        record: first.next,
        plan: makePlan(),
        event: makeSubscriptionCancelled(),
        now: "2026-03-10T13:00:00.000Z",
      }),
    ).toEqual({ outcome: "noop", reason: "subscription already expired", warnings: [] });
  });

  it("rejects a cancellation for another subscription", () => {
    expect(() =>
      reconcileBillingEvent({
        record: active,
        plan: makePlan(),
        event: makeSubscriptionCancelled({ subscriptionId: "sub_other" }),
        now: NOW,
      }),
    ).toThrow(SubscriptionMismatchError);
  });
});
