import type {
  BillingAnalyticsEventName,
  BillingRecord,
  BillingSideEffect,
  CardAuthorizedEvent,
  CustomerScopedWebhookEvent,
  PaymentSucceededEvent,
  Plan,
  ProvisionedSubscription,
  SubscriptionCancelledEvent,
  WebhookLineItem,
} from "@billsync/contracts";
import { addDaysToIso, earlierOf, isBefore, laterOf } from "@billsync/shared";

import { hasBillingRecordChanged } from "./billing-record.js";
import {
  BillingDomainError,
  MalformedLineItemError,
  SubscriptionMismatchError,
} from "./errors.js";
import {
  CARD_VALIDATION_GRANT_DAYS,
  DEFAULT_CARD_VALIDATION_PLAN_KEYS,
  resolveCheckoutMode,
} from "./plan.js";

export interface ReconciliationContext {
  record: BillingRecord;
  plan: Plan | null;
  event: CustomerScopedWebhookEvent;
  now: string;
  provisionedSubscription?: ProvisionedSubscription | null;
  cardValidationPlanKeys?: readonly string[];
  validationGrantDays?: number;
}

export type ReconciliationDecision =
  | {
      outcome: "apply";
      next: BillingRecord;
      effects: BillingSideEffect[];
      warnings: string[];
    }
  | { outcome: "noop"; reason: string; warnings: string[] };

function noop(reason: string, warnings: string[] = []): ReconciliationDecision {
  return { outcome: "noop", reason, warnings };
}

function analyticsEffect(
  event: BillingAnalyticsEventName,
  next: BillingRecord,
): BillingSideEffect {
  return {
    type: "capture_analytics",
    event,
    organizationId: next.organizationId,
    properties: {
      plan_key: next.planKey,
      billing_period_ends: next.periodEnd,
      organization_id: next.organizationId,
    },
  };
}

function assertSameSubscription(
  record: BillingRecord,
  incomingSubscriptionId: string | null,
): void {
  if (
    record.providerSubscriptionId !== null &&
    incomingSubscriptionId !== null &&
    record.providerSubscriptionId !== incomingSubscriptionId
  ) {
    throw new SubscriptionMismatchError(
      `Webhook subscription ${incomingSubscriptionId} does not match subscription on file ${record.providerSubscriptionId}`,
      {
        organizationId: record.organizationId,
        expectedSubscriptionId: record.providerSubscriptionId,
        receivedSubscriptionId: incomingSubscriptionId,
      },
    );
  }
}

function selectLineItem(
  record: BillingRecord,
  event: PaymentSucceededEvent,
): { line: WebhookLineItem; warnings: string[] } {
  if (record.providerSubscriptionItemId !== null) {
    const match = event.lineItems.find(
      (line) => line.subscriptionItemId === record.providerSubscriptionItemId,
    );

    if (!match) {
      throw new SubscriptionMismatchError(
        "Stripe webhook does not match subscription on file",
        {
          organizationId: record.organizationId,
          expectedSubscriptionItemId: record.providerSubscriptionItemId,
          receivedSubscriptionItemIds: event.lineItems.map(
            (line) => line.subscriptionItemId,
          ),
        },
      );
    }

    return { line: match, warnings: [] };
  }

  const [first] = event.lineItems;
  if (!first) {
    throw new MalformedLineItemError("Payment event has no line items", {
      organizationId: record.organizationId,
    });
  }

  const warnings =
    event.lineItems.length > 1
      ? [
          `Stripe ${event.providerEventType} webhook contained more than 1 item (${event.lineItems.length}); using the first one`,
        ]
      : [];

  return { line: first, warnings };
}

function reconcilePaymentSucceeded(
  record: BillingRecord,
  event: PaymentSucceededEvent,
  now: string,
): ReconciliationDecision {
  const { line, warnings } = selectLineItem(record, event);
  const incomingSubscriptionId = line.subscriptionId ?? event.subscriptionId;

  assertSameSubscription(record, incomingSubscriptionId);

  if (line.periodEnd === null) {
    throw new MalformedLineItemError("Line item has no period end", {
      organizationId: record.organizationId,
      subscriptionItemId: line.subscriptionItemId,
    });
  }

  // out-of-order renewals never move the period backwards
  const periodEnd =
    record.periodEnd === null
      ? line.periodEnd
      : laterOf(record.periodEnd, line.periodEnd);

  const next: BillingRecord = {
    ...record,
    awaitingSetup: false,
    periodEnd,
    providerSubscriptionId:
      record.providerSubscriptionId ?? incomingSubscriptionId,
    providerSubscriptionItemId:
      record.providerSubscriptionItemId ?? line.subscriptionItemId,
    updatedAt: now,
  };

  if (!hasBillingRecordChanged(record, next)) {
    return noop("payment already reconciled", warnings);
  }

  const initial = record.awaitingSetup || record.periodEnd === null;

  return {
    outcome: "apply",
    next,
    effects: [
      analyticsEffect(
        initial ? "billing subscription activated" : "billing subscription paid",
        next,
      ),
    ],
    warnings,
  };
}

function reconcileCardAuthorized(
  context: ReconciliationContext,
  event: CardAuthorizedEvent,
): ReconciliationDecision {
  const { record, plan, now } = context;

  if (plan === null || record.planKey === null) {
    return noop("no plan assigned to organization");
  }

  const mode = resolveCheckoutMode(
    plan,
    context.cardValidationPlanKeys ?? DEFAULT_CARD_VALIDATION_PLAN_KEYS,
  );
  if (mode !== "card_authorization") {
    return noop(`plan ${plan.key} does not use card authorization`);
  }

  if (!record.awaitingSetup) {
    return noop("card already validated");
  }

  let next: BillingRecord;

  if (plan.isMetered) {
    const provisioned = context.provisionedSubscription;
    if (!provisioned) {
      throw new BillingDomainError(
        "missing_provisioned_subscription",
        "Metered plan activation requires a provisioned subscription",
        { organizationId: record.organizationId, planKey: plan.key },
      );
    }

    next = {
      ...record,
      providerSubscriptionId: provisioned.subscriptionId,
      providerSubscriptionItemId: provisioned.subscriptionItemId,
      periodEnd: provisioned.currentPeriodEnd ?? record.periodEnd,
      awaitingSetup: false,
      updatedAt: now,
    };
  } else {
    next = {
      ...record,
      periodEnd: addDaysToIso(
        now,
        context.validationGrantDays ?? CARD_VALIDATION_GRANT_DAYS,
      ),
      awaitingSetup: false,
      updatedAt: now,
    };
  }

  const effects: BillingSideEffect[] = [
    { type: "cancel_authorization", paymentIntentId: event.paymentIntentId },
  ];

  if (event.paymentMethodId !== null) {
    effects.push({
      type: "set_default_payment_method",
      customerId: event.customerId,
      paymentMethodId: event.paymentMethodId,
    });
  }

  effects.push(analyticsEffect("billing card validated", next));

  return { outcome: "apply", next, effects, warnings: [] };
}

function reconcileSubscriptionCancelled(
  record: BillingRecord,
  event: SubscriptionCancelledEvent,
  now: string,
): ReconciliationDecision {
  assertSameSubscription(record, event.subscriptionId);

  const alreadyExpired =
    !record.awaitingSetup &&
    record.providerSubscriptionItemId === null &&
    record.periodEnd !== null &&
    !isBefore(now, record.periodEnd);

  if (alreadyExpired) {
    return noop("subscription already expired");
  }

  const next: BillingRecord = {
    ...record,
    providerSubscriptionId: record.providerSubscriptionId ?? event.subscriptionId,
    providerSubscriptionItemId: null,
    awaitingSetup: false,
    periodEnd: record.periodEnd === null ? now : earlierOf(record.periodEnd, now),
    updatedAt: now,
  };

  return {
    outcome: "apply",
    next,
    effects: [analyticsEffect("billing subscription cancelled", next)],
    warnings: [],
  };
}

export function reconcileBillingEvent(
  context: ReconciliationContext,
): ReconciliationDecision {
  const { event } = context;

  switch (event.kind) {
    case "payment_succeeded":
      return reconcilePaymentSucceeded(context.record, event, context.now);
    case "card_authorized":
      return reconcileCardAuthorized(context, event);
    case "subscription_cancelled":
      return reconcileSubscriptionCancelled(context.record, event, context.now);
    default: {
      const exhaustive: never = event;
      return exhaustive;
    }
  }
}
