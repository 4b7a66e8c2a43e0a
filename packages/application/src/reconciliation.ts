import type {
  BillingRecord,
  CardAuthorizedEvent,
  CustomerScopedWebhookEvent,
  ParsedWebhookEvent,
  Plan,
  ProvisionedSubscription,
} from "@billsync/contracts";
import {
  BillingDomainError,
  SubscriptionMismatchError,
  computeBillingCycleAnchor,
  reconcileBillingEvent,
  type ReconciliationDecision,
} from "@billsync/domain";
import { utcNowIso, type Logger } from "@billsync/shared";
import {
  updateBillingRecordWithRetry,
  type BillingRecordStore,
} from "./billing-record-store.js";
import {
  InternalError,
  MalformedPayloadError,
  UnknownCustomerError,
} from "./errors.js";
import type { PlanCatalog } from "./plan-catalog.js";
import type { AnalyticsSink, BillingProvider } from "./provider.js";
import { dispatchSideEffects } from "./side-effects.js";

export interface ReconcileWebhookDeps {
  billingRecords: BillingRecordStore;
  planCatalog: PlanCatalog;
  provider: BillingProvider;
  analytics: AnalyticsSink;
  logger: Logger;
  now?: () => string;
  trialPeriodDays?: number;
  cardValidationPlanKeys?: readonly string[];
}

export type ReconcileWebhookResult =
  | { outcome: "applied"; organizationId: string; effects: number }
  | { outcome: "noop"; organizationId: string; reason: string }
  | { outcome: "ignored"; reason: string };

function unknownCustomerMessage(event: CustomerScopedWebhookEvent): string {
  return `Received ${event.providerEventType} for ${event.customerId} but customer is not in the database.`;
}

/** Whether any price on the event belongs to a plan this service sells. */
async function referencesCatalogPrice(
  catalog: PlanCatalog,
  event: CustomerScopedWebhookEvent,
): Promise<boolean> {
  if (event.kind !== "payment_succeeded") return false;

  for (const line of event.lineItems) {
    if (line.priceId !== null && (await catalog.findByPriceId(line.priceId))) {
      return true;
    }
  }
  return false;
}

function needsProvisionedSubscription(
  record: BillingRecord,
  plan: Plan | null,
  event: CustomerScopedWebhookEvent,
): event is CardAuthorizedEvent {
  return (
    event.kind === "card_authorized" &&
    plan !== null &&
    plan.isMetered &&
    record.awaitingSetup
  );
}

async function provisionMeteredSubscription(
  deps: ReconcileWebhookDeps,
  plan: Plan,
  event: CardAuthorizedEvent,
  now: string,
): Promise<ProvisionedSubscription> {
  const trialPeriodDays = deps.trialPeriodDays ?? 0;

  return deps.provider.createMeteredSubscription({
    customerId: event.customerId,
    priceId: plan.priceId,
    trialPeriodDays,
    billingCycleAnchor: computeBillingCycleAnchor(now, trialPeriodDays),
    defaultPaymentMethodId: event.paymentMethodId,
    idempotencyKey: `sub-${event.idempotencyKey}`,
  });
}

export async function reconcileWebhookEvent(
  deps: ReconcileWebhookDeps,
  event: ParsedWebhookEvent,
): Promise<ReconcileWebhookResult> {
  if (event.kind === "unhandled") {
    return {
      outcome: "ignored",
      reason: `Unhandled event type ${event.providerEventType}`,
    };
  }

  const now = (deps.now ?? utcNowIso)();
  const record = await deps.billingRecords.findByProviderCustomerId(
    event.customerId,
  );

  if (!record) {
    const message = unknownCustomerMessage(event);

    if (await referencesCatalogPrice(deps.planCatalog, event)) {
      deps.logger.error(message, {
        customerId: event.customerId,
        idempotencyKey: event.idempotencyKey,
      });
      throw new UnknownCustomerError(event.customerId, message);
    }

    deps.logger.warn(message, {
      customerId: event.customerId,
      idempotencyKey: event.idempotencyKey,
    });
    return { outcome: "ignored", reason: message };
  }

  const organizationId = record.organizationId;
  const plan =
    record.planKey !== null
      ? await deps.planCatalog.findByKey(record.planKey)
      : null;

  const provisionedSubscription =
    plan !== null && needsProvisionedSubscription(record, plan, event)
      ? await provisionMeteredSubscription(deps, plan, event, now)
      : null;

  const captured: { decision: ReconciliationDecision | null } = {
    decision: null,
  };

  try {
    await updateBillingRecordWithRetry(
      deps.billingRecords,
      organizationId,
      (current) => {
        const decision = reconcileBillingEvent({
          record: current,
          plan,
          event,
          now,
          provisionedSubscription,
          ...(deps.cardValidationPlanKeys !== undefined
            ? { cardValidationPlanKeys: deps.cardValidationPlanKeys }
            : {}),
        });
        captured.decision = decision;
        return decision.outcome === "apply" ? decision.next : null;
      },
    );
  } catch (error) {
    if (error instanceof SubscriptionMismatchError) {
      deps.logger.error(error.message, {
        organizationId,
        idempotencyKey: event.idempotencyKey,
        ...(error.details ?? {}),
      });
      throw error;
    }
    if (
      error instanceof BillingDomainError &&
      error.code === "malformed_line_item"
    ) {
      throw new MalformedPayloadError(error.message, error.details);
    }
    throw error;
  }

  const decision = captured.decision;
  if (decision === null) {
    throw new InternalError("Reconciliation produced no decision", {
      organizationId,
    });
  }

  for (const warning of decision.warnings) {
    deps.logger.warn(warning, {
      organizationId,
      idempotencyKey: event.idempotencyKey,
    });
  }

  if (decision.outcome === "noop") {
    deps.logger.info("Billing event already reconciled", {
      organizationId,
      kind: event.kind,
      reason: decision.reason,
    });
    return { outcome: "noop", organizationId, reason: decision.reason };
  }

  await dispatchSideEffects(deps, decision.effects, {
    organizationId,
    idempotencyKey: event.idempotencyKey,
  });

  deps.logger.info("Billing event reconciled", {
    organizationId,
    kind: event.kind,
    periodEnd: decision.next.periodEnd,
  });

  return {
    outcome: "applied",
    organizationId,
    effects: decision.effects.length,
  };
}
