import type { BillingSideEffect } from "@billsync/contracts";
import { describeError, type Logger } from "@billsync/shared";
import type { AnalyticsSink, BillingProvider } from "./provider.js";

export interface SideEffectDeps {
  provider: BillingProvider;
  analytics: AnalyticsSink;
  logger: Logger;
}

export interface SideEffectDispatchResult {
  dispatched: number;
  failed: number;
}

async function dispatchOne(
  deps: SideEffectDeps,
  effect: BillingSideEffect,
): Promise<void> {
  switch (effect.type) {
    case "cancel_authorization":
      await deps.provider.cancelPaymentAuthorization(effect.paymentIntentId);
      return;
    case "set_default_payment_method":
      await deps.provider.setDefaultPaymentMethod(
        effect.customerId,
        effect.paymentMethodId,
      );
      return;
    case "capture_analytics":
      await deps.analytics.capture(
        effect.event,
        effect.organizationId,
        effect.properties,
      );
      return;
    default: {
      const exhaustive: never = effect;
      return exhaustive;
    }
  }
}

/**
 * Runs effects in order once the billing record is committed. A failing
 * effect is logged and the remaining ones still run.
 */
export async function dispatchSideEffects(
  deps: SideEffectDeps,
  effects: readonly BillingSideEffect[],
  context: { organizationId: string; idempotencyKey?: string },
): Promise<SideEffectDispatchResult> {
  let dispatched = 0;
  let failed = 0;

  for (const effect of effects) {
    try {
      await dispatchOne(deps, effect);
      dispatched += 1;
    } catch (error) {
      failed += 1;
      deps.logger.warn("Billing side effect failed", {
        effect: effect.type,
        organizationId: context.organizationId,
        ...(context.idempotencyKey !== undefined
          ? { idempotencyKey: context.idempotencyKey }
          : {}),
        reason: describeError(error),
      });
    }
  }

  return { dispatched, failed };
}
