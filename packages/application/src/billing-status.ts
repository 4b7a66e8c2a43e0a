import type {
  BillingStatusResponse,
  Plan,
  PublicPlan,
} from "@billsync/contracts";
import { createEmptyBillingRecord, deriveBillingState } from "@billsync/domain";
import { describeError, utcMonthRange, utcNowIso } from "@billsync/shared";
import {
  buildSubscriptionUrl,
  startOrReuseCheckout,
  type CheckoutDeps,
} from "./checkout.js";
import { ProviderUnavailableError } from "./errors.js";
import type { EventUsageSource } from "./provider.js";

export interface BillingStatusDeps extends CheckoutDeps {
  usageSource: EventUsageSource;
}

export interface GetBillingStatusInput {
  organizationId: string;
  baseUrl: string;
  customerEmail?: string | undefined;
}

export function toPublicPlan(plan: Plan): PublicPlan {
  return {
    key: plan.key,
    name: plan.name,
    custom_setup_billing_message: plan.customSetupBillingMessage,
    event_allowance: plan.eventAllowance,
    image_url: plan.imageUrl,
    self_serve: plan.selfServe,
    is_metered_billing: plan.isMetered,
    price_string: plan.priceString,
  };
}

async function countMonthlyUsage(
  deps: BillingStatusDeps,
  organizationId: string,
  now: string,
): Promise<number | null> {
  const { startIso, endIso } = utcMonthRange(now);

  try {
    return await deps.usageSource.countEvents(organizationId, startIso, endIso);
  } catch (error) {
    deps.logger.warn("Monthly usage unavailable", {
      organizationId,
      reason: describeError(error),
    });
    return null;
  }
}

async function offerCheckout(
  deps: BillingStatusDeps,
  input: GetBillingStatusInput,
): Promise<string | null> {
  try {
    const { sessionId } = await startOrReuseCheckout(deps, input);
    return sessionId;
  } catch (error) {
    if (error instanceof ProviderUnavailableError) {
      deps.logger.error("Could not offer checkout session", {
        organizationId: input.organizationId,
        reason: error.message,
      });
      return null;
    }
    throw error;
  }
}

export async function getBillingStatus(
  deps: BillingStatusDeps,
  input: GetBillingStatusInput,
): Promise<BillingStatusResponse> {
  const now = (deps.now ?? utcNowIso)();
  const record =
    (await deps.billingRecords.get(input.organizationId)) ??
    createEmptyBillingRecord(input.organizationId, now);

  const plan =
    record.planKey !== null
      ? await deps.planCatalog.findByKey(record.planKey)
      : null;
  const state = deriveBillingState(record, now);
  const isActive = state === "active";

  const checkoutSessionId =
    state === "awaiting_setup" ? await offerCheckout(deps, input) : null;

  return {
    should_setup_billing: record.awaitingSetup,
    is_billing_active: isActive,
    state,
    plan: plan ? toPublicPlan(plan) : null,
    billing_period_ends: record.periodEnd,
    event_allocation: plan ? plan.eventAllowance : null,
    current_usage: plan
      ? await countMonthlyUsage(deps, input.organizationId, now)
      : null,
    stripe_checkout_session: checkoutSessionId,
    subscription_url:
      checkoutSessionId !== null ? buildSubscriptionUrl(checkoutSessionId) : null,
    should_display_current_bill: isActive && plan !== null && plan.isMetered,
  };
}
