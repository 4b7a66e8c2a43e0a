import type { CheckoutMode, Plan } from "@billsync/contracts";
import { DateTime } from "luxon";

export const DEFAULT_CARD_VALIDATION_PLAN_KEYS: readonly string[] = ["startup"];
export const CARD_VALIDATION_GRANT_DAYS = 365;
export const BILLING_CYCLE_ANCHOR_DAY = 2;

export function resolveCheckoutMode(
  plan: Plan,
  cardValidationPlanKeys: readonly string[] = DEFAULT_CARD_VALIDATION_PLAN_KEYS,
): CheckoutMode {
  if (plan.isMetered || cardValidationPlanKeys.includes(plan.key)) {
    return "card_authorization";
  }
  return "subscription";
}

export function isSelfServeEligible(plan: Plan): boolean {
  return plan.isActive && plan.selfServe;
}

/**
 * Metered subscriptions renew on the 2nd of a month at 23:59:59.999 UTC,
 * the first such instant on or after the trial ends.
 */
export function computeBillingCycleAnchor(
  atIso: string,
  trialDays: number,
): string {
  const afterTrial = DateTime.fromISO(atIso, { setZone: true })
    .toUTC()
    .plus({ days: trialDays });

  const anchorMonth =
    afterTrial.day <= BILLING_CYCLE_ANCHOR_DAY
      ? afterTrial
      : afterTrial.plus({ months: 1 });

  const anchor = anchorMonth.set({ day: BILLING_CYCLE_ANCHOR_DAY }).endOf("day");
  const iso = anchor.toISO();
  if (!iso) {
    throw new Error(`Failed to compute billing cycle anchor for ${atIso}`);
  }
  return iso;
}
