import type {
  BillingRecord,
  CheckoutSessionResponse,
  Plan,
} from "@billsync/contracts";
import {
  assignPlan,
  hasBillingRecordChanged,
  isBillingActive,
  isCheckoutSessionReusable,
  isSelfServeEligible,
  recordCheckoutSession,
  resolveCheckoutMode,
} from "@billsync/domain";
import { t, utcNowIso, type Logger } from "@billsync/shared";
import {
  updateBillingRecordWithRetry,
  type BillingRecordStore,
} from "./billing-record-store.js";
import {
  BillingAlreadyActiveError,
  PlanNotEligibleError,
  ProviderUnavailableError,
  ValidationError,
} from "./errors.js";
import type { PlanCatalog } from "./plan-catalog.js";
import type { BillingProvider } from "./provider.js";

export const CHECKOUT_SESSION_PLACEHOLDER = "{CHECKOUT_SESSION_ID}";

export interface CheckoutDeps {
  billingRecords: BillingRecordStore;
  planCatalog: PlanCatalog;
  provider: BillingProvider;
  logger: Logger;
  now?: () => string;
  cardValidationPlanKeys?: readonly string[];
}

export interface StartOrReuseCheckoutInput {
  organizationId: string;
  planKey?: string | undefined;
  baseUrl: string;
  customerEmail?: string | undefined;
}

export interface CheckoutSessionHandle {
  sessionId: string;
  customerId: string;
  reused: boolean;
}

function resolveNow(deps: Pick<CheckoutDeps, "now">): string {
  return (deps.now ?? utcNowIso)();
}

function withTrailingSlash(baseUrl: string): string {
  return baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
}

export function buildCheckoutUrls(baseUrl: string): {
  successUrl: string;
  cancelUrl: string;
} {
  const base = withTrailingSlash(baseUrl);
  return {
    successUrl: `${base}billing/welcome?session_id=${CHECKOUT_SESSION_PLACEHOLDER}`,
    cancelUrl: `${base}billing/failed?session_id=${CHECKOUT_SESSION_PLACEHOLDER}`,
  };
}

export function buildSubscriptionUrl(sessionId: string): string {
  return `/billing/setup?session_id=${sessionId}`;
}

function reusableSession(
  record: BillingRecord,
  now: string,
): CheckoutSessionHandle | null {
  if (
    record.checkoutSessionId === null ||
    record.providerCustomerId === null ||
    !isCheckoutSessionReusable(record, now)
  ) {
    return null;
  }

  return {
    sessionId: record.checkoutSessionId,
    customerId: record.providerCustomerId,
    reused: true,
  };
}

async function createProviderSession(
  deps: CheckoutDeps,
  record: BillingRecord,
  plan: Plan,
  input: StartOrReuseCheckoutInput,
): Promise<{ sessionId: string; customerId: string }> {
  const customerId =
    record.providerCustomerId ??
    (
      await deps.provider.createCustomer({
        organizationId: input.organizationId,
        idempotencyKey: `customer-${input.organizationId}`,
        ...(input.customerEmail !== undefined
          ? { email: input.customerEmail }
          : {}),
      })
    ).customerId;

  const session = await deps.provider.createCheckoutSession({
    mode: resolveCheckoutMode(plan, deps.cardValidationPlanKeys),
    customerId,
    priceId: plan.priceId,
    organizationId: input.organizationId,
    ...buildCheckoutUrls(input.baseUrl),
  });

  deps.logger.info("Checkout session created", {
    organizationId: input.organizationId,
    planKey: plan.key,
    sessionId: session.sessionId,
  });

  return { sessionId: session.sessionId, customerId };
}

/**
 * Returns the organization's checkout session, creating one only when the
 * stored session is missing or at least a day old.
 */
export async function startOrReuseCheckout(
  deps: CheckoutDeps,
  input: StartOrReuseCheckoutInput,
): Promise<CheckoutSessionHandle> {
  const now = resolveNow(deps);
  const record = await deps.billingRecords.getOrCreate(input.organizationId);

  const existing = reusableSession(record, now);
  if (existing) return existing;

  const planKey = input.planKey ?? record.planKey;
  const plan = planKey !== null ? await deps.planCatalog.findByKey(planKey) : null;
  if (!plan) {
    throw new ValidationError("No plan selected for checkout", {
      organizationId: input.organizationId,
    });
  }

  const created = await createProviderSession(deps, record, plan, input);

  const { record: stored, changed } = await updateBillingRecordWithRetry(
    deps.billingRecords,
    input.organizationId,
    (current) =>
      reusableSession(current, now)
        ? null
        : recordCheckoutSession(current, { ...created, createdAt: now }),
  );

  if (!changed) {
    // another request stored a fresh session first
    const concurrent = reusableSession(stored, now);
    if (concurrent) return concurrent;
  }

  return { ...created, reused: false };
}

export interface SubscribeToPlanInput {
  organizationId: string;
  planKey: string;
  baseUrl: string;
  customerEmail?: string | undefined;
}

export async function subscribeToPlan(
  deps: CheckoutDeps,
  input: SubscribeToPlanInput,
): Promise<CheckoutSessionResponse> {
  const plan = await deps.planCatalog.findByKey(input.planKey);
  if (!plan || !isSelfServeEligible(plan)) {
    throw new PlanNotEligibleError(input.planKey, t("billing.plan_not_eligible"));
  }

  const now = resolveNow(deps);
  const record = await deps.billingRecords.getOrCreate(input.organizationId);
  if (isBillingActive(record, now)) {
    throw new BillingAlreadyActiveError(t("billing.already_active"));
  }

  const reused =
    record.planKey === plan.key ? reusableSession(record, now) : null;

  let session: { sessionId: string; customerId: string };
  try {
    session = reused ?? (await createProviderSession(deps, record, plan, input));
  } catch (error) {
    if (error instanceof ProviderUnavailableError) {
      deps.logger.error("Could not start billing subscription", {
        organizationId: input.organizationId,
        planKey: plan.key,
        reason: error.message,
      });
      throw new ValidationError(t("billing.subscription_start_failed"));
    }
    throw error;
  }

  await updateBillingRecordWithRetry(
    deps.billingRecords,
    input.organizationId,
    (current) => {
      if (isBillingActive(current, now)) {
        throw new BillingAlreadyActiveError(t("billing.already_active"));
      }

      // a reused session keeps its original creation time
      const createdAt =
        reused !== null && current.checkoutSessionCreatedAt !== null
          ? current.checkoutSessionCreatedAt
          : now;
      const next = recordCheckoutSession(
        assignPlan(current, plan, {
          awaitingSetup: true,
          now,
          resetSubscription: true,
        }),
        { ...session, createdAt },
      );
      return hasBillingRecordChanged(current, next) ? next : null;
    },
  );

  return {
    stripe_checkout_session: session.sessionId,
    subscription_url: buildSubscriptionUrl(session.sessionId),
  };
}

export interface AssignPlanOnSignupInput {
  organizationId: string;
  planKey: string;
}

/** Unknown plan keys are ignored so signup never fails on billing. */
export async function assignPlanOnSignup(
  deps: Pick<CheckoutDeps, "billingRecords" | "planCatalog" | "logger" | "now">,
  input: AssignPlanOnSignupInput,
): Promise<BillingRecord | null> {
  const plan = await deps.planCatalog.findByKey(input.planKey);
  if (!plan) {
    deps.logger.warn("Ignoring unknown plan on signup", {
      organizationId: input.organizationId,
      planKey: input.planKey,
    });
    return null;
  }

  const now = resolveNow(deps);
  const { record } = await updateBillingRecordWithRetry(
    deps.billingRecords,
    input.organizationId,
    (current) => {
      const next = assignPlan(current, plan, {
        awaitingSetup: plan.defaultAwaitingSetup,
        now,
      });
      return hasBillingRecordChanged(current, next) ? next : null;
    },
  );

  return record;
}

export interface CreateBillingPortalSessionInput {
  organizationId: string;
  returnUrl: string;
}

export async function createBillingPortalSession(
  deps: Pick<CheckoutDeps, "billingRecords" | "provider">,
  input: CreateBillingPortalSessionInput,
): Promise<{ url: string }> {
  const record = await deps.billingRecords.get(input.organizationId);
  if (!record || record.providerCustomerId === null) {
    return { url: "/" };
  }

  return deps.provider.createPortalSession(
    record.providerCustomerId,
    input.returnUrl,
  );
}
