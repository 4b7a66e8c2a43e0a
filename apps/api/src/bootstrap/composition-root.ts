import Stripe from "stripe";
import type { Pool } from "pg";
import {
  ConfigurationError,
  createInMemoryBillingStores,
  createNoopAnalyticsSink,
  type AnalyticsSink,
  type BillingProvider,
  type BillingStatusDeps,
  type BillingStores,
  type BillingWebhookDeps,
  type WebhookSignatureVerifier,
} from "@billsync/application";
import type { Plan } from "@billsync/contracts";
import {
  createPostgresBillingStores,
  createPostgresPool,
} from "@billsync/infra-postgres";
import {
  CryptoIdGenerator,
  SystemClock,
  createConsoleLogger,
  type Clock,
  type IdGenerator,
  type Logger,
} from "@billsync/shared";

import {
  createBillingPortalHandler,
  createBillingStatusHandler,
  createSubscribeHandler,
  type BillingPortalHandler,
  type BillingStatusHandler,
  type SubscribeHandler,
} from "../handlers/billing.js";
import {
  createStripeWebhookHandler,
  type StripeWebhookHandler,
} from "../handlers/stripe-webhook.js";
import { StripeBillingProvider } from "../infrastructure/stripe/StripeBillingProvider.js";
import { StripeWebhookSignatureVerifier } from "../infrastructure/stripe/StripeWebhookSignatureVerifier.js";
import { loadBillingConfig, type BillingConfig } from "./config.js";
import { loadPlanCatalogFile } from "./plan-catalog-file.js";

export interface ApiCompositionRootDeps {
  config?: BillingConfig;
  env?: Record<string, string | undefined>;
  clock?: Clock;
  idGenerator?: IdGenerator;
  logger?: Logger;
  provider?: BillingProvider;
  verifier?: WebhookSignatureVerifier;
  analytics?: AnalyticsSink;
  stores?: BillingStores;
  plans?: readonly Plan[];
  postgresPool?: Pool;
}

export interface ApiCompositionRoot {
  config: BillingConfig;
  stores: BillingStores;
  provider: BillingProvider;
  handleStripeWebhook: StripeWebhookHandler;
  handleBillingStatus: BillingStatusHandler;
  handleSubscribe: SubscribeHandler;
  handleBillingPortal: BillingPortalHandler;
}

function resolveStores(
  config: BillingConfig,
  deps: ApiCompositionRootDeps,
  now: () => string,
): BillingStores {
  if (deps.stores) return deps.stores;

  if (config.persistenceDriver === "postgres") {
    if (deps.postgresPool) return createPostgresBillingStores(deps.postgresPool);
    if (config.databaseUrl === null) {
      throw new ConfigurationError("DATABASE_URL is not configured");
    }
    return createPostgresBillingStores(
      createPostgresPool({ connectionString: config.databaseUrl }),
    );
  }

  const plans =
    deps.plans ??
    (config.planCatalogPath !== null
      ? loadPlanCatalogFile(config.planCatalogPath)
      : loadPlanCatalogFile());
  return createInMemoryBillingStores({ plans, now });
}

export function createApiCompositionRoot(
  deps: ApiCompositionRootDeps = {},
): ApiCompositionRoot {
  const config = deps.config ?? loadBillingConfig(deps.env);
  const clock = deps.clock ?? new SystemClock();
  const now = () => clock.nowIso();
  const idGenerator = deps.idGenerator ?? new CryptoIdGenerator();
  const logger = deps.logger ?? createConsoleLogger("billing-api");

  const stripe =
    config.stripeApiKey !== null ? new Stripe(config.stripeApiKey) : null;

  let provider: BillingProvider;
  if (deps.provider) {
    provider = deps.provider;
  } else if (stripe) {
    provider = new StripeBillingProvider(stripe);
  } else {
    throw new ConfigurationError("STRIPE_API_KEY is not configured");
  }

  const verifier =
    deps.verifier ??
    new StripeWebhookSignatureVerifier(config.stripeWebhookSecret, {
      toleranceSeconds: config.webhookToleranceSeconds,
      ...(stripe ? { stripe } : {}),
    });

  const stores = resolveStores(config, deps, now);

  const billing: BillingStatusDeps = {
    billingRecords: stores.billingRecords,
    planCatalog: stores.planCatalog,
    usageSource: stores.usageSource,
    provider,
    logger,
    now,
    cardValidationPlanKeys: config.cardValidationPlanKeys,
  };

  const webhook: BillingWebhookDeps = {
    verifier,
    dedupStore: stores.dedupStore,
    auditStore: stores.auditStore,
    billingRecords: stores.billingRecords,
    planCatalog: stores.planCatalog,
    provider,
    analytics: deps.analytics ?? createNoopAnalyticsSink(),
    logger,
    now,
    trialPeriodDays: config.trialPeriodDays,
    cardValidationPlanKeys: config.cardValidationPlanKeys,
  };

  const handlerDeps = { billing, siteUrl: config.siteUrl };

  return {
    config,
    stores,
    provider,
    handleStripeWebhook: createStripeWebhookHandler({
      webhook,
      logger,
      now,
      generateTraceId: () => idGenerator.next(),
    }),
    handleBillingStatus: createBillingStatusHandler(handlerDeps),
    handleSubscribe: createSubscribeHandler(handlerDeps),
    handleBillingPortal: createBillingPortalHandler(handlerDeps),
  };
}
