import { ConfigurationError } from "@billsync/application";
import { z } from "zod";

import { formatIssues } from "../http/validation.js";

export type PersistenceDriver = "memory" | "postgres";

export interface BillingConfig {
  stripeApiKey: string | null;
  stripeWebhookSecret: string | null;
  webhookToleranceSeconds: number;
  siteUrl: string;
  trialPeriodDays: number;
  cardValidationPlanKeys: string[];
  persistenceDriver: PersistenceDriver;
  databaseUrl: string | null;
  planCatalogPath: string | null;
}

export const DEFAULT_SITE_URL = "http://localhost:8000/";

// Unset and blank variables read the same.
function blankAsUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim().length === 0
    ? undefined
    : value;
}

function envValue<S extends z.ZodTypeAny>(schema: S) {
  return z.preprocess(blankAsUndefined, schema);
}

const billingEnvSchema = z
  .object({
    STRIPE_API_KEY: envValue(z.string().trim().optional()),
    STRIPE_WEBHOOK_SECRET: envValue(z.string().trim().optional()),
    STRIPE_WEBHOOK_TOLERANCE_SECONDS: envValue(
      z.coerce.number().int().positive().default(300),
    ),
    SITE_URL: envValue(z.string().trim().url().default(DEFAULT_SITE_URL)),
    BILLING_TRIAL_DAYS: envValue(z.coerce.number().int().nonnegative().default(0)),
    CARD_VALIDATION_PLAN_KEYS: envValue(z.string().default("startup")),
    PERSISTENCE_DRIVER: envValue(z.enum(["memory", "postgres"]).default("memory")),
    DATABASE_URL: envValue(z.string().trim().optional()),
    PLAN_CATALOG_PATH: envValue(z.string().trim().optional()),
  })
  .superRefine((env, ctx) => {
    if (env.PERSISTENCE_DRIVER === "postgres" && env.DATABASE_URL === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "Required when PERSISTENCE_DRIVER=postgres",
      });
    }
  });

function parseKeyList(raw: string): string[] {
  return raw
    .split(",")
    .map((key) => key.trim())
    .filter((key) => key.length > 0);
}

export function loadBillingConfig(
  env: Record<string, string | undefined> = process.env,
): BillingConfig {
  const parsed = billingEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid billing configuration - ${formatIssues(parsed.error.issues)}`,
    );
  }

  const values = parsed.data;
  return {
    stripeApiKey: values.STRIPE_API_KEY ?? null,
    stripeWebhookSecret: values.STRIPE_WEBHOOK_SECRET ?? null,
    webhookToleranceSeconds: values.STRIPE_WEBHOOK_TOLERANCE_SECONDS,
    siteUrl: values.SITE_URL,
    trialPeriodDays: values.BILLING_TRIAL_DAYS,
    cardValidationPlanKeys: parseKeyList(values.CARD_VALIDATION_PLAN_KEYS),
    persistenceDriver: values.PERSISTENCE_DRIVER,
    databaseUrl: values.DATABASE_URL ?? null,
    planCatalogPath: values.PLAN_CATALOG_PATH ?? null,
  };
}
