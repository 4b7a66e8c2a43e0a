import { z } from "zod";

import { nonEmptyStringSchema } from "./common.js";

export const planSchema = z
  .object({
    key: nonEmptyStringSchema,
    name: nonEmptyStringSchema,
    priceId: z.string(),
    eventAllowance: z.number().int().nonnegative().nullable(),
    isMetered: z.boolean(),
    selfServe: z.boolean(),
    isActive: z.boolean(),
    defaultAwaitingSetup: z.boolean(),
    customSetupBillingMessage: z.string().nullable().default(null),
    imageUrl: z.string().nullable().default(null),
    priceString: z.string().nullable().default(null),
  })
  .strict();

export const planCatalogFileSchema = z
  .object({
    plans: z.array(planSchema),
  })
  .strict();

export const subscribePayloadSchema = z
  .object({
    plan: nonEmptyStringSchema,
  })
  .strict();

export type SubscribePayload = z.infer<typeof subscribePayloadSchema>;

export const checkoutSessionResponseSchema = z
  .object({
    stripe_checkout_session: nonEmptyStringSchema,
    subscription_url: nonEmptyStringSchema,
  })
  .strict();

export type CheckoutSessionResponse = z.infer<
  typeof checkoutSessionResponseSchema
>;

export const publicPlanSchema = z
  .object({
    key: z.string(),
    name: z.string(),
    custom_setup_billing_message: z.string().nullable(),
    event_allowance: z.number().nullable(),
    image_url: z.string().nullable(),
    self_serve: z.boolean(),
    is_metered_billing: z.boolean(),
    price_string: z.string().nullable(),
  })
  .strict();

export type PublicPlan = z.infer<typeof publicPlanSchema>;

export const billingStatusResponseSchema = z
  .object({
    should_setup_billing: z.boolean(),
    is_billing_active: z.boolean(),
    state: z.enum(["no_plan", "awaiting_setup", "active", "expired"]),
    plan: publicPlanSchema.nullable(),
    billing_period_ends: z.string().nullable(),
    event_allocation: z.number().nullable(),
    current_usage: z.number().nullable(),
    stripe_checkout_session: z.string().nullable(),
    subscription_url: z.string().nullable(),
    should_display_current_bill: z.boolean(),
  })
  .strict();

export type BillingStatusResponse = z.infer<typeof billingStatusResponseSchema>;
