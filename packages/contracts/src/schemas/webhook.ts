import { z } from "zod";

import { nonEmptyStringSchema, providerReferenceSchema } from "./common.js";

export const stripeEventSchema = z
  .object({
    id: nonEmptyStringSchema.optional(),
    type: nonEmptyStringSchema,
    created: z.number().int().optional(),
    data: z
      .object({
        object: z.record(z.string(), z.unknown()),
      })
      .passthrough(),
  })
  .passthrough();

export type StripeEvent = z.infer<typeof stripeEventSchema>;

const nullableString = z.string().nullable().optional();

const stripePriceRefSchema = z
  .object({ id: nonEmptyStringSchema })
  .passthrough()
  .nullable()
  .optional();

export const stripeInvoiceLineSchema = z
  .object({
    amount: z.number().nullable().optional(),
    period: z
      .object({
        end: z.number().int().nullable().optional(),
        start: z.number().int().nullable().optional(),
      })
      .passthrough()
      .nullable()
      .optional(),
    subscription_item: nullableString,
    subscription: providerReferenceSchema.nullable().optional(),
    price: stripePriceRefSchema,
    plan: stripePriceRefSchema,
  })
  .passthrough();

export type StripeInvoiceLine = z.infer<typeof stripeInvoiceLineSchema>;

export const stripeInvoiceObjectSchema = z
  .object({
    id: nonEmptyStringSchema.optional(),
    customer: providerReferenceSchema,
    subscription: providerReferenceSchema.nullable().optional(),
    lines: z
      .object({
        data: z.array(stripeInvoiceLineSchema).min(1),
      })
      .passthrough(),
  })
  .passthrough();

export const stripePaymentIntentObjectSchema = z
  .object({
    id: nonEmptyStringSchema,
    customer: providerReferenceSchema,
    payment_method: providerReferenceSchema.nullable().optional(),
  })
  .passthrough();

export const stripeSubscriptionObjectSchema = z
  .object({
    id: nonEmptyStringSchema,
    customer: providerReferenceSchema,
  })
  .passthrough();
