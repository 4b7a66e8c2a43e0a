import type { z } from "zod";
import {
  referenceId,
  stripeEventSchema,
  stripeInvoiceObjectSchema,
  stripePaymentIntentObjectSchema,
  stripeSubscriptionObjectSchema,
  type ParsedWebhookEvent,
  type ProviderReference,
  type StripeEvent,
  type StripeInvoiceLine,
  type VerifiedWebhookEvent,
  type WebhookLineItem,
} from "@billsync/contracts";
import { epochSecondsToUtcIso, sha256Hex } from "@billsync/shared";
import { MalformedPayloadError } from "./errors.js";

export const PAYMENT_SUCCEEDED_EVENT_TYPE = "invoice.payment_succeeded";
export const CARD_AUTHORIZED_EVENT_TYPE = "payment_intent.amount_capturable_updated";
export const SUBSCRIPTION_CANCELLED_EVENT_TYPE = "customer.subscription.deleted";

interface EventBase {
  idempotencyKey: string;
  providerEventType: string;
  raw: Record<string, unknown>;
}

function parseObject<S extends z.ZodTypeAny>(
  schema: S,
  object: Record<string, unknown>,
  eventType: string,
): z.infer<S> {
  const result = schema.safeParse(object);
  if (!result.success) {
    throw new MalformedPayloadError(
      `Malformed ${eventType} payload`,
      result.error.flatten(),
    );
  }
  return result.data;
}

function requireReference(
  reference: ProviderReference | null | undefined,
  field: string,
  eventType: string,
): string {
  const id = referenceId(reference);
  if (id === null) {
    throw new MalformedPayloadError(`Malformed ${eventType} payload: missing ${field}`);
  }
  return id;
}

function resolveIdempotencyKey(event: StripeEvent, rawBody: string): string {
  if (event.id !== undefined) return event.id;

  const objectId = event.data.object["id"];
  if (typeof objectId === "string" && objectId.length > 0) {
    return `${event.type}:${objectId}`;
  }
  return `${event.type}:${sha256Hex(rawBody)}`;
}

function toLineItem(line: StripeInvoiceLine): WebhookLineItem {
  const periodEnd = line.period?.end;

  return {
    amount: line.amount ?? null,
    periodEnd:
      typeof periodEnd === "number" ? epochSecondsToUtcIso(periodEnd) : null,
    subscriptionItemId: line.subscription_item ?? null,
    subscriptionId: referenceId(line.subscription),
    priceId: line.price?.id ?? line.plan?.id ?? null,
  };
}

function parsePaymentSucceeded(
  base: EventBase,
  object: Record<string, unknown>,
): ParsedWebhookEvent {
  const invoice = parseObject(stripeInvoiceObjectSchema, object, base.providerEventType);

  return {
    kind: "payment_succeeded",
    ...base,
    customerId: requireReference(invoice.customer, "customer", base.providerEventType),
    subscriptionId: referenceId(invoice.subscription),
    lineItems: invoice.lines.data.map(toLineItem),
  };
}

function parseCardAuthorized(
  base: EventBase,
  object: Record<string, unknown>,
): ParsedWebhookEvent {
  const intent = parseObject(
    stripePaymentIntentObjectSchema,
    object,
    base.providerEventType,
  );

  return {
    kind: "card_authorized",
    ...base,
    customerId: requireReference(intent.customer, "customer", base.providerEventType),
    paymentIntentId: intent.id,
    paymentMethodId: referenceId(intent.payment_method),
  };
}

function parseSubscriptionCancelled(
  base: EventBase,
  object: Record<string, unknown>,
): ParsedWebhookEvent {
  const subscription = parseObject(
    stripeSubscriptionObjectSchema,
    object,
    base.providerEventType,
  );

  return {
    kind: "subscription_cancelled",
    ...base,
    customerId: requireReference(
      subscription.customer,
      "customer",
      base.providerEventType,
    ),
    subscriptionId: subscription.id,
  };
}

/**
 * Maps a verified provider payload onto the closed set of billing events.
 * Types outside the mapping parse as `unhandled` rather than failing.
 */
export function parseWebhookEvent(
  verified: VerifiedWebhookEvent,
): ParsedWebhookEvent {
  const envelope = stripeEventSchema.safeParse(verified.payload);
  if (!envelope.success) {
    throw new MalformedPayloadError(
      "Webhook payload is not a provider event",
      envelope.error.flatten(),
    );
  }

  const event = envelope.data;
  const object = event.data.object;
  const base: EventBase = {
    idempotencyKey: resolveIdempotencyKey(event, verified.rawBody),
    providerEventType: event.type,
    raw: verified.payload,
  };

  switch (event.type) {
    case PAYMENT_SUCCEEDED_EVENT_TYPE:
      return parsePaymentSucceeded(base, object);
    case CARD_AUTHORIZED_EVENT_TYPE:
      return parseCardAuthorized(base, object);
    case SUBSCRIPTION_CANCELLED_EVENT_TYPE:
      return parseSubscriptionCancelled(base, object);
    default:
      return { kind: "unhandled", ...base };
  }
}
