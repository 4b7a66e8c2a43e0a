import Stripe from "stripe";
import type {
  CreateCheckoutSessionInput,
  CreateCheckoutSessionResult,
  CreateMeteredSubscriptionInput,
  CreateProviderCustomerInput,
  ProvisionedSubscription,
  ReportUsageInput,
} from "@billsync/contracts";
import {
  ProviderUnavailableError,
  type BillingProvider,
} from "@billsync/application";
import { epochSecondsToUtcIso, isoToEpochSeconds } from "@billsync/shared";

export const CARD_AUTHORIZATION_AMOUNT_CENTS = 50;
export const CARD_AUTHORIZATION_CURRENCY = "usd";
export const CARD_AUTHORIZATION_DESCRIPTOR = "CARD PREAUTH";

function toCheckoutParams(
  input: CreateCheckoutSessionInput,
): Stripe.Checkout.SessionCreateParams {
  const base: Stripe.Checkout.SessionCreateParams = {
    customer: input.customerId,
    payment_method_types: ["card"],
    success_url: input.successUrl,
    cancel_url: input.cancelUrl,
    client_reference_id: input.organizationId,
  };

  if (input.mode === "subscription") {
    return {
      ...base,
      mode: "subscription",
      line_items: [{ price: input.priceId, quantity: 1 }],
    };
  }

  return {
    ...base,
    mode: "payment",
    line_items: [
      {
        price_data: {
          currency: CARD_AUTHORIZATION_CURRENCY,
          unit_amount: CARD_AUTHORIZATION_AMOUNT_CENTS,
          product_data: { name: "Card authorization" },
        },
        quantity: 1,
      },
    ],
    payment_intent_data: {
      capture_method: "manual",
      statement_descriptor: CARD_AUTHORIZATION_DESCRIPTOR,
    },
  };
}

export class StripeBillingProvider implements BillingProvider {
  readonly name = "stripe" as const;

  constructor(private readonly stripe: Stripe) {}

  private async call<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (error instanceof Stripe.errors.StripeError) {
        throw new ProviderUnavailableError(
          `Stripe ${operation} failed: ${error.message}`,
          error,
        );
      }
      throw error;
    }
  }

  async createCustomer(
    input: CreateProviderCustomerInput,
  ): Promise<{ customerId: string }> {
    const customer = await this.call("customer creation", () =>
      this.stripe.customers.create(
        {
          ...(input.email !== undefined ? { email: input.email } : {}),
          metadata: { organization_id: input.organizationId },
        },
        { idempotencyKey: input.idempotencyKey },
      ),
    );
    return { customerId: customer.id };
  }

  async createCheckoutSession(
    input: CreateCheckoutSessionInput,
  ): Promise<CreateCheckoutSessionResult> {
    const session = await this.call("checkout session", () =>
      this.stripe.checkout.sessions.create(toCheckoutParams(input)),
    );
    return {
      provider: this.name,
      sessionId: session.id,
      checkoutUrl: session.url,
    };
  }

  async cancelPaymentAuthorization(paymentIntentId: string): Promise<void> {
    await this.call("authorization cancel", () =>
      this.stripe.paymentIntents.cancel(paymentIntentId),
    );
  }

  async setDefaultPaymentMethod(
    customerId: string,
    paymentMethodId: string,
  ): Promise<void> {
    await this.call("default payment method update", () =>
      this.stripe.customers.update(customerId, {
        invoice_settings: { default_payment_method: paymentMethodId },
      }),
    );
  }

  async createMeteredSubscription(
    input: CreateMeteredSubscriptionInput,
  ): Promise<ProvisionedSubscription> {
    const subscription = await this.call("subscription creation", () =>
      this.stripe.subscriptions.create(
        {
          customer: input.customerId,
          items: [{ price: input.priceId }],
          billing_cycle_anchor: isoToEpochSeconds(input.billingCycleAnchor),
          proration_behavior: "none",
          ...(input.trialPeriodDays > 0
            ? { trial_period_days: input.trialPeriodDays }
            : {}),
          ...(input.defaultPaymentMethodId !== null
            ? { default_payment_method: input.defaultPaymentMethodId }
            : {}),
        },
        { idempotencyKey: input.idempotencyKey },
      ),
    );

    const [item] = subscription.items.data;
    if (!item) {
      throw new ProviderUnavailableError(
        `Stripe subscription ${subscription.id} was created without items`,
      );
    }

    return {
      subscriptionId: subscription.id,
      subscriptionItemId: item.id,
      currentPeriodEnd: epochSecondsToUtcIso(subscription.current_period_end),
    };
  }

  async reportUsage(input: ReportUsageInput): Promise<void> {
    await this.call("usage report", () =>
      this.stripe.subscriptionItems.createUsageRecord(
        input.subscriptionItemId,
        {
          quantity: input.quantity,
          timestamp: isoToEpochSeconds(input.timestamp),
          action: "set",
        },
        { idempotencyKey: input.idempotencyKey },
      ),
    );
  }

  async createPortalSession(
    customerId: string,
    returnUrl: string,
  ): Promise<{ url: string }> {
    const session = await this.call("billing portal session", () =>
      this.stripe.billingPortal.sessions.create({
        customer: customerId,
        return_url: returnUrl,
      }),
    );
    return { url: session.url };
  }
}
