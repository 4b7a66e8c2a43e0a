import Stripe from "stripe";
import type { VerifiedWebhookEvent } from "@billsync/contracts";
import {
  ConfigurationError,
  InvalidSignatureError,
  MalformedPayloadError,
  type VerifyWebhookSignatureInput,
  type WebhookSignatureVerifier,
} from "@billsync/application";

export const DEFAULT_SIGNATURE_TOLERANCE_SECONDS = 300;

type StripeWebhookSignatureVerifierOptions = {
  toleranceSeconds?: number;
  stripe?: Stripe;
};

/**
 * Checks the `t=...,v1=...` signature header against the shared secret.
 * A missing secret surfaces as `ConfigurationError` on the first webhook.
 */
export class StripeWebhookSignatureVerifier implements WebhookSignatureVerifier {
  readonly provider = "stripe" as const;

  private readonly stripe: Stripe;
  private readonly webhookSecret: string | null;
  private readonly toleranceSeconds: number;

  constructor(
    webhookSecret: string | null | undefined,
    options: StripeWebhookSignatureVerifierOptions = {},
  ) {
    const toleranceSeconds =
      options.toleranceSeconds ?? DEFAULT_SIGNATURE_TOLERANCE_SECONDS;

    if (!Number.isInteger(toleranceSeconds) || toleranceSeconds <= 0) {
      throw new ConfigurationError(
        "Stripe webhook tolerance must be a positive integer",
      );
    }

    const normalizedSecret = webhookSecret?.trim() ?? "";
    this.webhookSecret = normalizedSecret.length > 0 ? normalizedSecret : null;
    this.toleranceSeconds = toleranceSeconds;
    this.stripe = options.stripe ?? new Stripe("sk_test_webhook_verification");
  }

  async verify(input: VerifyWebhookSignatureInput): Promise<VerifiedWebhookEvent> {
    if (this.webhookSecret === null) {
      throw new ConfigurationError("STRIPE_WEBHOOK_SECRET is not configured");
    }

    const signature = input.signatureHeader?.trim();
    if (!signature) {
      throw new InvalidSignatureError("Missing Stripe signature header");
    }

    let event: Stripe.Event;
    try {
      event = this.stripe.webhooks.constructEvent(
        input.rawBody,
        signature,
        this.webhookSecret,
        this.toleranceSeconds,
      );
    } catch (error) {
      if (error instanceof Stripe.errors.StripeSignatureVerificationError) {
        throw new InvalidSignatureError("Invalid Stripe webhook signature", error);
      }
      if (error instanceof SyntaxError) {
        throw new MalformedPayloadError("Webhook body is not valid JSON");
      }
      throw error;
    }

    return {
      provider: this.provider,
      rawBody: input.rawBody,
      payload: { ...event },
    };
  }
}
