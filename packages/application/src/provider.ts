import type {
  BillingAnalyticsEventName,
  BillingAnalyticsProperties,
  CreateCheckoutSessionInput,
  CreateCheckoutSessionResult,
  CreateMeteredSubscriptionInput,
  CreateProviderCustomerInput,
  PaymentProviderName,
  ProvisionedSubscription,
  ReportUsageInput,
  VerifiedWebhookEvent,
} from "@billsync/contracts";

/**
 * Outbound calls to the payment provider. Adapters translate transport and
 * API failures into `ProviderUnavailableError`.
 */
export interface BillingProvider {
  readonly name: PaymentProviderName;
  createCustomer(input: CreateProviderCustomerInput): Promise<{ customerId: string }>;
  createCheckoutSession(
    input: CreateCheckoutSessionInput,
  ): Promise<CreateCheckoutSessionResult>;
  cancelPaymentAuthorization(paymentIntentId: string): Promise<void>;
  setDefaultPaymentMethod(
    customerId: string,
    paymentMethodId: string,
  ): Promise<void>;
  createMeteredSubscription(
    input: CreateMeteredSubscriptionInput,
  ): Promise<ProvisionedSubscription>;
  reportUsage(input: ReportUsageInput): Promise<void>;
  createPortalSession(
    customerId: string,
    returnUrl: string,
  ): Promise<{ url: string }>;
}

export interface VerifyWebhookSignatureInput {
  rawBody: string;
  signatureHeader: string | undefined;
}

export interface WebhookSignatureVerifier {
  readonly provider: PaymentProviderName;
  verify(input: VerifyWebhookSignatureInput): Promise<VerifiedWebhookEvent>;
}

export interface AnalyticsSink {
  capture(
    event: BillingAnalyticsEventName,
    organizationId: string,
    properties: BillingAnalyticsProperties,
  ): Promise<void> | void;
}

/** Returns null when the event store cannot answer. */
export interface EventUsageSource {
  countEvents(
    organizationId: string,
    startIso: string,
    endIso: string,
  ): Promise<number | null>;
}

export function createNoopAnalyticsSink(): AnalyticsSink {
  return {
    capture() {},
  };
}
