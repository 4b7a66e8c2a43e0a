export type IdempotencyStatus = "processing" | "completed" | "failed";

export interface IdempotencyRecord<TResponse = unknown> {
  key: string;
  payloadHash: string;
  status: IdempotencyStatus;
  response?: TResponse;
  errorMessage?: string;
  createdAt: string;
  updatedAt: string;
}

export type PaymentProviderName = "fake" | "stripe";

// Billing record

export interface BillingRecord {
  organizationId: string;
  providerCustomerId: string | null;
  providerSubscriptionId: string | null;
  providerSubscriptionItemId: string | null;
  checkoutSessionId: string | null;
  checkoutSessionCreatedAt: string | null;
  planKey: string | null;
  awaitingSetup: boolean;
  periodEnd: string | null;
  version: number;
  createdAt: string;
  updatedAt: string;
}

export type BillingState = "no_plan" | "awaiting_setup" | "active" | "expired";

export interface Plan {
  key: string;
  name: string;
  priceId: string;
  eventAllowance: number | null;
  isMetered: boolean;
  selfServe: boolean;
  isActive: boolean;
  defaultAwaitingSetup: boolean;
  customSetupBillingMessage: string | null;
  imageUrl: string | null;
  priceString: string | null;
}

export type CheckoutMode = "subscription" | "card_authorization";

// Webhook events

export interface WebhookLineItem {
  amount: number | null;
  periodEnd: string | null;
  subscriptionItemId: string | null;
  subscriptionId: string | null;
  priceId: string | null;
}

interface WebhookEventBase {
  idempotencyKey: string;
  providerEventType: string;
  raw: Record<string, unknown>;
}

export interface PaymentSucceededEvent extends WebhookEventBase {
  kind: "payment_succeeded";
  customerId: string;
  subscriptionId: string | null;
  lineItems: WebhookLineItem[];
}

export interface CardAuthorizedEvent extends WebhookEventBase {
  kind: "card_authorized";
  customerId: string;
  paymentIntentId: string;
  paymentMethodId: string | null;
}

export interface SubscriptionCancelledEvent extends WebhookEventBase {
  kind: "subscription_cancelled";
  customerId: string;
  subscriptionId: string;
}

export interface UnhandledEvent extends WebhookEventBase {
  kind: "unhandled";
}

export type ParsedWebhookEvent =
  | PaymentSucceededEvent
  | CardAuthorizedEvent
  | SubscriptionCancelledEvent
  | UnhandledEvent;

export type CustomerScopedWebhookEvent = Exclude<
  ParsedWebhookEvent,
  UnhandledEvent
>;

export type WebhookEventKind = ParsedWebhookEvent["kind"];

export interface VerifiedWebhookEvent {
  provider: PaymentProviderName;
  rawBody: string;
  payload: Record<string, unknown>;
}

export interface BillingWebhookEnvelope {
  provider: PaymentProviderName;
  rawBody: string;
  headers: Record<string, string | undefined>;
  receivedAt: string;
  traceId: string;
}

export type BillingWebhookProcessStatus = "processed" | "duplicate" | "ignored";

export type BillingWebhookAuditStatus = BillingWebhookProcessStatus | "rejected";

export interface BillingWebhookProcessResult {
  status: BillingWebhookProcessStatus;
  eventKind: WebhookEventKind;
  idempotencyKey: string;
  organizationId?: string;
  reason?: string;
}

// Side effects emitted by reconciliation, dispatched after commit

export type BillingAnalyticsEventName =
  | "billing subscription activated"
  | "billing subscription paid"
  | "billing card validated"
  | "billing subscription cancelled";

export interface BillingAnalyticsProperties {
  plan_key: string | null;
  billing_period_ends: string | null;
  organization_id: string;
}

export type BillingSideEffect =
  | {
      type: "capture_analytics";
      event: BillingAnalyticsEventName;
      organizationId: string;
      properties: BillingAnalyticsProperties;
    }
  | { type: "cancel_authorization"; paymentIntentId: string }
  | {
      type: "set_default_payment_method";
      customerId: string;
      paymentMethodId: string;
    };

// Provider calls

export interface CreateProviderCustomerInput {
  organizationId: string;
  email?: string;
  idempotencyKey: string;
}

export interface CreateCheckoutSessionInput {
  mode: CheckoutMode;
  customerId: string;
  priceId: string;
  successUrl: string;
  cancelUrl: string;
  organizationId: string;
}

export interface CreateCheckoutSessionResult {
  provider: PaymentProviderName;
  sessionId: string;
  checkoutUrl: string | null;
}

export interface CreateMeteredSubscriptionInput {
  customerId: string;
  priceId: string;
  trialPeriodDays: number;
  billingCycleAnchor: string;
  defaultPaymentMethodId: string | null;
  idempotencyKey: string;
}

export interface ProvisionedSubscription {
  subscriptionId: string;
  subscriptionItemId: string;
  currentPeriodEnd: string | null;
}

export interface ReportUsageInput {
  subscriptionItemId: string;
  quantity: number;
  timestamp: string;
  idempotencyKey: string;
}

// Usage metering

export type UsageReportJobStatus =
  | "queued"
  | "processing"
  | "completed"
  | "failed";

export interface UsageReportedEvent {
  organizationId: string;
  subscriptionItemId: string;
  usageDate: string;
  quantity: number;
  idempotencyKey: string;
  reportedAt: string;
}

export * from "./schemas/index.js";
