import type {
  CreateCheckoutSessionInput,
  CreateCheckoutSessionResult,
  CreateMeteredSubscriptionInput,
  CreateProviderCustomerInput,
  ProvisionedSubscription,
  ReportUsageInput,
} from "@billsync/contracts";
import type { BillingProvider } from "./provider.js";

type FakeProviderMethod = Exclude<keyof BillingProvider, "name">;

/**
 * In-process provider used by tests and local runs. Requests carrying an
 * idempotency key replay their first result, as the real API does.
 */
export class FakeBillingProvider implements BillingProvider {
  readonly name = "fake" as const;

  readonly customers: CreateProviderCustomerInput[] = [];
  readonly checkoutSessions: CreateCheckoutSessionInput[] = [];
  readonly cancelledAuthorizations: string[] = [];
  readonly defaultPaymentMethods: Array<{
    customerId: string;
    paymentMethodId: string;
  }> = [];
  readonly meteredSubscriptions: CreateMeteredSubscriptionInput[] = [];
  readonly usageReports: ReportUsageInput[] = [];
  readonly portalSessions: Array<{ customerId: string; returnUrl: string }> = [];

  private readonly failures = new Map<FakeProviderMethod, Error[]>();
  private readonly customerIdsByKey = new Map<string, string>();
  private readonly subscriptionsByKey = new Map<string, ProvisionedSubscription>();
  private readonly reportedUsageKeys = new Set<string>();
  private sequence = 0;

  /** Queues an error thrown by the next call to `method`. */
  failNext(method: FakeProviderMethod, error: Error): void {
    const queued = this.failures.get(method) ?? [];
    queued.push(error);
    this.failures.set(method, queued);
  }

  private nextId(prefix: string): string {
    this.sequence += 1;
    return `${prefix}_fake_${this.sequence}`;
  }

  private throwIfFailing(method: FakeProviderMethod): void {
    const error = this.failures.get(method)?.shift();
    if (error) throw error;
  }

  async createCustomer(
    input: CreateProviderCustomerInput,
  ): Promise<{ customerId: string }> {
    this.throwIfFailing("createCustomer");
    const existing = this.customerIdsByKey.get(input.idempotencyKey);
    if (existing !== undefined) return { customerId: existing };

    this.customers.push(input);
    const customerId = this.nextId("cus");
    this.customerIdsByKey.set(input.idempotencyKey, customerId);
    return { customerId };
  }

  async createCheckoutSession(
    input: CreateCheckoutSessionInput,
  ): Promise<CreateCheckoutSessionResult> {
    this.throwIfFailing("createCheckoutSession");
    this.checkoutSessions.push(input);
    const sessionId = this.nextId("cs");
    return {
      provider: this.name,
      sessionId,
      checkoutUrl: `https://checkout.fake.test/${sessionId}`,
    };
  }

  async cancelPaymentAuthorization(paymentIntentId: string): Promise<void> {
    this.throwIfFailing("cancelPaymentAuthorization");
    this.cancelledAuthorizations.push(paymentIntentId);
  }

  async setDefaultPaymentMethod(
    customerId: string,
    paymentMethodId: string,
  ): Promise<void> {
    this.throwIfFailing("setDefaultPaymentMethod");
    this.defaultPaymentMethods.push({ customerId, paymentMethodId });
  }

  async createMeteredSubscription(
    input: CreateMeteredSubscriptionInput,
  ): Promise<ProvisionedSubscription> {
    this.throwIfFailing("createMeteredSubscription");
    const existing = this.subscriptionsByKey.get(input.idempotencyKey);
    if (existing) return existing;

    this.meteredSubscriptions.push(input);
    const provisioned: ProvisionedSubscription = {
      subscriptionId: this.nextId("sub"),
      subscriptionItemId: this.nextId("si"),
      currentPeriodEnd: input.billingCycleAnchor,
    };
    this.subscriptionsByKey.set(input.idempotencyKey, provisioned);
    return provisioned;
  }

  async reportUsage(input: ReportUsageInput): Promise<void> {
    this.throwIfFailing("reportUsage");
    if (this.reportedUsageKeys.has(input.idempotencyKey)) return;
    this.reportedUsageKeys.add(input.idempotencyKey);
    this.usageReports.push(input);
  }

  async createPortalSession(
    customerId: string,
    returnUrl: string,
  ): Promise<{ url: string }> {
    this.throwIfFailing("createPortalSession");
    this.portalSessions.push({ customerId, returnUrl });
    return { url: `https://billing.fake.test/portal/${customerId}` };
  }
}
