import Stripe from "stripe";
import { describe, expect, it } from "vitest";
import { ProviderUnavailableError } from "@billsync/application";
import { StripeBillingProvider } from "./StripeBillingProvider.js";

interface RecordedRequest {
  method: string;
  path: string;
  params: URLSearchParams;
  idempotencyKey: string | null;
}

interface StubbedResponse {
  status?: number;
  body: unknown;
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

function createStubbedStripe(responses: StubbedResponse[]) {
  const requests: RecordedRequest[] = [];

  const fakeFetch: typeof fetch = async (input, init) => {
    const url = new URL(requestUrl(input));
    const body = typeof init?.body === "string" ? init.body : "";
    requests.push({
      method: init?.method ?? "GET",
      path: url.pathname,
      params: new URLSearchParams(body),
      idempotencyKey: new Headers(init?.headers).get("idempotency-key"),
    });

    const next = responses.shift();
    if (!next) throw new Error(`Unexpected Stripe request to ${url.pathname}`);
    return new Response(JSON.stringify(next.body), {
      status: next.status ?? 200,
      headers: { "content-type": "application/json" },
    });
  };

  const stripe = new Stripe("sk_test_placeholder", {
    httpClient: Stripe.createFetchHttpClient(fakeFetch),
    maxNetworkRetries: 0,
  });

  return { provider: new StripeBillingProvider(stripe), requests };
}

describe("StripeBillingProvider", () => {
  it("creates a customer tagged with its organization", async () => {
    const { provider, requests } = createStubbedStripe([
      { body: { id: "cus_123", object: "customer" } },
    ]);

    await expect(
      provider.createCustomer({
        organizationId: "org_1",
        email: "owner@example.test",
        idempotencyKey: "customer-org_1",
      }),
    ).resolves.toEqual({ customerId: "cus_123" });

    const [request] = requests;
    expect(request?.method).toBe("POST");
    expect(request?.path).toBe("/v1/customers");
    expect(request?.params.get("email")).toBe("owner@example.test");
    expect(request?.params.get("metadata[organization_id]")).toBe("org_1");
    expect(request?.idempotencyKey).toBe("customer-org_1");
  });

  it("opens a subscription checkout for the plan price", async () => {
    const { provider, requests } = createStubbedStripe([
      { body: { id: "cs_1", object: "checkout.session", url: "https://checkout.test/cs_1" } },
    ]);

    const result = await provider.createCheckoutSession({
      mode: "subscription",
      customerId: "cus_1",
      priceId: "price_growth",
      successUrl: "https://app.example.test/billing?success=1",
      cancelUrl: "https://app.example.test/billing",
      organizationId: "org_1",
    });

    expect(result).toEqual({
      provider: "stripe",
      sessionId: "cs_1",
      checkoutUrl: "https://checkout.test/cs_1",
    });
    const params = requests[0]?.params;
    expect(params?.get("mode")).toBe("subscription");
    expect(params?.get("line_items[0][price]")).toBe("price_growth");
    expect(params?.get("line_items[0][quantity]")).toBe("1");
    expect(params?.get("client_reference_id")).toBe("org_1");
  });

  it("opens a manual-capture card authorization checkout", async () => {
    const { provider, requests } = createStubbedStripe([
      { body: { id: "cs_2", object: "checkout.session", url: null } },
    ]);

    const result = await provider.createCheckoutSession({
      mode: "card_authorization",
      customerId: "cus_1",
      priceId: "price_startup",
      successUrl: "https://app.example.test/billing?success=1",
      cancelUrl: "https://app.example.test/billing",
      organizationId: "org_1",
    });

    expect(result.checkoutUrl).toBeNull();
    const params = requests[0]?.params;
    expect(params?.get("mode")).toBe("payment");
    expect(params?.get("line_items[0][price_data][unit_amount]")).toBe("50");
    expect(params?.get("line_items[0][price_data][currency]")).toBe("usd");
    expect(params?.get("payment_intent_data[capture_method]")).toBe("manual");
    expect(params?.get("payment_intent_data[statement_descriptor]")).toBe(
      "CARD PREAUTH",
    );
    expect(params?.has("line_items[0][price]")).toBe(false);
  });

  it("provisions a metered subscription anchored in epoch seconds", async () => {
    const { provider, requests } = createStubbedStripe([
      {
        body: {
          id: "sub_9",
          object: "subscription",
          current_period_end: 1775822400,
          items: { object: "list", data: [{ id: "si_9", object: "subscription_item" }] },
        },
      },
    ]);

    const provisioned = await provider.createMeteredSubscription({
      customerId: "cus_1",
      priceId: "price_metered",
      trialPeriodDays: 0,
      billingCycleAnchor: "2026-03-09T00:00:00.000Z",
      defaultPaymentMethodId: "pm_1",
      idempotencyKey: "sub-evt_1",
    });

    expect(provisioned).toEqual({
      subscriptionId: "sub_9",
      subscriptionItemId: "si_9",
      currentPeriodEnd: "2026-04-10T12:00:00.000Z",
    });
    const [request] = requests;
    expect(request?.path).toBe("/v1/subscriptions");
    expect(request?.params.get("items[0][price]")).toBe("price_metered");
    expect(request?.params.get("billing_cycle_anchor")).toBe("1773014400");
    expect(request?.params.get("default_payment_method")).toBe("pm_1");
    expect(request?.params.has("trial_period_days")).toBe(false);
    expect(request?.idempotencyKey).toBe("sub-evt_1");
  });

  it("reports usage with the set action", async () => {
    const { provider, requests } = createStubbedStripe([
      { body: { id: "mbur_1", object: "usage_record", quantity: 7 } },
    ]);

    await provider.reportUsage({
      subscriptionItemId: "si_1",
      quantity: 7,
      timestamp: "2026-03-09T00:00:00.000Z",
      idempotencyKey: "si_1-2026-03-09",
    });

    const [request] = requests;
    expect(request?.path).toBe("/v1/subscription_items/si_1/usage_records");
    expect(request?.params.get("quantity")).toBe("7");
    expect(request?.params.get("timestamp")).toBe("1773014400");
    expect(request?.params.get("action")).toBe("set");
    expect(request?.idempotencyKey).toBe("si_1-2026-03-09");
  });

  it("sets the default payment method and cancels the authorization", async () => {
    const { provider, requests } = createStubbedStripe([
      { body: { id: "cus_1", object: "customer" } },
      { body: { id: "pi_1", object: "payment_intent", status: "canceled" } },
    ]);

    await provider.setDefaultPaymentMethod("cus_1", "pm_1");
    await provider.cancelPaymentAuthorization("pi_1");

    expect(requests.map((request) => request.path)).toEqual([
      "/v1/customers/cus_1",
      "/v1/payment_intents/pi_1/cancel",
    ]);
    expect(
      requests[0]?.params.get("invoice_settings[default_payment_method]"),
    ).toBe("pm_1");
  });

  it("returns the billing portal url", async () => {
    const { provider, requests } = createStubbedStripe([
      {
        body: {
          id: "bps_1",
          object: "billing_portal.session",
          url: "https://billing.stripe.test/session/bps_1",
        },
      },
    ]);

    await expect(
      provider.createPortalSession("cus_1", "https://app.example.test/billing"),
    ).resolves.toEqual({ url: "https://billing.stripe.test/session/bps_1" });
    expect(requests[0]?.params.get("return_url")).toBe(
      "https://app.example.test/billing",
    );
  });

  it("wraps API errors as provider unavailability", async () => {
    const { provider } = createStubbedStripe([
      {
        status: 400,
        body: {
          error: { type: "invalid_request_error", message: "No such customer: 'cus_x'" },
        },
      },
    ]);

    const attempt = provider.createPortalSession("cus_x", "https://app.example.test");

    await expect(attempt).rejects.toBeInstanceOf(ProviderUnavailableError);
    await expect(attempt).rejects.toThrow(
      "Stripe billing portal session failed: No such customer: 'cus_x'",
    );
  });
});
