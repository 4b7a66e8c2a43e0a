export * from "./bootstrap/composition-root.js";
export * from "./bootstrap/config.js";
export * from "./bootstrap/plan-catalog-file.js";
export * from "./handlers/billing.js";
export * from "./handlers/stripe-webhook.js";
export * from "./http/errors.js";
export * from "./http/headers.js";
export type { ApiResponse, Headers } from "./http/types.js";
export * from "./infrastructure/stripe/StripeBillingProvider.js";
export * from "./infrastructure/stripe/StripeWebhookSignatureVerifier.js";
