export * from "./errors.js";
export * from "./idempotency.js";
export * from "./provider.js";
export * from "./fake-billing-provider.js";
export * from "./webhook-event-parser.js";
export * from "./billing-record-store.js";
export * from "./plan-catalog.js";
export * from "./side-effects.js";
export * from "./reconciliation.js";
export * from "./billing-webhook.js";
export * from "./checkout.js";
export * from "./billing-status.js";
export * from "./usage.js";
export * from "./usage-ops.js";
export * from "./billing-stores.js";
