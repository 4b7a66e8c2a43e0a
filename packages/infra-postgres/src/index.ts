export * from "./pool.js";
export * from "./billing-record-store.js";
export * from "./plan-catalog.js";
export * from "./usage-job-store.js";
export * from "./idempotency-store.js";
export * from "./webhook-stores.js";
export * from "./event-usage-source.js";
export * from "./use-case-deps.js";
