export * from "./errors.js";
export * from "./billing-record.js";
export * from "./plan.js";
export * from "./reconciliation.js";
export * from "./usage.js";
