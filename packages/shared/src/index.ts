export * from "./time.js";
export * from "./errors/index.js";
export * from "./idempotency/index.js";
export * from "./i18n/index.js";
export * from "./logging/index.js";
export * from "./runtime/clock.js";
export * from "./runtime/id-generator.js";
