export * from "./common.js";
export * from "./webhook.js";
export * from "./billing-api.js";
