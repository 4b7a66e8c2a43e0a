export * from "./usage-worker.js";
