/**
 * Shared contracts for the backtester: the bar/position data model, the error
 * taxonomy, run configuration and logging. Every other package depends on
 * these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./config";
export { createLogger } from "./utils/logger";
export type { LogLevel, ModuleLogger } from "./utils/logger";
export { deepFreeze } from "./utils/freeze";
export { hashJson, stableStringify, summarizeBars } from "./utils/fingerprint";
export type { BarFingerprintSummary } from "./utils/fingerprint";
