/**
 * Shared contracts for the monorepo: domain types, the error taxonomy,
 * logging, configuration and the rolling price window.
 */
export * from "./types";
export * from "./errors";
export * from "./config";
export { loadEnvFiles } from "./env";
export * from "./utils/logger";
export * from "./utils/timeout";
export * from "./data/PriceSeries";
