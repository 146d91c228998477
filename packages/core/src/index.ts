/**
 * Core package centralizes shared contracts, errors, logging and
 * configuration helpers. Everything else in the monorepo depends on these.
 */
export * from "./types";
export * from "./errors";
export * from "./quote";
export * from "./config";
export * from "./env";
export * from "./utils/logger";
