/**
 * Trade decision storage. Only an append-only CSV file and an in-memory
 * variant exist; there is no query API.
 */
export * from "./tradeLog";
