/**
 * Shared contracts for the scanner: domain types, boundary ports, the error
 * taxonomy, configuration and logging. Every other package depends on these.
 */
export * from "./types";
export * from "./signalState";
export * from "./symbols";
export * from "./errors";
export * from "./ports";
export * from "./policy";
export * from "./config";
export * from "./format";
export * from "./utils/logger";
export * from "./utils/semaphore";
export * from "./utils/withTimeout";
