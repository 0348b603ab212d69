/**
 * Repository Interfaces
 */

export * from "./errors";
export * from "./account-repository";
export * from "./trade-repository";
export * from "./position-repository";
export * from "./market-data-repository";
export * from "./signal-repository";
export * from "./portfolio-history-repository";
export * from "./repositories";
