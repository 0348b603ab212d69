/**
 * packages/db - Database Schema (Drizzle SoT)
 *
 * - Column names follow the snake_case relational definition
 * - Timestamps are TIMESTAMP without time zone, written and read as UTC
 */

// Accounts and account-scoped records (FK account_id)
export * from "./accounts";
export * from "./trades";
export * from "./positions";
export * from "./portfolio-history";

// Market / strategy data shared across accounts
export * from "./price-data";
export * from "./strategy-signals";
