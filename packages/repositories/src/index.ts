/**
 * packages/repositories - Shared Repository Layer
 *
 * - Interface per table, Postgres implementation via Drizzle
 * - Every operation returns a neverthrow ResultAsync
 */

export * from "./interfaces";
export * from "./postgres";
