// Export schema and DDL (safe for any runtime)
export * from "./schema";
export * from "./ddl";

// Connection helper and bootstrap (Node-only)
export { getDb, closeDb } from "./get-db";
export type { Db, PoolDb, Schema, GetDbOptions } from "./get-db";
export * from "./ensure-schema";
