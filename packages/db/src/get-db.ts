/**
 * packages/db - DB connection helper
 *
 * Centralizes the `Pool` / `drizzle` setup shared by apps and scripts.
 * Callers pass only a connection string and get a `db` with the schema attached.
 */

import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import { Pool } from "pg";

import * as schema from "./schema";

export type Schema = typeof schema;

/**
 * Any Postgres Drizzle database bound to this schema.
 *
 * node-postgres pools, in-process PGlite instances and open transactions all
 * satisfy it, so repositories and the bootstrap accept any of them.
 */
export type Db = PgDatabase<PgQueryResultHKT, Schema>;

/** Pool-backed database returned by {@link getDb}; owns its connections. */
export type PoolDb = NodePgDatabase<Schema> & { $client: Pool };

export interface GetDbOptions {
  /** Maximum pooled connections (default 10) */
  max?: number;
}

export function getDb(connectionString: string, options: GetDbOptions = {}): PoolDb {
  if (!connectionString) {
    throw new Error("DATABASE_URL is empty");
  }

  const pool = new Pool({
    connectionString,
    max: options.max ?? 10,
    // TIMESTAMP columns carry no zone: CURRENT_TIMESTAMP defaults and Date values must both be UTC
    options: "-c timezone=UTC",
  });

  return drizzle(pool, { schema });
}

/**
 * End the pool behind a database returned by {@link getDb}.
 */
export async function closeDb(db: PoolDb): Promise<void> {
  await db.$client.end();
}
