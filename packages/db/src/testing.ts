/**
 * In-process Postgres for tests (PGlite).
 *
 * Intended for test code only: `@tradebook/db/testing`.
 */

import { PGlite } from "@electric-sql/pglite";
import { drizzle, type PgliteDatabase } from "drizzle-orm/pglite";

import { createTableSql, quoteIdent, TABLE_DEFINITIONS } from "./ddl";
import type { Schema } from "./get-db";
import * as schema from "./schema";

export type TestDb = PgliteDatabase<Schema> & { $client: PGlite };

export interface CreateTestDbOptions {
  /** Create all tables up front (default true) */
  withTables?: boolean;
}

export async function createTestDb(options: CreateTestDbOptions = {}): Promise<TestDb> {
  const client = new PGlite();
  await client.exec("SET TIME ZONE 'UTC'");

  if (options.withTables ?? true) {
    for (const table of TABLE_DEFINITIONS) {
      await client.exec(createTableSql(table));
    }
  }

  return drizzle(client, { schema });
}

/**
 * Empty every table and restart the serial sequences.
 */
export async function resetTestDb(db: TestDb): Promise<void> {
  const names = TABLE_DEFINITIONS.map(t => quoteIdent(t.name)).join(", ");
  await db.$client.exec(`TRUNCATE ${names} RESTART IDENTITY CASCADE`);
}

export async function closeTestDb(db: TestDb): Promise<void> {
  await db.$client.close();
}
