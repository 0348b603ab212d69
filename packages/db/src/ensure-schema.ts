/**
 * packages/db - Schema bootstrap
 *
 * Brings a database up to TABLE_DEFINITIONS without dropping anything:
 * - Missing tables are created with their full DDL
 * - Existing tables get an `ADD COLUMN` for every column they lack
 * Column types and constraints of existing columns are not compared.
 */

import { sql } from "drizzle-orm";
import { ResultAsync } from "neverthrow";
import { z } from "zod";
import { logger } from "@tradebook/utils";

import { addColumnSql, createTableSql, TABLE_DEFINITIONS, type TableDefinition } from "./ddl";
import type { Db } from "./get-db";

export interface MissingColumn {
  table: string;
  column: string;
  definition: string;
}

export interface SchemaPlan {
  /** Tables to create, parents first */
  missingTables: string[];
  missingColumns: MissingColumn[];
}

export type SchemaError = { type: "DB_ERROR"; message: string };

const tableRows = z.object({
  rows: z.array(z.object({ table_name: z.string() })),
});

const columnRows = z.object({
  rows: z.array(z.object({ table_name: z.string(), column_name: z.string() })),
});

const toSchemaError = (e: unknown): SchemaError => ({
  type: "DB_ERROR",
  message: e instanceof Error ? e.message : "Unknown error",
});

export function isEmptyPlan(plan: SchemaPlan): boolean {
  return plan.missingTables.length === 0 && plan.missingColumns.length === 0;
}

/**
 * Compare the live database with the table definitions.
 */
export function planSchema(
  db: Db,
  tables: readonly TableDefinition[] = TABLE_DEFINITIONS,
): ResultAsync<SchemaPlan, SchemaError> {
  return ResultAsync.fromPromise(
    (async () => {
      const existingTables = tableRows.parse(
        await db.execute(sql`
          SELECT table_name::text AS table_name
          FROM information_schema.tables
          WHERE table_schema = current_schema()
        `),
      );
      const existingColumns = columnRows.parse(
        await db.execute(sql`
          SELECT table_name::text AS table_name, column_name::text AS column_name
          FROM information_schema.columns
          WHERE table_schema = current_schema()
        `),
      );

      const tableNames = new Set(existingTables.rows.map(r => r.table_name));
      const columnsByTable = new Map<string, Set<string>>();
      for (const row of existingColumns.rows) {
        const set = columnsByTable.get(row.table_name) ?? new Set<string>();
        set.add(row.column_name);
        columnsByTable.set(row.table_name, set);
      }

      const plan: SchemaPlan = { missingTables: [], missingColumns: [] };
      for (const table of tables) {
        if (!tableNames.has(table.name)) {
          plan.missingTables.push(table.name);
          continue;
        }
        const present = columnsByTable.get(table.name) ?? new Set<string>();
        for (const column of table.columns) {
          if (!present.has(column.name)) {
            plan.missingColumns.push({ table: table.name, column: column.name, definition: column.definition });
          }
        }
      }
      return plan;
    })(),
    toSchemaError,
  );
}

/**
 * Execute a plan in a single transaction.
 */
export function applySchemaPlan(
  db: Db,
  plan: SchemaPlan,
  tables: readonly TableDefinition[] = TABLE_DEFINITIONS,
): ResultAsync<SchemaPlan, SchemaError> {
  if (isEmptyPlan(plan)) {
    return ResultAsync.fromSafePromise(Promise.resolve(plan));
  }

  const missing = new Set(plan.missingTables);

  return ResultAsync.fromPromise(
    db.transaction(async tx => {
      for (const table of tables) {
        if (!missing.has(table.name)) continue;
        logger.info(`Creating table ${table.name}`);
        await tx.execute(sql.raw(createTableSql(table)));
      }
      for (const column of plan.missingColumns) {
        logger.info(`Adding column ${column.column} to ${column.table}`);
        await tx.execute(sql.raw(addColumnSql(column.table, { name: column.column, definition: column.definition })));
      }
    }),
    toSchemaError,
  ).map(() => plan);
}

/**
 * Plan and apply. Returns what was changed; an empty plan means the schema was already complete.
 */
export function ensureSchema(
  db: Db,
  tables: readonly TableDefinition[] = TABLE_DEFINITIONS,
): ResultAsync<SchemaPlan, SchemaError> {
  return planSchema(db, tables).andThen(plan => applySchemaPlan(db, plan, tables));
}
