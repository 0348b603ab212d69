/**
 * Schema check use case
 *
 * Plans the missing tables/columns and, unless dry-run, applies them.
 */

import type { ResultAsync } from "neverthrow";
import { ensureSchema, isEmptyPlan, planSchema, type Db, type SchemaError, type SchemaPlan } from "@tradebook/db";
import { logger } from "@tradebook/utils";

export interface SchemaCheckOptions {
  dryRun: boolean;
}

function logPlan(plan: SchemaPlan): void {
  for (const table of plan.missingTables) {
    logger.info(`Would create table ${table}`);
  }
  for (const column of plan.missingColumns) {
    logger.info(`Would add column ${column.column} to ${column.table}`, { definition: column.definition });
  }
}

export function runSchemaCheck(db: Db, opts: SchemaCheckOptions): ResultAsync<SchemaPlan, SchemaError> {
  const run = opts.dryRun
    ? planSchema(db).map(plan => {
        logPlan(plan);
        return plan;
      })
    : ensureSchema(db);

  return run.map(plan => {
    if (isEmptyPlan(plan)) {
      logger.info("Schema is up to date");
    } else {
      logger.info(opts.dryRun ? "Schema changes pending" : "Schema updated", {
        tables: plan.missingTables.length,
        columns: plan.missingColumns.length,
      });
    }
    return plan;
  });
}
