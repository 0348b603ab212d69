import { gte, lte, type SQL } from "drizzle-orm";
import type { PgColumn } from "drizzle-orm/pg-core";

import type { TimeRange } from "../interfaces/errors";

/**
 * Inclusive bounds on a timestamp column
 */
export function timeRangeConditions(column: PgColumn, range: TimeRange): SQL[] {
  const conditions: SQL[] = [];
  if (range.from) conditions.push(gte(column, range.from));
  if (range.to) conditions.push(lte(column, range.to));
  return conditions;
}
