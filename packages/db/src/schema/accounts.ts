/**
 * accounts - Trading Accounts (1 row per account)
 *
 * - account_id is assigned by the caller
 * - cash_balance / margin_* / last_update change on every trade or valuation event
 * - Rows are never deleted
 */

import { integer, pgTable, real, text, timestamp } from "drizzle-orm/pg-core";

export const accounts = pgTable("accounts", {
  accountId: integer("account_id").primaryKey(),
  owner: text("owner").notNull(),
  createdAt: timestamp("created_at", { mode: "date" }).notNull().defaultNow(),
  cashBalance: real("cash_balance").notNull().default(0),
  marginRequirement: real("margin_requirement").notNull().default(0),
  // Not checked against margin_requirement + cash_balance here
  marginUsed: real("margin_used").notNull().default(0),
  lastUpdate: timestamp("last_update", { mode: "date" }),
});

export type Account = typeof accounts.$inferSelect;
export type NewAccount = typeof accounts.$inferInsert;
