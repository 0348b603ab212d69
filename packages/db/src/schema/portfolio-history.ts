/**
 * portfolio_history - Portfolio Valuation Snapshots (append only)
 *
 * - Snapshot cadence is decided by the writer
 */

import { integer, pgTable, real, serial, timestamp } from "drizzle-orm/pg-core";

import { accounts } from "./accounts";

export const portfolioHistory = pgTable("portfolio_history", {
  recordId: serial("record_id").primaryKey(),
  accountId: integer("account_id")
    .notNull()
    .references(() => accounts.accountId),
  timestamp: timestamp("timestamp", { mode: "date" }).notNull(),
  portfolioValue: real("portfolio_value").notNull(),
  longExposure: real("long_exposure"),
  shortExposure: real("short_exposure"),
  grossExposure: real("gross_exposure"),
  netExposure: real("net_exposure"),
  longShortRatio: real("long_short_ratio"),
});

export type PortfolioHistoryRecord = typeof portfolioHistory.$inferSelect;
export type NewPortfolioHistoryRecord = typeof portfolioHistory.$inferInsert;
