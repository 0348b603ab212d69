/**
 * positions - Long/Short Positions per (account, symbol)
 *
 * - Long and short legs are tracked independently on the same row
 * - closed_at IS NULL means the position is still open
 * - Closing sets closed_at; rows are not deleted
 * - Several open rows for the same (account, symbol) are allowed
 */

import { integer, pgTable, real, serial, text, timestamp } from "drizzle-orm/pg-core";

import { accounts } from "./accounts";

export const positions = pgTable("positions", {
  positionId: serial("position_id").primaryKey(),
  accountId: integer("account_id")
    .notNull()
    .references(() => accounts.accountId),
  symbol: text("symbol").notNull(),
  longQty: real("long_qty").default(0),
  shortQty: real("short_qty").default(0),
  longCostBasis: real("long_cost_basis").default(0),
  shortCostBasis: real("short_cost_basis").default(0),
  shortMarginUsed: real("short_margin_used").default(0),
  openedAt: timestamp("opened_at", { mode: "date" }).notNull(),
  closedAt: timestamp("closed_at", { mode: "date" }),
});

export type Position = typeof positions.$inferSelect;
export type NewPosition = typeof positions.$inferInsert;
