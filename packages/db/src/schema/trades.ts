/**
 * trades - Executed Trades (append only)
 *
 * - One row per fill, immutable once written
 * - account_id must reference an existing account
 */

import { integer, pgTable, real, serial, text, timestamp } from "drizzle-orm/pg-core";

import { accounts } from "./accounts";

export const trades = pgTable("trades", {
  tradeId: serial("trade_id").primaryKey(),
  accountId: integer("account_id")
    .notNull()
    .references(() => accounts.accountId),
  symbol: text("symbol").notNull(),
  timestamp: timestamp("timestamp", { mode: "date" }).notNull(),
  side: text("side").notNull(), // buy/sell
  quantity: real("quantity").notNull(),
  price: real("price").notNull(),
  fee: real("fee").default(0),
  realizedPl: real("realized_pl").default(0),
  strategyName: text("strategy_name"),
});

export type Trade = typeof trades.$inferSelect;
export type NewTrade = typeof trades.$inferInsert;
