/**
 * strategy_signals - Strategy Signal Emissions (append only)
 *
 * - One row per strategy evaluation tick
 * - metrics is opaque text; the repository layer stores JSON in it
 */

import { pgTable, real, serial, text, timestamp } from "drizzle-orm/pg-core";

export const strategySignals = pgTable("strategy_signals", {
  signalId: serial("signal_id").primaryKey(),
  symbol: text("symbol").notNull(),
  interval: text("interval").notNull(),
  timestamp: timestamp("timestamp", { mode: "date" }).notNull(),
  strategyName: text("strategy_name").notNull(),
  signal: text("signal").notNull(), // buy/sell/hold
  confidence: real("confidence"),
  metrics: text("metrics"),
});

export type StrategySignal = typeof strategySignals.$inferSelect;
export type NewStrategySignal = typeof strategySignals.$inferInsert;
