/**
 * price_data - OHLCV Bars (time series, append only)
 *
 * - Natural key is (symbol, interval, open_time) but it is not declared unique:
 *   re-fetched bars are stored again
 * - Written by an external ingestion process
 */

import { integer, pgTable, real, serial, text, timestamp } from "drizzle-orm/pg-core";

export const priceData = pgTable("price_data", {
  id: serial("id").primaryKey(),
  symbol: text("symbol").notNull(),
  interval: text("interval").notNull(), // 1m, 1h, 1d ...
  openTime: timestamp("open_time", { mode: "date" }).notNull(),
  open: real("open").notNull(),
  high: real("high").notNull(),
  low: real("low").notNull(),
  close: real("close").notNull(),
  volume: real("volume").notNull(),
  closeTime: timestamp("close_time", { mode: "date" }).notNull(),
  quoteVolume: real("quote_volume"),
  count: integer("count"), // number of trades in the bar
  takerBuyVolume: real("taker_buy_volume"),
  takerBuyQuoteVolume: real("taker_buy_quote_volume"),
});

export type PriceDatum = typeof priceData.$inferSelect;
export type NewPriceDatum = typeof priceData.$inferInsert;
