/**
 * Market Data Repository Interface
 *
 * - Append OHLCV bars to price_data (duplicates are stored, not rejected)
 * - Find the last stored bar per (symbol, interval) for incremental collection
 * - Load bars for a time range
 */

import type { ResultAsync } from "neverthrow";
import type { NewPriceDatum, PriceDatum } from "@tradebook/db";

import type { RepositoryError, TimeRange } from "./errors";

export type BarInsert = Omit<NewPriceDatum, "id">;

export interface BarQuery extends TimeRange {
  limit?: number;
}

export interface MarketDataRepository {
  insertBar(bar: BarInsert): ResultAsync<PriceDatum, RepositoryError>;

  /**
   * Batch insert bars in one transaction; all or nothing. Returns the number of rows written.
   */
  insertBarBatch(bars: BarInsert[]): ResultAsync<number, RepositoryError>;

  /**
   * Latest open_time stored for the pair, or null when there is none
   */
  getLastOpenTime(symbol: string, interval: string): ResultAsync<Date | null, RepositoryError>;

  /**
   * Bars ordered by (open_time, id); the range applies to open_time
   */
  getBars(symbol: string, interval: string, query?: BarQuery): ResultAsync<PriceDatum[], RepositoryError>;
}
