/**
 * Trade Repository Interface
 *
 * - Append only: there is no update or delete
 * - Every trade references an existing account (FK)
 */

import type { ResultAsync } from "neverthrow";
import type { NewTrade, Trade } from "@tradebook/db";

import type { RepositoryError, TimeRange } from "./errors";

export type TradeInsert = Omit<NewTrade, "tradeId">;

export interface TradeQuery extends TimeRange {
  symbol?: string;
  limit?: number;
}

export interface TradeRepository {
  insertTrade(trade: TradeInsert): ResultAsync<Trade, RepositoryError>;

  /**
   * Insert several trades in one statement; empty input does not touch the DB
   */
  /**
   * Insert any number of trades in one transaction; all or nothing.
   */
  insertTradeBatch(trades: TradeInsert[]): ResultAsync<Trade[], RepositoryError>;

  /**
   * Trades of an account ordered by (timestamp, trade_id)
   */
  getTradesByAccount(accountId: number, query?: TradeQuery): ResultAsync<Trade[], RepositoryError>;
}
