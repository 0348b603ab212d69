/**
 * Postgres Trade Repository
 *
 * - Insert only; trades are never updated
 */

import { and, asc, eq } from "drizzle-orm";
import { ResultAsync } from "neverthrow";
import { trades, type Db, type Trade } from "@tradebook/db";

import type { RepositoryError } from "../interfaces/errors";
import type { TradeInsert, TradeQuery, TradeRepository } from "../interfaces/trade-repository";
import { chunk } from "./batch";
import { firstRow, toRepositoryError } from "./errors";
import { timeRangeConditions } from "./filters";

export function createPostgresTradeRepository(db: Db): TradeRepository {
  return {
    insertTrade(trade: TradeInsert): ResultAsync<Trade, RepositoryError> {
      return ResultAsync.fromPromise(db.insert(trades).values(trade).returning(), toRepositoryError).andThen(
        firstRow<Trade>("inserted trade"),
      );
    },

    insertTradeBatch(batch: TradeInsert[]): ResultAsync<Trade[], RepositoryError> {
      if (batch.length === 0) {
        return ResultAsync.fromSafePromise(Promise.resolve([]));
      }
      return ResultAsync.fromPromise(
        db.transaction(async tx => {
          const inserted: Trade[] = [];
          for (const part of chunk(batch)) {
            inserted.push(...(await tx.insert(trades).values(part).returning()));
          }
          return inserted;
        }),
        toRepositoryError,
      );
    },

    getTradesByAccount(accountId: number, query: TradeQuery = {}): ResultAsync<Trade[], RepositoryError> {
      const conditions = [eq(trades.accountId, accountId), ...timeRangeConditions(trades.timestamp, query)];
      if (query.symbol !== undefined) conditions.push(eq(trades.symbol, query.symbol));

      const base = db
        .select()
        .from(trades)
        .where(and(...conditions))
        .orderBy(asc(trades.timestamp), asc(trades.tradeId))
        .$dynamic();

      return ResultAsync.fromPromise(query.limit !== undefined ? base.limit(query.limit) : base, toRepositoryError);
    },
  };
}
