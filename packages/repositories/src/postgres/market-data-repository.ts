/**
 * Postgres Market Data Repository
 *
 * - Batch insert OHLCV bars into price_data (chunked, all or nothing)
 * - Last open_time lookup for incremental collection
 * - Range load ordered by open_time
 */

import { and, asc, desc, eq } from "drizzle-orm";
import { ResultAsync } from "neverthrow";
import { priceData, type Db, type PriceDatum } from "@tradebook/db";

import type { RepositoryError } from "../interfaces/errors";
import type { BarInsert, BarQuery, MarketDataRepository } from "../interfaces/market-data-repository";
import { chunk } from "./batch";
import { firstRow, toRepositoryError } from "./errors";
import { timeRangeConditions } from "./filters";

export function createPostgresMarketDataRepository(db: Db): MarketDataRepository {
  return {
    insertBar(bar: BarInsert): ResultAsync<PriceDatum, RepositoryError> {
      return ResultAsync.fromPromise(db.insert(priceData).values(bar).returning(), toRepositoryError).andThen(
        firstRow<PriceDatum>("inserted bar"),
      );
    },

    insertBarBatch(bars: BarInsert[]): ResultAsync<number, RepositoryError> {
      if (bars.length === 0) {
        return ResultAsync.fromSafePromise(Promise.resolve(0));
      }
      return ResultAsync.fromPromise(
        db.transaction(async tx => {
          let written = 0;
          for (const part of chunk(bars)) {
            const rows = await tx.insert(priceData).values(part).returning({ id: priceData.id });
            written += rows.length;
          }
          return written;
        }),
        toRepositoryError,
      );
    },

    getLastOpenTime(symbol: string, interval: string): ResultAsync<Date | null, RepositoryError> {
      return ResultAsync.fromPromise(
        db
          .select({ openTime: priceData.openTime })
          .from(priceData)
          .where(and(eq(priceData.symbol, symbol), eq(priceData.interval, interval)))
          .orderBy(desc(priceData.openTime))
          .limit(1),
        toRepositoryError,
      ).map(rows => rows[0]?.openTime ?? null);
    },

    getBars(symbol: string, interval: string, query: BarQuery = {}): ResultAsync<PriceDatum[], RepositoryError> {
      const conditions = [
        eq(priceData.symbol, symbol),
        eq(priceData.interval, interval),
        ...timeRangeConditions(priceData.openTime, query),
      ];

      const base = db
        .select()
        .from(priceData)
        .where(and(...conditions))
        .orderBy(asc(priceData.openTime), asc(priceData.id))
        .$dynamic();

      return ResultAsync.fromPromise(query.limit !== undefined ? base.limit(query.limit) : base, toRepositoryError);
    },
  };
}
