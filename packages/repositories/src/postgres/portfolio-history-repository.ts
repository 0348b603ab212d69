/**
 * Postgres Portfolio History Repository
 */

import { and, asc, desc, eq } from "drizzle-orm";
import { ResultAsync } from "neverthrow";
import { portfolioHistory, type Db, type PortfolioHistoryRecord } from "@tradebook/db";

import type { RepositoryError, TimeRange } from "../interfaces/errors";
import type { PortfolioHistoryRepository, SnapshotInsert } from "../interfaces/portfolio-history-repository";
import { firstOrNull, firstRow, toRepositoryError } from "./errors";
import { timeRangeConditions } from "./filters";

export function createPostgresPortfolioHistoryRepository(db: Db): PortfolioHistoryRepository {
  return {
    insertSnapshot(snapshot: SnapshotInsert): ResultAsync<PortfolioHistoryRecord, RepositoryError> {
      return ResultAsync.fromPromise(
        db.insert(portfolioHistory).values(snapshot).returning(),
        toRepositoryError,
      ).andThen(firstRow<PortfolioHistoryRecord>("inserted snapshot"));
    },

    getHistory(accountId: number, range: TimeRange = {}): ResultAsync<PortfolioHistoryRecord[], RepositoryError> {
      return ResultAsync.fromPromise(
        db
          .select()
          .from(portfolioHistory)
          .where(and(eq(portfolioHistory.accountId, accountId), ...timeRangeConditions(portfolioHistory.timestamp, range)))
          .orderBy(asc(portfolioHistory.timestamp), asc(portfolioHistory.recordId)),
        toRepositoryError,
      );
    },

    getLatestSnapshot(accountId: number): ResultAsync<PortfolioHistoryRecord | null, RepositoryError> {
      return ResultAsync.fromPromise(
        db
          .select()
          .from(portfolioHistory)
          .where(eq(portfolioHistory.accountId, accountId))
          .orderBy(desc(portfolioHistory.timestamp), desc(portfolioHistory.recordId))
          .limit(1),
        toRepositoryError,
      ).map(firstOrNull);
    },
  };
}
