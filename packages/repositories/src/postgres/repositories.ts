/**
 * Repository bundle and transaction scope
 */

import { ResultAsync } from "neverthrow";
import type { Db } from "@tradebook/db";

import type { RepositoryError } from "../interfaces/errors";
import type { Repositories } from "../interfaces/repositories";
import { createPostgresAccountRepository } from "./account-repository";
import { toRepositoryError } from "./errors";
import { createPostgresMarketDataRepository } from "./market-data-repository";
import { createPostgresPortfolioHistoryRepository } from "./portfolio-history-repository";
import { createPostgresPositionRepository } from "./position-repository";
import { createPostgresSignalRepository } from "./signal-repository";
import { createPostgresTradeRepository } from "./trade-repository";

export function createPostgresRepositories(db: Db): Repositories {
  return {
    accounts: createPostgresAccountRepository(db),
    trades: createPostgresTradeRepository(db),
    positions: createPostgresPositionRepository(db),
    marketData: createPostgresMarketDataRepository(db),
    signals: createPostgresSignalRepository(db),
    portfolioHistory: createPostgresPortfolioHistoryRepository(db),
  };
}

/**
 * Carries an Err out of the transaction callback so Drizzle rolls back
 */
class RollbackError extends Error {
  constructor(readonly error: RepositoryError) {
    super(error.message);
    this.name = "RollbackError";
  }
}

/**
 * Run `work` against repositories bound to a single transaction.
 *
 * Commits when `work` returns Ok. An Err (or a thrown error) rolls everything
 * back and is returned as the error.
 *
 * @example
 * withTransaction(db, repos =>
 *   repos.trades.insertTrade(trade).andThen(() => repos.accounts.updateBalances(id, { cashBalance })),
 * );
 */
export function withTransaction<T>(
  db: Db,
  work: (repos: Repositories) => ResultAsync<T, RepositoryError>,
): ResultAsync<T, RepositoryError> {
  return ResultAsync.fromPromise(
    db.transaction(async tx => {
      const result = await work(createPostgresRepositories(tx));
      if (result.isErr()) {
        throw new RollbackError(result.error);
      }
      return result.value;
    }),
    e => (e instanceof RollbackError ? e.error : toRepositoryError(e)),
  );
}
