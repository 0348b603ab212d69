/**
 * Postgres Position Repository
 *
 * - Open: insert with closed_at NULL
 * - Fill: overwrite quantities / cost bases
 * - Close: set closed_at (row is kept)
 */

import { and, asc, eq, isNull } from "drizzle-orm";
import { err, ok, ResultAsync } from "neverthrow";
import { positions, type Db, type Position } from "@tradebook/db";

import type { RepositoryError } from "../interfaces/errors";
import type { PositionOpen, PositionQuantities, PositionRepository } from "../interfaces/position-repository";
import { firstOrNull, firstRow, notFound, toRepositoryError } from "./errors";

export function createPostgresPositionRepository(db: Db): PositionRepository {
  const findById = (positionId: number): ResultAsync<Position | null, RepositoryError> =>
    ResultAsync.fromPromise(
      db.select().from(positions).where(eq(positions.positionId, positionId)).limit(1),
      toRepositoryError,
    ).map(firstOrNull);

  return {
    openPosition(position: PositionOpen): ResultAsync<Position, RepositoryError> {
      return ResultAsync.fromPromise(
        db
          .insert(positions)
          .values({
            accountId: position.accountId,
            symbol: position.symbol,
            openedAt: position.openedAt,
            longQty: position.longQty,
            shortQty: position.shortQty,
            longCostBasis: position.longCostBasis,
            shortCostBasis: position.shortCostBasis,
            shortMarginUsed: position.shortMarginUsed,
          })
          .returning(),
        toRepositoryError,
      ).andThen(firstRow<Position>("opened position"));
    },

    findById,

    updatePosition(positionId: number, update: PositionQuantities): ResultAsync<Position, RepositoryError> {
      const set = {
        longQty: update.longQty,
        shortQty: update.shortQty,
        longCostBasis: update.longCostBasis,
        shortCostBasis: update.shortCostBasis,
        shortMarginUsed: update.shortMarginUsed,
      };

      // An UPDATE with nothing to set is invalid SQL: read the row instead
      if (Object.values(set).every(v => v === undefined)) {
        return findById(positionId).andThen(row => (row ? ok(row) : err(notFound(`position ${positionId}`))));
      }

      return ResultAsync.fromPromise(
        db.update(positions).set(set).where(eq(positions.positionId, positionId)).returning(),
        toRepositoryError,
      ).andThen(firstRow<Position>(`position ${positionId}`));
    },

    closePosition(positionId: number, closedAt: Date): ResultAsync<Position, RepositoryError> {
      return ResultAsync.fromPromise(
        db.update(positions).set({ closedAt }).where(eq(positions.positionId, positionId)).returning(),
        toRepositoryError,
      ).andThen(firstRow<Position>(`position ${positionId}`));
    },

    getOpenPositions(accountId: number, symbol?: string): ResultAsync<Position[], RepositoryError> {
      const conditions = [eq(positions.accountId, accountId), isNull(positions.closedAt)];
      if (symbol !== undefined) conditions.push(eq(positions.symbol, symbol));

      return ResultAsync.fromPromise(
        db
          .select()
          .from(positions)
          .where(and(...conditions))
          .orderBy(asc(positions.positionId)),
        toRepositoryError,
      );
    },

    getPositionsByAccount(accountId: number): ResultAsync<Position[], RepositoryError> {
      return ResultAsync.fromPromise(
        db.select().from(positions).where(eq(positions.accountId, accountId)).orderBy(asc(positions.positionId)),
        toRepositoryError,
      );
    },
  };
}
