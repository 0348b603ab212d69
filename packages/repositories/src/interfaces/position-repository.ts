/**
 * Position Repository Interface
 *
 * - A position is open while closed_at IS NULL
 * - Closing sets closed_at; opened_at never changes after insert
 * - Multiple open positions per (account, symbol) are permitted
 */

import type { ResultAsync } from "neverthrow";
import type { Position } from "@tradebook/db";

import type { RepositoryError } from "./errors";

export interface PositionQuantities {
  longQty?: number;
  shortQty?: number;
  longCostBasis?: number;
  shortCostBasis?: number;
  shortMarginUsed?: number;
}

export interface PositionOpen extends PositionQuantities {
  accountId: number;
  symbol: string;
  openedAt: Date;
}

export interface PositionRepository {
  openPosition(position: PositionOpen): ResultAsync<Position, RepositoryError>;

  findById(positionId: number): ResultAsync<Position | null, RepositoryError>;

  /**
   * Update quantities / cost bases after a fill. NOT_FOUND for an unknown id.
   */
  updatePosition(positionId: number, update: PositionQuantities): ResultAsync<Position, RepositoryError>;

  /**
   * Mark a position closed. NOT_FOUND for an unknown id.
   */
  closePosition(positionId: number, closedAt: Date): ResultAsync<Position, RepositoryError>;

  /**
   * Open positions of an account (optionally one symbol) ordered by position_id
   */
  getOpenPositions(accountId: number, symbol?: string): ResultAsync<Position[], RepositoryError>;

  getPositionsByAccount(accountId: number): ResultAsync<Position[], RepositoryError>;
}
