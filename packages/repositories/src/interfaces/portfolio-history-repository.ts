/**
 * Portfolio History Repository Interface
 *
 * - Append only valuation snapshots per account
 */

import type { ResultAsync } from "neverthrow";
import type { NewPortfolioHistoryRecord, PortfolioHistoryRecord } from "@tradebook/db";

import type { RepositoryError, TimeRange } from "./errors";

export type SnapshotInsert = Omit<NewPortfolioHistoryRecord, "recordId">;

export interface PortfolioHistoryRepository {
  insertSnapshot(snapshot: SnapshotInsert): ResultAsync<PortfolioHistoryRecord, RepositoryError>;

  /**
   * Snapshots ordered by (timestamp, record_id)
   */
  getHistory(accountId: number, range?: TimeRange): ResultAsync<PortfolioHistoryRecord[], RepositoryError>;

  getLatestSnapshot(accountId: number): ResultAsync<PortfolioHistoryRecord | null, RepositoryError>;
}
