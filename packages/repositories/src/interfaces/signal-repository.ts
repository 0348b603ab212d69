/**
 * Signal Repository Interface
 *
 * strategy_signals.metrics is opaque text. This layer stores a flat JSON object
 * of scalar values in it and decodes it back on read.
 */

import type { ResultAsync } from "neverthrow";
import type { StrategySignal } from "@tradebook/db";

import type { RepositoryError, TimeRange } from "./errors";

export type SignalMetricValue = string | number | boolean | null;

export type SignalMetrics = Record<string, SignalMetricValue>;

/**
 * A strategy_signals row with metrics decoded
 */
export type SignalRecord = Omit<StrategySignal, "metrics"> & {
  metrics: SignalMetrics | null;
};

export interface SignalInsert {
  symbol: string;
  interval: string;
  timestamp: Date;
  strategyName: string;
  /** buy / sell / hold */
  signal: string;
  confidence?: number | null;
  metrics?: SignalMetrics | null;
}

export interface SignalQuery extends TimeRange {
  symbol?: string;
  interval?: string;
  strategyName?: string;
  limit?: number;
}

export interface SignalRepository {
  insertSignal(signal: SignalInsert): ResultAsync<SignalRecord, RepositoryError>;

  /**
   * Signals ordered by (timestamp, signal_id)
   */
  getSignals(query?: SignalQuery): ResultAsync<SignalRecord[], RepositoryError>;

  getLatestSignal(symbol: string, interval: string, strategyName: string): ResultAsync<SignalRecord | null, RepositoryError>;
}
