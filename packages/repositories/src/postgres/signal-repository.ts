/**
 * Postgres Signal Repository
 *
 * metrics is validated and written as JSON text, and validated again on the
 * way back out. Rows written by other tools with non-JSON metrics surface as
 * DECODE_ERROR.
 */

import { and, asc, desc, eq, type SQL } from "drizzle-orm";
import { err, ok, Result, ResultAsync } from "neverthrow";
import { z } from "zod";
import { strategySignals, type Db, type StrategySignal } from "@tradebook/db";

import type { RepositoryError } from "../interfaces/errors";
import type {
  SignalInsert,
  SignalMetrics,
  SignalQuery,
  SignalRecord,
  SignalRepository,
} from "../interfaces/signal-repository";
import { firstOrNull, firstRow, toRepositoryError } from "./errors";
import { timeRangeConditions } from "./filters";

const signalMetricsSchema = z.record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()]));

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (e): RepositoryError => ({
    type: "DECODE_ERROR",
    message: `metrics is not valid JSON: ${e instanceof Error ? e.message : String(e)}`,
  }),
);

/**
 * JSON text for the metrics column. NaN and Infinity have no JSON form and are
 * rejected rather than written as null.
 */
export function encodeMetrics(metrics: SignalMetrics | null | undefined): Result<string | null, RepositoryError> {
  if (metrics == null) return ok(null);

  const parsed = signalMetricsSchema.safeParse(metrics);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    return err<string | null, RepositoryError>({
      type: "INVALID_INPUT",
      message: `metrics.${issue?.path.join(".") ?? ""} must be a string, finite number, boolean or null`,
    });
  }
  return ok(JSON.stringify(parsed.data));
}

export function decodeMetrics(text: string | null): Result<SignalMetrics | null, RepositoryError> {
  if (text === null) return ok(null);

  return parseJson(text).andThen(value => {
    const parsed = signalMetricsSchema.safeParse(value);
    return parsed.success ?
        ok(parsed.data)
      : err<SignalMetrics, RepositoryError>({
          type: "DECODE_ERROR",
          message: "metrics must be a JSON object of string, number, boolean or null values",
        });
  });
}

export function toSignalRecord(row: StrategySignal): Result<SignalRecord, RepositoryError> {
  const { metrics, ...rest } = row;
  return decodeMetrics(metrics).map(decoded => ({ ...rest, metrics: decoded }));
}

export function createPostgresSignalRepository(db: Db): SignalRepository {
  return {
    insertSignal(signal: SignalInsert): ResultAsync<SignalRecord, RepositoryError> {
      return encodeMetrics(signal.metrics)
        .asyncAndThen(metrics =>
          ResultAsync.fromPromise(
            db
              .insert(strategySignals)
              .values({
                symbol: signal.symbol,
                interval: signal.interval,
                timestamp: signal.timestamp,
                strategyName: signal.strategyName,
                signal: signal.signal,
                confidence: signal.confidence ?? null,
                metrics,
              })
              .returning(),
            toRepositoryError,
          ),
        )
        .andThen(firstRow<StrategySignal>("inserted signal"))
        .andThen(toSignalRecord);
    },

    getSignals(query: SignalQuery = {}): ResultAsync<SignalRecord[], RepositoryError> {
      const conditions: SQL[] = timeRangeConditions(strategySignals.timestamp, query);
      if (query.symbol !== undefined) conditions.push(eq(strategySignals.symbol, query.symbol));
      if (query.interval !== undefined) conditions.push(eq(strategySignals.interval, query.interval));
      if (query.strategyName !== undefined) conditions.push(eq(strategySignals.strategyName, query.strategyName));

      const base = db
        .select()
        .from(strategySignals)
        .where(and(...conditions))
        .orderBy(asc(strategySignals.timestamp), asc(strategySignals.signalId))
        .$dynamic();

      return ResultAsync.fromPromise(
        query.limit !== undefined ? base.limit(query.limit) : base,
        toRepositoryError,
      ).andThen(rows => Result.combine(rows.map(toSignalRecord)));
    },

    getLatestSignal(
      symbol: string,
      interval: string,
      strategyName: string,
    ): ResultAsync<SignalRecord | null, RepositoryError> {
      return ResultAsync.fromPromise(
        db
          .select()
          .from(strategySignals)
          .where(
            and(
              eq(strategySignals.symbol, symbol),
              eq(strategySignals.interval, interval),
              eq(strategySignals.strategyName, strategyName),
            ),
          )
          .orderBy(desc(strategySignals.timestamp), desc(strategySignals.signalId))
          .limit(1),
        toRepositoryError,
      ).andThen(rows => {
        const row = firstOrNull(rows);
        return row ? toSignalRecord(row) : ok(null);
      });
    },
  };
}
