/**
 * SignalRepository Tests
 */

import { sql } from "drizzle-orm";
import { describe, expect, it } from "vitest";

import { decodeMetrics, encodeMetrics } from "../src/postgres/signal-repository";
import { at, useTestDb } from "./support/test-db";

describe("metrics encoding", () => {
  it("encodes absent metrics as null", () => {
    expect(encodeMetrics(undefined)._unsafeUnwrap()).toBeNull();
    expect(encodeMetrics(null)._unsafeUnwrap()).toBeNull();
  });

  it("encodes scalar metrics as JSON text", () => {
    expect(encodeMetrics({ rsi: 71.5, trend: "up", atr: null })._unsafeUnwrap()).toBe(
      '{"rsi":71.5,"trend":"up","atr":null}',
    );
  });

  it("rejects numbers that JSON cannot represent", () => {
    expect(encodeMetrics({ rsi: 50, x: Number.NaN })._unsafeUnwrapErr()).toEqual({
      type: "INVALID_INPUT",
      message: "metrics.x must be a string, finite number, boolean or null",
    });
    expect(encodeMetrics({ ratio: Number.POSITIVE_INFINITY })._unsafeUnwrapErr().type).toBe("INVALID_INPUT");
    expect(encodeMetrics({ ratio: Number.NEGATIVE_INFINITY })._unsafeUnwrapErr().type).toBe("INVALID_INPUT");
  });

  it("decodes a flat JSON object", () => {
    const result = decodeMetrics('{"rsi":71.5,"trend":"up","crossed":true,"atr":null}');

    expect(result._unsafeUnwrap()).toEqual({ rsi: 71.5, trend: "up", crossed: true, atr: null });
  });

  it("rejects text that is not JSON", () => {
    const result = decodeMetrics("rsi=71.5");

    expect(result._unsafeUnwrapErr().type).toBe("DECODE_ERROR");
  });

  it("rejects nested values and arrays", () => {
    expect(decodeMetrics('{"bands":{"upper":1}}').isErr()).toBe(true);
    expect(decodeMetrics("[1,2,3]").isErr()).toBe(true);
  });
});

describe("SignalRepository", () => {
  const ctx = useTestDb();

  it("stores a signal with only the required fields", async () => {
    const result = await ctx.repos.signals.insertSignal({
      symbol: "BTCUSDT",
      interval: "1h",
      timestamp: at("2024-03-01T10:00:00.000Z"),
      strategyName: "macd",
      signal: "hold",
    });

    expect(result._unsafeUnwrap()).toEqual({
      signalId: 1,
      symbol: "BTCUSDT",
      interval: "1h",
      timestamp: at("2024-03-01T10:00:00.000Z"),
      strategyName: "macd",
      signal: "hold",
      confidence: null,
      metrics: null,
    });
  });

  it("refuses to store metrics holding NaN and writes no row", async () => {
    const result = await ctx.repos.signals.insertSignal({
      symbol: "BTCUSDT",
      interval: "1h",
      timestamp: at("2024-03-01T10:00:00.000Z"),
      strategyName: "macd",
      signal: "buy",
      metrics: { x: Number.NaN },
    });

    expect(result._unsafeUnwrapErr().type).toBe("INVALID_INPUT");
    expect((await ctx.repos.signals.getSignals())._unsafeUnwrap()).toEqual([]);
  });

  it("round-trips metrics through the text column", async () => {
    const metrics = { rsi: 28.25, oversold: true, note: "divergence", atr: null };

    const inserted = await ctx.repos.signals.insertSignal({
      symbol: "ETHUSDT",
      interval: "15m",
      timestamp: at("2024-03-01T10:15:00.000Z"),
      strategyName: "rsi",
      signal: "buy",
      confidence: 0.75,
      metrics,
    });
    const stored = await ctx.db.execute(sql`SELECT metrics FROM strategy_signals WHERE signal_id = 1`);

    expect(inserted._unsafeUnwrap()).toMatchObject({ confidence: 0.75, metrics });
    expect(stored.rows).toEqual([{ metrics: JSON.stringify(metrics) }]);
  });

  it("reports rows whose metrics were written as non-JSON text", async () => {
    await ctx.db.execute(sql`
      INSERT INTO strategy_signals (symbol, "interval", "timestamp", strategy_name, signal, metrics)
      VALUES ('BTCUSDT', '1h', '2024-03-01 10:00:00', 'legacy', 'sell', 'not json')
    `);

    const result = await ctx.repos.signals.getSignals({ strategyName: "legacy" });

    expect(result._unsafeUnwrapErr().type).toBe("DECODE_ERROR");
  });

  it("filters signals and finds the latest per (symbol, interval, strategy)", async () => {
    const base = { symbol: "BTCUSDT", interval: "1h", strategyName: "macd" };
    await ctx.repos.signals.insertSignal({ ...base, timestamp: at("2024-03-01T12:00:00.000Z"), signal: "sell" });
    await ctx.repos.signals.insertSignal({ ...base, timestamp: at("2024-03-01T10:00:00.000Z"), signal: "buy" });
    await ctx.repos.signals.insertSignal({ ...base, timestamp: at("2024-03-01T11:00:00.000Z"), signal: "hold" });
    await ctx.repos.signals.insertSignal({ ...base, strategyName: "rsi", timestamp: at("2024-03-01T13:00:00.000Z"), signal: "buy" });
    await ctx.repos.signals.insertSignal({ ...base, interval: "4h", timestamp: at("2024-03-01T14:00:00.000Z"), signal: "buy" });

    const macd = await ctx.repos.signals.getSignals({ symbol: "BTCUSDT", interval: "1h", strategyName: "macd" });
    const ranged = await ctx.repos.signals.getSignals({
      from: at("2024-03-01T11:00:00.000Z"),
      to: at("2024-03-01T13:00:00.000Z"),
      limit: 2,
    });
    const latest = await ctx.repos.signals.getLatestSignal("BTCUSDT", "1h", "macd");
    const missing = await ctx.repos.signals.getLatestSignal("BTCUSDT", "1d", "macd");

    expect(macd._unsafeUnwrap().map(s => s.signal)).toEqual(["buy", "hold", "sell"]);
    expect(ranged._unsafeUnwrap().map(s => s.signalId)).toEqual([3, 1]);
    expect(latest._unsafeUnwrap()?.signal).toBe("sell");
    expect(missing._unsafeUnwrap()).toBeNull();
  });
});
