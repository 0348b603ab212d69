/**
 * PositionRepository Tests (PGlite)
 */

import { beforeEach, describe, expect, it } from "vitest";

import { at, useTestDb } from "./support/test-db";

const OPENED_AT = at("2024-03-01T10:00:00.000Z");

describe("PositionRepository", () => {
  const ctx = useTestDb();

  beforeEach(async () => {
    await ctx.repos.accounts.createAccount({ accountId: 1, owner: "alice" });
  });

  it("opens a position with zeroed legs and no closed_at", async () => {
    const result = await ctx.repos.positions.openPosition({ accountId: 1, symbol: "BTCUSDT", openedAt: OPENED_AT });

    expect(result._unsafeUnwrap()).toEqual({
      positionId: 1,
      accountId: 1,
      symbol: "BTCUSDT",
      longQty: 0,
      shortQty: 0,
      longCostBasis: 0,
      shortCostBasis: 0,
      shortMarginUsed: 0,
      openedAt: OPENED_AT,
      closedAt: null,
    });
  });

  it("rejects a position for an unknown account", async () => {
    const result = await ctx.repos.positions.openPosition({ accountId: 9, symbol: "BTCUSDT", openedAt: OPENED_AT });

    const error = result._unsafeUnwrapErr();
    expect(error.type === "INTEGRITY_ERROR" && error.violation).toBe("FOREIGN_KEY");
  });

  it("tracks long and short legs on the same row", async () => {
    const opened = await ctx.repos.positions.openPosition({
      accountId: 1,
      symbol: "ETHUSDT",
      openedAt: OPENED_AT,
      longQty: 2,
      longCostBasis: 3000.5,
    });
    const positionId = opened._unsafeUnwrap().positionId;

    const updated = await ctx.repos.positions.updatePosition(positionId, {
      shortQty: 1.5,
      shortCostBasis: 3100.25,
      shortMarginUsed: 2325.5,
    });

    expect(updated._unsafeUnwrap()).toMatchObject({
      longQty: 2,
      longCostBasis: 3000.5,
      shortQty: 1.5,
      shortCostBasis: 3100.25,
      shortMarginUsed: 2325.5,
      openedAt: OPENED_AT,
      closedAt: null,
    });
  });

  it("closes a position without touching opened_at", async () => {
    const opened = await ctx.repos.positions.openPosition({ accountId: 1, symbol: "BTCUSDT", openedAt: OPENED_AT });
    const positionId = opened._unsafeUnwrap().positionId;
    const closedAt = at("2024-03-02T16:30:00.000Z");

    const closed = await ctx.repos.positions.closePosition(positionId, closedAt);
    const reloaded = await ctx.repos.positions.findById(positionId);

    expect(closed._unsafeUnwrap().closedAt).toEqual(closedAt);
    expect(reloaded._unsafeUnwrap()).toMatchObject({ openedAt: OPENED_AT, closedAt });
  });

  it("returns NOT_FOUND when updating or closing an unknown position", async () => {
    const update = await ctx.repos.positions.updatePosition(77, { longQty: 1 });
    const emptyUpdate = await ctx.repos.positions.updatePosition(77, {});
    const close = await ctx.repos.positions.closePosition(77, OPENED_AT);

    expect(update._unsafeUnwrapErr()).toEqual({ type: "NOT_FOUND", message: "position 77 not found" });
    expect(emptyUpdate._unsafeUnwrapErr()).toEqual({ type: "NOT_FOUND", message: "position 77 not found" });
    expect(close._unsafeUnwrapErr()).toEqual({ type: "NOT_FOUND", message: "position 77 not found" });
  });

  it("returns the stored row for an update with no fields", async () => {
    const opened = await ctx.repos.positions.openPosition({ accountId: 1, symbol: "BTCUSDT", openedAt: OPENED_AT, longQty: 3 });

    const result = await ctx.repos.positions.updatePosition(opened._unsafeUnwrap().positionId, {});

    expect(result._unsafeUnwrap().longQty).toBe(3);
  });

  it("allows several open positions for the same account and symbol", async () => {
    await ctx.repos.positions.openPosition({ accountId: 1, symbol: "BTCUSDT", openedAt: OPENED_AT });
    await ctx.repos.positions.openPosition({ accountId: 1, symbol: "BTCUSDT", openedAt: OPENED_AT });
    const eth = await ctx.repos.positions.openPosition({ accountId: 1, symbol: "ETHUSDT", openedAt: OPENED_AT });
    await ctx.repos.positions.closePosition(eth._unsafeUnwrap().positionId, at("2024-03-01T11:00:00.000Z"));

    const openBtc = await ctx.repos.positions.getOpenPositions(1, "BTCUSDT");
    const openAll = await ctx.repos.positions.getOpenPositions(1);
    const all = await ctx.repos.positions.getPositionsByAccount(1);

    expect(openBtc._unsafeUnwrap().map(p => p.positionId)).toEqual([1, 2]);
    expect(openAll._unsafeUnwrap().map(p => p.positionId)).toEqual([1, 2]);
    expect(all._unsafeUnwrap().map(p => p.positionId)).toEqual([1, 2, 3]);
  });
});
