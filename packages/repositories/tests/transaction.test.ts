/**
 * withTransaction Tests (PGlite)
 */

import { errAsync } from "neverthrow";
import { beforeEach, describe, expect, it } from "vitest";

import type { RepositoryError } from "../src/interfaces";
import { withTransaction } from "../src/postgres";
import { at, useTestDb } from "./support/test-db";

const fill = {
  accountId: 1,
  symbol: "BTCUSDT",
  timestamp: at("2024-03-01T10:00:00.000Z"),
  side: "buy",
  quantity: 0.5,
  price: 40000,
  fee: 20,
};

describe("withTransaction", () => {
  const ctx = useTestDb();

  beforeEach(async () => {
    await ctx.repos.accounts.createAccount({ accountId: 1, owner: "alice", cashBalance: 50000 });
  });

  it("commits the trade and the balance update together", async () => {
    const result = await withTransaction(ctx.db, repos =>
      repos.trades
        .insertTrade(fill)
        .andThen(trade => repos.accounts.updateBalances(1, { cashBalance: 50000 - trade.quantity * trade.price - 20 })),
    );

    expect(result._unsafeUnwrap().cashBalance).toBe(29980);
    expect((await ctx.repos.trades.getTradesByAccount(1))._unsafeUnwrap()).toHaveLength(1);
  });

  it("rolls back the trade when the balance update fails", async () => {
    const result = await withTransaction(ctx.db, repos =>
      repos.trades.insertTrade(fill).andThen(() => repos.accounts.updateBalances(2, { cashBalance: 0 })),
    );

    expect(result._unsafeUnwrapErr()).toEqual({ type: "NOT_FOUND", message: "account 2 not found" });
    expect((await ctx.repos.trades.getTradesByAccount(1))._unsafeUnwrap()).toEqual([]);
    expect((await ctx.repos.accounts.findById(1))._unsafeUnwrap()?.cashBalance).toBe(50000);
  });

  it("returns an Err produced by the work function unchanged", async () => {
    const result = await withTransaction<number>(ctx.db, () =>
      errAsync<number, RepositoryError>({ type: "DB_ERROR", message: "aborted by caller" }),
    );

    expect(result._unsafeUnwrapErr()).toEqual({ type: "DB_ERROR", message: "aborted by caller" });
  });
});
