/**
 * Postgres Account Repository
 */

import { asc, eq } from "drizzle-orm";
import { ResultAsync } from "neverthrow";
import { accounts, type Account, type Db } from "@tradebook/db";

import type { AccountBalanceUpdate, AccountCreate, AccountRepository } from "../interfaces/account-repository";
import type { RepositoryError } from "../interfaces/errors";
import { firstOrNull, firstRow, toRepositoryError } from "./errors";

export function createPostgresAccountRepository(db: Db): AccountRepository {
  return {
    createAccount(account: AccountCreate): ResultAsync<Account, RepositoryError> {
      return ResultAsync.fromPromise(
        db
          .insert(accounts)
          .values({
            accountId: account.accountId,
            owner: account.owner,
            // undefined falls back to the column default (0)
            cashBalance: account.cashBalance,
            marginRequirement: account.marginRequirement,
            marginUsed: account.marginUsed,
          })
          .returning(),
        toRepositoryError,
      ).andThen(firstRow<Account>(`account ${account.accountId}`));
    },

    findById(accountId: number): ResultAsync<Account | null, RepositoryError> {
      return ResultAsync.fromPromise(
        db.select().from(accounts).where(eq(accounts.accountId, accountId)).limit(1),
        toRepositoryError,
      ).map(firstOrNull);
    },

    listAccounts(): ResultAsync<Account[], RepositoryError> {
      return ResultAsync.fromPromise(db.select().from(accounts).orderBy(asc(accounts.accountId)), toRepositoryError);
    },

    updateBalances(accountId: number, update: AccountBalanceUpdate): ResultAsync<Account, RepositoryError> {
      return ResultAsync.fromPromise(
        db
          .update(accounts)
          .set({
            cashBalance: update.cashBalance,
            marginRequirement: update.marginRequirement,
            marginUsed: update.marginUsed,
            lastUpdate: update.lastUpdate ?? new Date(),
          })
          .where(eq(accounts.accountId, accountId))
          .returning(),
        toRepositoryError,
      ).andThen(firstRow<Account>(`account ${accountId}`));
    },
  };
}
