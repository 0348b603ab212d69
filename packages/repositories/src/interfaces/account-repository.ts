/**
 * Account Repository Interface
 *
 * - Accounts are created once with a caller-assigned id and never deleted
 * - Balance / margin fields are overwritten on trade or valuation events
 */

import type { ResultAsync } from "neverthrow";
import type { Account } from "@tradebook/db";

import type { RepositoryError } from "./errors";

export interface AccountCreate {
  accountId: number;
  owner: string;
  /** Column default 0 when omitted */
  cashBalance?: number;
  marginRequirement?: number;
  marginUsed?: number;
}

export interface AccountBalanceUpdate {
  cashBalance?: number;
  marginRequirement?: number;
  marginUsed?: number;
  /** Defaults to now */
  lastUpdate?: Date;
}

export interface AccountRepository {
  createAccount(account: AccountCreate): ResultAsync<Account, RepositoryError>;

  findById(accountId: number): ResultAsync<Account | null, RepositoryError>;

  /**
   * All accounts ordered by account_id
   */
  listAccounts(): ResultAsync<Account[], RepositoryError>;

  /**
   * Overwrite cash / margin state. NOT_FOUND when the account does not exist.
   *
   * margin_used is not checked against margin_requirement + cash_balance.
   */
  updateBalances(accountId: number, update: AccountBalanceUpdate): ResultAsync<Account, RepositoryError>;
}
