import type { Config } from "../config.js";
import { NotFoundError, ValidationError } from "../errors.js";
import { getAccount, type Account } from "../ledger/accounts.js";
import type { Ledger } from "../ledger/db.js";
import { getTransaction, type Transaction } from "../ledger/transactions.js";

/** What every tool handler closes over. */
export interface ToolContext {
  db: Ledger;
  config: Config;
  /** Default user for calls that omit `user_id`. */
  userId: string;
  /** True when `userId` came from a bearer token. */
  authenticated: boolean;
}

/**
 * The user a call acts for. An authenticated session may only act for
 * its own user.
 */
export function resolveUserId(ctx: ToolContext, requested?: string): string {
  if (requested === undefined) return ctx.userId;
  if (ctx.authenticated && requested !== ctx.userId) {
    throw new ValidationError("user_id does not match the authenticated user");
  }
  return requested;
}

/** Fetch an account the session is allowed to touch. */
export function accessibleAccount(ctx: ToolContext, accountId: string): Account {
  const account = getAccount(ctx.db, accountId);
  if (ctx.authenticated && account.userId !== ctx.userId) {
    throw new NotFoundError(`Account ${accountId} not found`);
  }
  return account;
}

/** Fetch a transaction whose account the session is allowed to touch. */
export function accessibleTransaction(
  ctx: ToolContext,
  transactionId: string
): Transaction {
  const tx = getTransaction(ctx.db, transactionId);
  if (ctx.authenticated) {
    const account = getAccount(ctx.db, tx.accountId);
    if (account.userId !== ctx.userId) {
      throw new NotFoundError(`Transaction ${transactionId} not found`);
    }
  }
  return tx;
}
