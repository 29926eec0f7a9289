import crypto from "node:crypto";
import { NotFoundError } from "../errors.js";
import type { Ledger } from "./db.js";
import { getUser } from "./users.js";

// ── Types ───────────────────────────────────────────────────────────────────

export const ACCOUNT_TYPES = ["checking", "savings", "investment"] as const;

export type AccountType = (typeof ACCOUNT_TYPES)[number];

export interface Account {
  id: string;
  userId: string;
  name: string;
  type: AccountType;
  currency: string;
  balance: number;
  createdAt: string;
}

export interface NewAccount {
  userId: string;
  name: string;
  type: AccountType;
  currency?: string;
  initialBalance?: number;
}

export interface AccountPatch {
  name?: string;
  type?: AccountType;
  currency?: string;
}

interface AccountRow {
  id: string;
  user_id: string;
  name: string;
  type: AccountType;
  currency: string;
  balance: number;
  created_at: string;
}

const COLUMNS = "id, user_id, name, type, currency, balance, created_at";

function toAccount(row: AccountRow): Account {
  return {
    id: row.id,
    userId: row.user_id,
    name: row.name,
    type: row.type,
    currency: row.currency,
    balance: row.balance,
    createdAt: row.created_at,
  };
}

// ── Queries ─────────────────────────────────────────────────────────────────

export function createAccount(db: Ledger, input: NewAccount): Account {
  getUser(db, input.userId);

  const account: Account = {
    id: crypto.randomUUID(),
    userId: input.userId,
    name: input.name,
    type: input.type,
    currency: input.currency ?? "USD",
    balance: input.initialBalance ?? 0,
    createdAt: new Date().toISOString(),
  };

  db.prepare(
    `INSERT INTO accounts (${COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?)`
  ).run(
    account.id,
    account.userId,
    account.name,
    account.type,
    account.currency,
    account.balance,
    account.createdAt
  );

  return account;
}

/** All accounts of a user, newest first. */
export function listAccounts(db: Ledger, userId: string): Account[] {
  return db
    .prepare<[string], AccountRow>(
      `SELECT ${COLUMNS} FROM accounts WHERE user_id = ?
       ORDER BY created_at DESC, rowid DESC`
    )
    .all(userId)
    .map(toAccount);
}

export function findAccount(db: Ledger, id: string): Account | null {
  const row = db
    .prepare<[string], AccountRow>(`SELECT ${COLUMNS} FROM accounts WHERE id = ?`)
    .get(id);
  return row ? toAccount(row) : null;
}

export function getAccount(db: Ledger, id: string): Account {
  const account = findAccount(db, id);
  if (!account) throw new NotFoundError(`Account ${id} not found`);
  return account;
}

/** Change only the supplied fields. */
export function updateAccount(
  db: Ledger,
  id: string,
  patch: AccountPatch
): Account {
  const current = getAccount(db, id);
  const next: Account = {
    ...current,
    name: patch.name ?? current.name,
    type: patch.type ?? current.type,
    currency: patch.currency ?? current.currency,
  };

  db.prepare(
    `UPDATE accounts SET name = ?, type = ?, currency = ? WHERE id = ?`
  ).run(next.name, next.type, next.currency, id);

  return next;
}

/** Manual correction of the stored balance. */
export function adjustAccountBalance(
  db: Ledger,
  id: string,
  newBalance: number
): Account {
  const current = getAccount(db, id);
  db.prepare(`UPDATE accounts SET balance = ? WHERE id = ?`).run(newBalance, id);
  return { ...current, balance: newBalance };
}

/** Add a signed delta to the stored balance. */
export function applyBalanceDelta(db: Ledger, id: string, delta: number): void {
  const result = db
    .prepare(`UPDATE accounts SET balance = balance + ? WHERE id = ?`)
    .run(delta, id);
  if (result.changes === 0) throw new NotFoundError(`Account ${id} not found`);
}

/** Remove the account; its transactions go with it. */
export function deleteAccount(db: Ledger, id: string): void {
  const result = db.prepare(`DELETE FROM accounts WHERE id = ?`).run(id);
  if (result.changes === 0) throw new NotFoundError(`Account ${id} not found`);
}
