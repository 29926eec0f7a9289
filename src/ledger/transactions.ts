import crypto from "node:crypto";
import type { TransactionType } from "../analysis/types.js";
import { NotFoundError, ValidationError } from "../errors.js";
import { applyBalanceDelta, getAccount } from "./accounts.js";
import { TRANSFER_CATEGORY } from "./categories.js";
import type { Ledger } from "./db.js";

// ── Types ───────────────────────────────────────────────────────────────────

export interface Transaction {
  id: string;
  accountId: string;
  amount: number;
  type: TransactionType;
  category: string;
  date: string;
  description: string | null;
  createdAt: string;
}

export interface NewTransaction {
  accountId: string;
  amount: number;
  type: TransactionType;
  category: string;
  date: string;
  description?: string | null;
}

export interface TransactionPatch {
  amount?: number;
  type?: TransactionType;
  category?: string;
  date?: string;
  description?: string;
}

export interface TransactionFilters {
  accountId?: string;
  fromDate?: string;
  toDate?: string;
  category?: string;
  type?: TransactionType;
}

export interface TransferInput {
  fromAccountId: string;
  toAccountId: string;
  amount: number;
  date?: string;
  description?: string;
}

interface TransactionRow {
  id: string;
  account_id: string;
  amount: number;
  type: TransactionType;
  category: string;
  date: string;
  description: string | null;
  created_at: string;
}

const COLUMNS =
  "t.id, t.account_id, t.amount, t.type, t.category, t.date, t.description, t.created_at";

function toTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    accountId: row.account_id,
    amount: row.amount,
    type: row.type,
    category: row.category,
    date: row.date,
    description: row.description,
    createdAt: row.created_at,
  };
}

/** Effect of a transaction on its account's stored balance. */
function signedAmount(amount: number, type: TransactionType): number {
  return type === "income" ? amount : -amount;
}

function assertPositive(amount: number): void {
  if (!(amount > 0)) {
    throw new ValidationError("Amount must be positive", { amount });
  }
}

export function todayIso(now: Date = new Date()): string {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, "0");
  const d = String(now.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

// ── Writes ──────────────────────────────────────────────────────────────────

function insertTransaction(db: Ledger, input: NewTransaction): Transaction {
  const tx: Transaction = {
    id: crypto.randomUUID(),
    accountId: input.accountId,
    amount: input.amount,
    type: input.type,
    category: input.category,
    date: input.date,
    description: input.description ?? null,
    createdAt: new Date().toISOString(),
  };

  db.prepare(
    `INSERT INTO transactions (id, account_id, amount, type, category, date, description, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
  ).run(
    tx.id,
    tx.accountId,
    tx.amount,
    tx.type,
    tx.category,
    tx.date,
    tx.description,
    tx.createdAt
  );
  applyBalanceDelta(db, tx.accountId, signedAmount(tx.amount, tx.type));

  return tx;
}

/** Record a transaction and move the account balance accordingly. */
export function addTransaction(db: Ledger, input: NewTransaction): Transaction {
  assertPositive(input.amount);
  return db.transaction(() => {
    getAccount(db, input.accountId);
    return insertTransaction(db, input);
  })();
}

/**
 * Revert the old balance effect, apply the patch, then apply the new
 * effect. Fields left out of the patch keep their current values.
 */
export function updateTransaction(
  db: Ledger,
  id: string,
  patch: TransactionPatch
): Transaction {
  if (patch.amount !== undefined) assertPositive(patch.amount);

  return db.transaction(() => {
    const current = getTransaction(db, id);
    const next: Transaction = {
      ...current,
      amount: patch.amount ?? current.amount,
      type: patch.type ?? current.type,
      category: patch.category ?? current.category,
      date: patch.date ?? current.date,
      description: patch.description ?? current.description,
    };

    applyBalanceDelta(
      db,
      current.accountId,
      -signedAmount(current.amount, current.type)
    );
    db.prepare(
      `UPDATE transactions
       SET amount = ?, type = ?, category = ?, date = ?, description = ?
       WHERE id = ?`
    ).run(next.amount, next.type, next.category, next.date, next.description, id);
    applyBalanceDelta(db, next.accountId, signedAmount(next.amount, next.type));

    return next;
  })();
}

/** Delete a transaction and revert its balance effect. */
export function deleteTransaction(db: Ledger, id: string): void {
  db.transaction(() => {
    const current = getTransaction(db, id);
    applyBalanceDelta(
      db,
      current.accountId,
      -signedAmount(current.amount, current.type)
    );
    db.prepare(`DELETE FROM transactions WHERE id = ?`).run(id);
  })();
}

/**
 * Move money between two accounts: an expense in the source and an income
 * in the destination, both in the reserved transfer category.
 */
export function transferBetweenAccounts(
  db: Ledger,
  input: TransferInput
): { outgoing: Transaction; incoming: Transaction } {
  const { fromAccountId, toAccountId, amount } = input;

  if (fromAccountId === toAccountId) {
    throw new ValidationError(
      "Source and destination accounts must be different"
    );
  }
  assertPositive(amount);

  return db.transaction(() => {
    getAccount(db, fromAccountId);
    getAccount(db, toAccountId);

    const date = input.date ?? todayIso();
    const outgoing = insertTransaction(db, {
      accountId: fromAccountId,
      amount,
      type: "expense",
      category: TRANSFER_CATEGORY,
      date,
      description: input.description || `Transfer to account ${toAccountId}`,
    });
    const incoming = insertTransaction(db, {
      accountId: toAccountId,
      amount,
      type: "income",
      category: TRANSFER_CATEGORY,
      date,
      description: input.description || `Transfer from account ${fromAccountId}`,
    });

    return { outgoing, incoming };
  })();
}

// ── Reads ───────────────────────────────────────────────────────────────────

export function getTransaction(db: Ledger, id: string): Transaction {
  const row = db
    .prepare<[string], TransactionRow>(
      `SELECT ${COLUMNS} FROM transactions t WHERE t.id = ?`
    )
    .get(id);
  if (!row) throw new NotFoundError(`Transaction ${id} not found`);
  return toTransaction(row);
}

/**
 * Transactions across a user's accounts, newest date first. Date bounds
 * are inclusive.
 */
export function listTransactions(
  db: Ledger,
  userId: string,
  filters: TransactionFilters = {}
): Transaction[] {
  const clauses = ["a.user_id = ?"];
  const params: Array<string | number> = [userId];

  if (filters.accountId !== undefined) {
    getAccount(db, filters.accountId);
    clauses.push("t.account_id = ?");
    params.push(filters.accountId);
  }
  if (filters.fromDate !== undefined) {
    clauses.push("t.date >= ?");
    params.push(filters.fromDate);
  }
  if (filters.toDate !== undefined) {
    clauses.push("t.date <= ?");
    params.push(filters.toDate);
  }
  if (filters.category !== undefined) {
    clauses.push("t.category = ?");
    params.push(filters.category);
  }
  if (filters.type !== undefined) {
    clauses.push("t.type = ?");
    params.push(filters.type);
  }

  return db
    .prepare<Array<string | number>, TransactionRow>(
      `SELECT ${COLUMNS}
       FROM transactions t JOIN accounts a ON a.id = t.account_id
       WHERE ${clauses.join(" AND ")}
       ORDER BY t.date DESC, t.created_at DESC, t.rowid DESC`
    )
    .all(...params)
    .map(toTransaction);
}
