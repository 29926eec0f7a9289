import Database from "better-sqlite3";
import { DEFAULT_USER_ID } from "../config.js";

export type Ledger = Database.Database;

export const DEFAULT_USER_EMAIL = "default@ledger.local";

// ── Schema ──────────────────────────────────────────────────────────────────

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    email TEXT NOT NULL UNIQUE,
    created_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS accounts (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    name TEXT NOT NULL,
    type TEXT NOT NULL CHECK(type IN ('checking', 'savings', 'investment')),
    currency TEXT NOT NULL DEFAULT 'USD',
    balance REAL NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_accounts_user ON accounts(user_id)`,
  `CREATE TABLE IF NOT EXISTS transactions (
    id TEXT PRIMARY KEY,
    account_id TEXT NOT NULL REFERENCES accounts(id) ON DELETE CASCADE,
    amount REAL NOT NULL,
    type TEXT NOT NULL CHECK(type IN ('income', 'expense')),
    category TEXT NOT NULL,
    date TEXT NOT NULL,
    description TEXT,
    created_at TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_transactions_account_date
    ON transactions(account_id, date)`,
  `CREATE TABLE IF NOT EXISTS tokens (
    token TEXT PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    created_at INTEGER NOT NULL,
    expires_at INTEGER NOT NULL
  )`,
];

/**
 * Open (or create) the ledger database and make sure the schema and the
 * default user exist. Pass ":memory:" for a throwaway database.
 * A configured default user other than the built-in one is seeded with
 * an address derived from its id, since emails are unique.
 */
export function openLedger(path: string, defaultUserId = DEFAULT_USER_ID): Ledger {
  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");
  db.pragma("foreign_keys = ON");

  for (const statement of SCHEMA) {
    db.exec(statement);
  }

  db.prepare(
    `INSERT OR IGNORE INTO users (id, email, created_at) VALUES (?, ?, ?)`
  ).run(defaultUserId, defaultUserEmail(defaultUserId), new Date().toISOString());

  return db;
}

function defaultUserEmail(userId: string): string {
  return userId === DEFAULT_USER_ID ? DEFAULT_USER_EMAIL : `${userId}@ledger.local`;
}

export function pingLedger(db: Ledger): boolean {
  const row = db.prepare<[], { ok: number }>("SELECT 1 AS ok").get();
  return row?.ok === 1;
}
