import crypto from "node:crypto";
import type { Ledger } from "../ledger/db.js";
import { getUser } from "../ledger/users.js";

// ── Types ───────────────────────────────────────────────────────────────────

export interface IssuedToken {
  token: string;
  userId: string;
  expiresAt: number;
  expiresInHours: number;
}

// ── Tokens ──────────────────────────────────────────────────────────────────

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/** Issue an opaque bearer token for an existing user. */
export function issueToken(
  db: Ledger,
  userId: string,
  ttlHours: number,
  now: number = nowSeconds()
): IssuedToken {
  getUser(db, userId);

  const token = crypto.randomBytes(32).toString("hex");
  const expiresAt = now + ttlHours * 60 * 60;

  db.prepare(
    `INSERT INTO tokens (token, user_id, created_at, expires_at) VALUES (?, ?, ?, ?)`
  ).run(token, userId, now, expiresAt);

  return { token, userId, expiresAt, expiresInHours: ttlHours };
}

/** The user a live token belongs to, or null for unknown or expired tokens. */
export function resolveToken(
  db: Ledger,
  token: string,
  now: number = nowSeconds()
): string | null {
  const row = db
    .prepare<[string, number], { user_id: string }>(
      `SELECT user_id FROM tokens WHERE token = ? AND expires_at > ?`
    )
    .get(token, now);

  return row?.user_id ?? null;
}

// ── Maintenance ─────────────────────────────────────────────────────────────

/** Delete expired tokens and return how many were removed. */
export function cleanupExpiredTokens(
  db: Ledger,
  now: number = nowSeconds()
): number {
  return db.prepare("DELETE FROM tokens WHERE expires_at <= ?").run(now).changes;
}
