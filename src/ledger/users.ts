import crypto from "node:crypto";
import { NotFoundError } from "../errors.js";
import type { Ledger } from "./db.js";

export interface User {
  id: string;
  email: string;
  createdAt: string;
}

interface UserRow {
  id: string;
  email: string;
  created_at: string;
}

export function createUser(db: Ledger, email: string): User {
  const user: User = {
    id: crypto.randomUUID(),
    email,
    createdAt: new Date().toISOString(),
  };
  db.prepare(`INSERT INTO users (id, email, created_at) VALUES (?, ?, ?)`).run(
    user.id,
    user.email,
    user.createdAt
  );
  return user;
}

export function findUser(db: Ledger, id: string): User | null {
  const row = db
    .prepare<[string], UserRow>(
      `SELECT id, email, created_at FROM users WHERE id = ?`
    )
    .get(id);
  return row ? { id: row.id, email: row.email, createdAt: row.created_at } : null;
}

export function getUser(db: Ledger, id: string): User {
  const user = findUser(db, id);
  if (!user) throw new NotFoundError(`User ${id} not found`);
  return user;
}
