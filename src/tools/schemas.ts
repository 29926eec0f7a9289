import { z } from "zod";
import { ACCOUNT_TYPES } from "../ledger/accounts.js";

// Shared input fields for tool schemas.

export const uuid = z.string().uuid();

/** A real calendar date written as YYYY-MM-DD. */
export const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Use YYYY-MM-DD")
  .refine((value) => {
    const [y, m, d] = value.split("-").map(Number);
    if (y === undefined || m === undefined || d === undefined) return false;
    const date = new Date(Date.UTC(y, m - 1, d));
    return (
      date.getUTCFullYear() === y &&
      date.getUTCMonth() === m - 1 &&
      date.getUTCDate() === d
    );
  }, "Not a valid calendar date");

export const positiveAmount = z.number().positive();

export const accountType = z.enum(ACCOUNT_TYPES);

export const transactionType = z.enum(["income", "expense"]);

export const currencyCode = z
  .string()
  .regex(/^[A-Z]{3}$/, "Use a 3-letter ISO 4217 code such as USD");

export const category = z.string().min(1).max(100);

export const userIdParam = uuid
  .optional()
  .describe(
    "User UUID. Defaults to the session's user (the configured default user when not authenticated)."
  );
