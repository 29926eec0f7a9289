// ── Domain errors ───────────────────────────────────────────────────────────

/** Base class for errors the ledger raises on purpose. */
export class LedgerError extends Error {
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

/** A referenced user, account or transaction does not exist. */
export class NotFoundError extends LedgerError {}

/** Input that passed schema checks but breaks a ledger rule. */
export class ValidationError extends LedgerError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
