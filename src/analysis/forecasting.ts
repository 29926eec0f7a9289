// ── Balance Forecasting ─────────────────────────────────────────────
// Projects monthly balances forward using the mean historical monthly
// net flow as a constant per-month increment.

import { balanceByAccount, monthlyFlow } from "./calculator.js";
import {
  formatPeriod,
  round,
  type AccountRecord,
  type BalanceForecast,
  type ForecastPoint,
  type TransactionRecord,
} from "./types.js";

export interface ForecastOptions {
  /** Forecast a single account. Total across accounts if omitted. */
  accountId?: string;
  /** Number of monthly points to project (default: 3) */
  monthsAhead?: number;
  /** Anchor for the no-history case (default: now) */
  today?: Date;
}

/**
 * Forecast balances for the next `monthsAhead` months.
 *
 * With history, projection starts the month after the last month that
 * has transactions. Without history it is flat at the current balance,
 * starting the month after `today`.
 */
export function forecastBalance(
  accounts: readonly AccountRecord[],
  transactions: readonly TransactionRecord[],
  options: ForecastOptions = {},
): BalanceForecast {
  const monthsAhead = options.monthsAhead ?? 3;
  const { accountId } = options;

  const history =
    accountId !== undefined
      ? transactions.filter((tx) => tx.accountId === accountId)
      : transactions;
  const flow = monthlyFlow(history);

  const current = currentBalance(accounts, transactions, accountId);

  // ── No history: flat projection from today ────────────────────────
  const lastBucket = flow[flow.length - 1];
  if (!lastBucket) {
    const today = options.today ?? new Date();
    const points = projectMonths(
      today.getFullYear(),
      today.getMonth() + 1,
      monthsAhead,
      () => round(current),
    );
    return { points, slope: 0 };
  }

  // ── History: accumulate the mean net per month ────────────────────
  const slope = flow.reduce((sum, f) => sum + f.net, 0) / flow.length;

  let running = current;
  const points = projectMonths(
    lastBucket.year,
    lastBucket.month,
    monthsAhead,
    () => {
      running += slope;
      return round(running);
    },
  );

  return { points, slope };
}

// ── Helpers ─────────────────────────────────────────────────────────

/**
 * Current balance for the account (or summed across all). Transactions
 * override stored balances only when there are any.
 */
function currentBalance(
  accounts: readonly AccountRecord[],
  transactions: readonly TransactionRecord[],
  accountId: string | undefined,
): number {
  const balances = balanceByAccount(
    accounts,
    transactions.length > 0 ? transactions : undefined,
  );

  if (accountId !== undefined) {
    return balances[accountId] ?? 0;
  }
  return Object.values(balances).reduce((sum, v) => sum + v, 0);
}

/**
 * Emit `count` consecutive monthly points after (year, month), wrapping
 * December into January of the next year.
 */
function projectMonths(
  year: number,
  month: number,
  count: number,
  valueFor: () => number,
): ForecastPoint[] {
  const points: ForecastPoint[] = [];
  let y = year;
  let m = month;

  for (let i = 0; i < count; i++) {
    m += 1;
    if (m > 12) {
      m = 1;
      y += 1;
    }
    points.push({ period: formatPeriod(y, m), value: valueFor() });
  }

  return points;
}
