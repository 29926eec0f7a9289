// ── Analytics Records ───────────────────────────────────────────────
// Storage-agnostic snapshots consumed by the analysis engine, plus the
// value objects it returns. Nothing here knows about SQLite or MCP.

export type TransactionType = "income" | "expense";

export interface TransactionRecord {
  /** Non-negative magnitude; the sign is implied by `type`. */
  readonly amount: number;
  readonly type: TransactionType;
  readonly category: string;
  readonly date: string; // "YYYY-MM-DD"
  readonly accountId: string;
}

export interface AccountRecord {
  readonly id: string;
  readonly balance: number;
}

export interface BalanceSummary {
  total: number;
  byAccount: Record<string, number>;
}

export interface MonthlyFlow {
  year: number;
  month: number; // 1-12
  income: number;
  expense: number;
  net: number;
}

export interface CategoryDistribution {
  byCategory: Record<string, number>;
  total: number;
}

export type TrendMetric = "income" | "expense" | "net";

export interface MonthlyTrend {
  monthly: Array<[period: string, value: number]>;
  average: number;
}

export interface ForecastPoint {
  period: string; // "YYYY-MM"
  value: number;
}

export interface BalanceForecast {
  points: ForecastPoint[];
  /** Mean monthly net flow used as the per-period increment. */
  slope: number;
}

export interface AnomalyPoint {
  /** Position within the filtered input, 0-based. */
  index: number;
  amount: number;
  type: TransactionType;
  category: string;
  date: string;
  zScore: number;
  accountId: string;
}

export interface AnomalyReport {
  anomalies: AnomalyPoint[];
  threshold: number;
  mean: number;
  std: number;
}

/** Year and month of a "YYYY-MM-DD" date string. */
export function yearMonthOf(date: string): { year: number; month: number } {
  return {
    year: Number(date.slice(0, 4)),
    month: Number(date.slice(5, 7)),
  };
}

/** "YYYY-MM" label with zero padding. */
export function formatPeriod(year: number, month: number): string {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}`;
}

const TAIL_DIGITS = 25;

/**
 * Round to `digits` decimal places, deciding from the exact stored value.
 * Exact ties go to the even neighbour.
 *
 * Applied only where results leave the engine, never to running totals.
 */
export function round(n: number, digits = 2): number {
  if (!Number.isFinite(n)) return n;
  const abs = Math.abs(n);

  // A double that sits exactly on a tie has at most digits + 1 decimals,
  // so its expansion ends in 5 followed by zeros.
  const expanded = abs.toFixed(digits + TAIL_DIGITS);
  const tail = expanded.slice(-TAIL_DIGITS);
  let rounded: number;
  if (tail === "5".padEnd(TAIL_DIGITS, "0")) {
    const head = expanded.slice(0, -TAIL_DIGITS).replace(/\.$/, "");
    const truncated = Number(head);
    rounded =
      Number(head.at(-1)) % 2 === 0
        ? truncated
        : Number((truncated + 10 ** -digits).toFixed(digits));
  } else {
    rounded = Number(abs.toFixed(digits));
  }

  const signed = n < 0 ? -rounded : rounded;
  return signed === 0 ? 0 : signed;
}
