// ── Balance Calculator ──────────────────────────────────────────────
// Balances, monthly cash flow, savings ratio, category distribution and
// monthly trend over transaction records.
//
// Source of truth for balances: when a `transactions` argument is
// supplied (even an empty array) balances are recomputed from it and
// stored account balances are ignored. Only an omitted argument falls
// back to the accounts.

import {
  formatPeriod,
  yearMonthOf,
  type AccountRecord,
  type BalanceSummary,
  type CategoryDistribution,
  type MonthlyFlow,
  type MonthlyTrend,
  type TransactionRecord,
  type TransactionType,
  type TrendMetric,
} from "./types.js";

export interface PeriodFilter {
  year: number;
  month: number;
}

export interface DistributionOptions {
  /** Transaction type to distribute (default: "expense") */
  type?: TransactionType;
  year?: number;
  month?: number;
}

function signedAmount(tx: TransactionRecord): number {
  return tx.type === "income" ? tx.amount : -tx.amount;
}

/**
 * Total balance. Sums signed transaction amounts across every account
 * when `transactions` is given, otherwise sums stored balances.
 */
export function totalBalance(
  accounts: readonly AccountRecord[],
  transactions?: readonly TransactionRecord[],
): number {
  if (transactions !== undefined) {
    let total = 0;
    for (const tx of transactions) {
      total += signedAmount(tx);
    }
    return total;
  }
  return accounts.reduce((sum, a) => sum + a.balance, 0);
}

/**
 * Balance per account id. From transactions, only accounts that appear
 * in the list get an entry.
 */
export function balanceByAccount(
  accounts: readonly AccountRecord[],
  transactions?: readonly TransactionRecord[],
): Record<string, number> {
  const result = new Map<string, number>();

  if (transactions !== undefined) {
    for (const tx of transactions) {
      const current = result.get(tx.accountId) ?? 0;
      result.set(tx.accountId, current + signedAmount(tx));
    }
  } else {
    for (const account of accounts) {
      result.set(account.id, account.balance);
    }
  }

  return Object.fromEntries(result);
}

export function balanceSummary(
  accounts: readonly AccountRecord[],
  transactions?: readonly TransactionRecord[],
): BalanceSummary {
  return {
    total: totalBalance(accounts, transactions),
    byAccount: balanceByAccount(accounts, transactions),
  };
}

/**
 * Income and expense per calendar month, in ascending (year, month)
 * order regardless of input order.
 */
export function monthlyFlow(
  transactions: readonly TransactionRecord[],
): MonthlyFlow[] {
  const buckets = new Map<
    number,
    { year: number; month: number; income: number; expense: number }
  >();

  for (const tx of transactions) {
    const { year, month } = yearMonthOf(tx.date);
    const key = year * 12 + (month - 1);

    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = { year, month, income: 0, expense: 0 };
      buckets.set(key, bucket);
    }

    if (tx.type === "income") {
      bucket.income += tx.amount;
    } else {
      bucket.expense += tx.amount;
    }
  }

  return [...buckets.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, b]) => ({
      year: b.year,
      month: b.month,
      income: b.income,
      expense: b.expense,
      net: b.income - b.expense,
    }));
}

/**
 * Savings ratio = (income - expense) / income over the selected months.
 *
 * Returns `null` when there is no flow for the period or no positive
 * income to compare against. A negative ratio means spending exceeded
 * income.
 */
export function savingsRatio(
  transactions: readonly TransactionRecord[],
  period?: PeriodFilter,
): number | null {
  let flow = monthlyFlow(transactions);
  if (period) {
    flow = flow.filter((f) => f.year === period.year && f.month === period.month);
  }
  if (flow.length === 0) return null;

  const totalIncome = flow.reduce((sum, f) => sum + f.income, 0);
  const totalExpense = flow.reduce((sum, f) => sum + f.expense, 0);
  if (totalIncome <= 0) return null;

  return (totalIncome - totalExpense) / totalIncome;
}

/**
 * Sum of amounts per category for one transaction type, optionally
 * narrowed to a year and/or month.
 */
export function distributionByCategory(
  transactions: readonly TransactionRecord[],
  options: DistributionOptions = {},
): CategoryDistribution {
  const type = options.type ?? "expense";
  const sums = new Map<string, number>();

  for (const tx of transactions) {
    if (tx.type !== type) continue;
    const { year, month } = yearMonthOf(tx.date);
    if (options.year !== undefined && year !== options.year) continue;
    if (options.month !== undefined && month !== options.month) continue;

    sums.set(tx.category, (sums.get(tx.category) ?? 0) + tx.amount);
  }

  let total = 0;
  for (const value of sums.values()) {
    total += value;
  }
  return { byCategory: Object.fromEntries(sums), total };
}

/**
 * Monthly series of one flow metric with its simple (unweighted) mean.
 */
export function monthlyTrend(
  transactions: readonly TransactionRecord[],
  metric: TrendMetric = "net",
): MonthlyTrend {
  const monthly: MonthlyTrend["monthly"] = monthlyFlow(transactions).map(
    (f) => [formatPeriod(f.year, f.month), f[metric]],
  );

  const average =
    monthly.length > 0
      ? monthly.reduce((sum, [, v]) => sum + v, 0) / monthly.length
      : 0;

  return { monthly, average };
}
