// ── Analytics service ───────────────────────────────────────────────────────
// Loads one user's accounts and transactions, converts them to analysis
// records and runs the pure engine over that snapshot. Rounding happens
// here, at the output boundary.

import {
  detectAnomalies,
  distributionByCategory,
  forecastBalance,
  monthlyFlow,
  monthlyTrend,
  round,
  savingsRatio,
  totalBalance,
  type AccountRecord,
  type AnomalyReport,
  type BalanceForecast,
  type MonthlyFlow,
  type MonthlyTrend,
  type TransactionRecord,
  type TransactionType,
  type TrendMetric,
} from "../analysis/index.js";
import { NotFoundError } from "../errors.js";
import { getAccount, listAccounts, type Account, type AccountType } from "./accounts.js";
import type { Ledger } from "./db.js";
import { listTransactions, type Transaction } from "./transactions.js";
import { getUser } from "./users.js";

// ── Adapters ────────────────────────────────────────────────────────────────

export function toTransactionRecord(tx: Transaction): TransactionRecord {
  return {
    amount: tx.amount,
    type: tx.type,
    category: tx.category,
    date: tx.date,
    accountId: tx.accountId,
  };
}

export function toAccountRecord(account: Account): AccountRecord {
  return { id: account.id, balance: account.balance };
}

// ── Result shapes ───────────────────────────────────────────────────────────

export interface AccountStatus {
  id: string;
  name: string;
  type: AccountType;
  currency: string;
  balance: number;
}

export interface FinancialStatus {
  totalBalance: number;
  byAccount: AccountStatus[];
  byCurrency: Record<string, number>;
  savingsRatio: number | null;
  monthlyFlow: MonthlyFlow[];
  categoryDistribution: {
    byCategory: Record<string, number>;
    total: number;
  };
}

export interface MonthAnalysis {
  year: number;
  month: number;
  flow: MonthlyFlow | null;
  expenseByCategory: Record<string, number>;
  incomeByCategory: Record<string, number>;
  savingsRatio: number | null;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

interface Snapshot {
  accounts: Account[];
  transactions: TransactionRecord[];
}

function loadSnapshot(db: Ledger, userId: string): Snapshot {
  getUser(db, userId);
  return {
    accounts: listAccounts(db, userId),
    transactions: listTransactions(db, userId).map(toTransactionRecord),
  };
}

/** The account must exist and belong to the user. */
function requireOwnedAccount(db: Ledger, userId: string, accountId: string): void {
  const account = getAccount(db, accountId);
  if (account.userId !== userId) {
    throw new NotFoundError(`Account ${accountId} not found`);
  }
}

function roundFlow(flow: MonthlyFlow): MonthlyFlow {
  return {
    year: flow.year,
    month: flow.month,
    income: round(flow.income),
    expense: round(flow.expense),
    net: round(flow.net),
  };
}

function roundValues(values: Record<string, number>): Record<string, number> {
  return Object.fromEntries(
    Object.entries(values).map(([key, value]) => [key, round(value)])
  );
}

function roundRatio(ratio: number | null): number | null {
  return ratio === null ? null : round(ratio, 4);
}

// ── Operations ──────────────────────────────────────────────────────────────

/**
 * Aggregated status. The total comes from the stored balances, which the
 * ledger keeps in step with every transaction write.
 */
export function getFinancialStatus(db: Ledger, userId: string): FinancialStatus {
  const { accounts, transactions } = loadSnapshot(db, userId);

  const byCurrency = new Map<string, number>();
  for (const account of accounts) {
    byCurrency.set(
      account.currency,
      (byCurrency.get(account.currency) ?? 0) + account.balance
    );
  }

  const distribution = distributionByCategory(transactions, { type: "expense" });

  return {
    totalBalance: round(totalBalance(accounts.map(toAccountRecord))),
    byAccount: accounts.map((account) => ({
      id: account.id,
      name: account.name,
      type: account.type,
      currency: account.currency,
      balance: round(account.balance),
    })),
    byCurrency: roundValues(Object.fromEntries(byCurrency)),
    savingsRatio: roundRatio(savingsRatio(transactions)),
    monthlyFlow: monthlyFlow(transactions).map(roundFlow),
    categoryDistribution: {
      byCategory: roundValues(distribution.byCategory),
      total: round(distribution.total),
    },
  };
}

export function analyzeMonth(
  db: Ledger,
  userId: string,
  year: number,
  month: number
): MonthAnalysis {
  const { transactions } = loadSnapshot(db, userId);
  const bucket = monthlyFlow(transactions).find(
    (f) => f.year === year && f.month === month
  );

  return {
    year,
    month,
    flow: bucket ? roundFlow(bucket) : null,
    expenseByCategory: roundValues(
      distributionByCategory(transactions, { type: "expense", year, month })
        .byCategory
    ),
    incomeByCategory: roundValues(
      distributionByCategory(transactions, { type: "income", year, month })
        .byCategory
    ),
    savingsRatio: roundRatio(savingsRatio(transactions, { year, month })),
  };
}

export function getMonthlyTrend(
  db: Ledger,
  userId: string,
  metric: TrendMetric = "net"
): MonthlyTrend {
  const { transactions } = loadSnapshot(db, userId);
  const trend = monthlyTrend(transactions, metric);
  return {
    monthly: trend.monthly.map(([period, value]) => [period, round(value)]),
    average: round(trend.average),
  };
}

export function forecast(
  db: Ledger,
  userId: string,
  options: { accountId?: string; monthsAhead?: number; today?: Date } = {}
): BalanceForecast {
  const { accounts, transactions } = loadSnapshot(db, userId);
  if (options.accountId !== undefined) {
    requireOwnedAccount(db, userId, options.accountId);
  }

  const result = forecastBalance(
    accounts.map(toAccountRecord),
    transactions,
    options
  );
  return { points: result.points, slope: round(result.slope) };
}

export function findAnomalies(
  db: Ledger,
  userId: string,
  options: { accountId?: string; threshold?: number; type?: TransactionType } = {}
): AnomalyReport {
  const { transactions } = loadSnapshot(db, userId);
  if (options.accountId !== undefined) {
    requireOwnedAccount(db, userId, options.accountId);
  }
  return detectAnomalies(transactions, options);
}
