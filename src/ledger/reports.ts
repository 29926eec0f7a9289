import {
  monthlyFlow,
  round,
  savingsRatio,
  type MonthlyFlow,
  type TransactionType,
} from "../analysis/index.js";
import { ValidationError } from "../errors.js";
import { listAccounts } from "./accounts.js";
import { toTransactionRecord, type AccountStatus } from "./analytics.js";
import type { Ledger } from "./db.js";
import { listTransactions } from "./transactions.js";
import { getUser } from "./users.js";

export interface ReportRow {
  date: string;
  description: string;
  category: string;
  amount: number;
  accountName: string;
  type: TransactionType;
}

export interface CurrencyReport {
  currency: string;
  accounts: AccountStatus[];
  transactions: ReportRow[];
  byCategory: Record<string, number>;
  totalIncome: number;
  totalExpenses: number;
}

export interface ReportData {
  userEmail: string;
  fromDate: string;
  toDate: string;
  generatedAt: string;
  byCurrency: Record<string, CurrencyReport>;
  monthlyFlow: MonthlyFlow[];
  savingsRatio: number | null;
}

/**
 * Everything a report over [fromDate, toDate] needs, grouped by the
 * currency of each account. Transactions are listed oldest first.
 */
export function getReportData(
  db: Ledger,
  userId: string,
  fromDate: string,
  toDate: string
): ReportData {
  if (fromDate > toDate) {
    throw new ValidationError("from_date must be before or equal to to_date", {
      fromDate,
      toDate,
    });
  }

  const user = getUser(db, userId);
  const accounts = listAccounts(db, userId);
  const transactions = listTransactions(db, userId, { fromDate, toDate });

  const groups = new Map<string, CurrencyReport>();
  const group = (currency: string): CurrencyReport => {
    let entry = groups.get(currency);
    if (!entry) {
      entry = {
        currency,
        accounts: [],
        transactions: [],
        byCategory: {},
        totalIncome: 0,
        totalExpenses: 0,
      };
      groups.set(currency, entry);
    }
    return entry;
  };

  const accountById = new Map(accounts.map((a) => [a.id, a]));
  for (const account of accounts) {
    group(account.currency).accounts.push({
      id: account.id,
      name: account.name,
      type: account.type,
      currency: account.currency,
      balance: round(account.balance),
    });
  }

  const categoryTotals = new Map<string, Map<string, number>>();

  for (const tx of transactions) {
    const account = accountById.get(tx.accountId);
    const currency = account?.currency ?? "USD";
    const entry = group(currency);

    entry.transactions.push({
      date: tx.date,
      description: tx.description ?? "",
      category: tx.category,
      amount: tx.amount,
      accountName: account?.name ?? "?",
      type: tx.type,
    });

    if (tx.type === "income") {
      entry.totalIncome += tx.amount;
    } else {
      entry.totalExpenses += tx.amount;
      const totals = categoryTotals.get(currency) ?? new Map<string, number>();
      totals.set(tx.category, (totals.get(tx.category) ?? 0) + tx.amount);
      categoryTotals.set(currency, totals);
    }
  }

  const byCurrency: Record<string, CurrencyReport> = {};
  for (const [currency, entry] of groups) {
    entry.transactions.sort((a, b) => a.date.localeCompare(b.date));
    entry.byCategory = Object.fromEntries(
      [...(categoryTotals.get(currency) ?? [])].map(([cat, v]) => [cat, round(v)])
    );
    entry.totalIncome = round(entry.totalIncome);
    entry.totalExpenses = round(entry.totalExpenses);
    byCurrency[currency] = entry;
  }

  const records = transactions.map(toTransactionRecord);
  const ratio = savingsRatio(records);

  return {
    userEmail: user.email,
    fromDate,
    toDate,
    generatedAt: new Date().toISOString(),
    byCurrency,
    monthlyFlow: monthlyFlow(records).map((f) => ({
      year: f.year,
      month: f.month,
      income: round(f.income),
      expense: round(f.expense),
      net: round(f.net),
    })),
    savingsRatio: ratio === null ? null : round(ratio, 4),
  };
}
