// ── Anomaly Detection ───────────────────────────────────────────────
// Flags transactions whose amount lies `threshold` or more population
// standard deviations away from the mean of the filtered set.

import {
  round,
  type AnomalyPoint,
  type AnomalyReport,
  type TransactionRecord,
  type TransactionType,
} from "./types.js";

export interface AnomalyOptions {
  /** |z| at or above this value is anomalous (default: 3) */
  threshold?: number;
  /** Only consider transactions of this account */
  accountId?: string;
  /** Only consider transactions of this type */
  type?: TransactionType;
}

/**
 * Detect outlier amounts using z-scores.
 *
 * Mean and standard deviation are population statistics (divide by N):
 * the filtered transactions are the whole population under analysis.
 * Anomalies keep the order of the filtered input. Fewer than two
 * transactions yields an empty report with zero mean and std.
 */
export function detectAnomalies(
  transactions: readonly TransactionRecord[],
  options: AnomalyOptions = {},
): AnomalyReport {
  const threshold = options.threshold ?? 3;
  const { accountId, type } = options;

  const filtered = transactions.filter(
    (tx) =>
      (accountId === undefined || tx.accountId === accountId) &&
      (type === undefined || tx.type === type),
  );

  if (filtered.length < 2) {
    return { anomalies: [], threshold, mean: 0, std: 0 };
  }

  const { mean, std } = populationStats(filtered.map((tx) => tx.amount));

  const anomalies: AnomalyPoint[] = [];
  filtered.forEach((tx, index) => {
    const z = std === 0 ? 0 : (tx.amount - mean) / std;
    if (Math.abs(z) < threshold) return;

    anomalies.push({
      index,
      amount: tx.amount,
      type: tx.type,
      category: tx.category,
      date: tx.date,
      zScore: round(z),
      accountId: tx.accountId,
    });
  });

  return {
    anomalies,
    threshold,
    mean: round(mean),
    std: round(std),
  };
}

// ── Internal helpers ────────────────────────────────────────────────

function populationStats(values: number[]): { mean: number; std: number } {
  const n = values.length;
  const mean = values.reduce((s, v) => s + v, 0) / n;

  let variance = 0;
  for (const v of values) {
    variance += (v - mean) ** 2;
  }
  variance /= n;

  return { mean, std: variance > 0 ? Math.sqrt(variance) : 0 };
}
