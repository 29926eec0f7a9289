// ── Analysis Engine ──────────────────────────────────────────────────
// Barrel export for all analysis modules.
// Pure functions only: no MCP or database dependencies.

export {
  formatPeriod,
  round,
  yearMonthOf,
  type AccountRecord,
  type AnomalyPoint,
  type AnomalyReport,
  type BalanceForecast,
  type BalanceSummary,
  type CategoryDistribution,
  type ForecastPoint,
  type MonthlyFlow,
  type MonthlyTrend,
  type TransactionRecord,
  type TransactionType,
  type TrendMetric,
} from "./types.js";

export {
  balanceByAccount,
  balanceSummary,
  distributionByCategory,
  monthlyFlow,
  monthlyTrend,
  savingsRatio,
  totalBalance,
  type DistributionOptions,
  type PeriodFilter,
} from "./calculator.js";

export { forecastBalance, type ForecastOptions } from "./forecasting.js";

export { detectAnomalies, type AnomalyOptions } from "./anomalies.js";
