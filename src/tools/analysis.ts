import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  analyzeMonth,
  findAnomalies,
  forecast,
  getMonthlyTrend,
} from "../ledger/analytics.js";
import { accessibleAccount, resolveUserId, type ToolContext } from "./context.js";
import { runTool } from "./respond.js";
import { transactionType, userIdParam, uuid } from "./schemas.js";

export function registerAnalysisTools(server: McpServer, ctx: ToolContext) {
  server.registerTool(
    "analyze_month",
    {
      description:
        "Analyze one calendar month: income/expense flow, expenses and incomes by category, and the savings ratio (null when there was no income).",
      inputSchema: {
        year: z.number().int().min(1900).max(9999).describe("Year, e.g. 2025."),
        month: z.number().int().min(1).max(12).describe("Month 1-12."),
        user_id: userIdParam,
      },
      annotations: { readOnlyHint: true },
    },
    async ({ year, month, user_id }) =>
      runTool("analyze_month", { year, month, userId: user_id }, () =>
        analyzeMonth(ctx.db, resolveUserId(ctx, user_id), year, month)
      )
  );

  server.registerTool(
    "get_monthly_trend",
    {
      description:
        "Monthly series of net flow, income or expense with its simple average. Use this to see whether finances are improving month over month.",
      inputSchema: {
        metric: z
          .enum(["net", "income", "expense"])
          .optional()
          .describe("Which monthly value to report. Defaults to net."),
        user_id: userIdParam,
      },
      annotations: { readOnlyHint: true },
    },
    async ({ metric, user_id }) =>
      runTool("get_monthly_trend", { metric, userId: user_id }, () =>
        getMonthlyTrend(ctx.db, resolveUserId(ctx, user_id), metric)
      )
  );

  server.registerTool(
    "forecast_balance",
    {
      description:
        "Project balances for the next N months using the average monthly net flow. Forecasts one account, or the total across all accounts when account_id is omitted.",
      inputSchema: {
        months_ahead: z
          .number()
          .int()
          .positive()
          .max(120)
          .optional()
          .describe("Number of months to project. Defaults to 3."),
        account_id: uuid.optional().describe("Account UUID. Omit for the total."),
        user_id: userIdParam,
      },
      annotations: { readOnlyHint: true },
    },
    async ({ months_ahead, account_id, user_id }) =>
      runTool(
        "forecast_balance",
        { monthsAhead: months_ahead, accountId: account_id },
        () => {
          const userId = resolveUserId(ctx, user_id);
          if (account_id !== undefined) accessibleAccount(ctx, account_id);
          return forecast(ctx.db, userId, {
            accountId: account_id,
            monthsAhead: months_ahead ?? 3,
          });
        }
      )
  );

  server.registerTool(
    "detect_anomalies",
    {
      description:
        "Flag transactions whose amount lies threshold or more standard deviations from the mean (z-score). Optionally restrict to one account or transaction type.",
      inputSchema: {
        threshold: z
          .number()
          .positive()
          .optional()
          .describe("Z-score threshold. Defaults to 3."),
        account_id: uuid.optional().describe("Account UUID. Omit for all accounts."),
        transaction_type: transactionType
          .optional()
          .describe("Only consider income or expense transactions."),
        user_id: userIdParam,
      },
      annotations: { readOnlyHint: true },
    },
    async ({ threshold, account_id, transaction_type, user_id }) =>
      runTool("detect_anomalies", { threshold, accountId: account_id }, () => {
        const userId = resolveUserId(ctx, user_id);
        if (account_id !== undefined) accessibleAccount(ctx, account_id);
        return findAnomalies(ctx.db, userId, {
          threshold: threshold ?? 3,
          accountId: account_id,
          type: transaction_type,
        });
      })
  );
}
