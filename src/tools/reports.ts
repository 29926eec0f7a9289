import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { getReportData } from "../ledger/reports.js";
import { resolveUserId, type ToolContext } from "./context.js";
import { runTool } from "./respond.js";
import { isoDate, userIdParam } from "./schemas.js";

export function registerReportTools(server: McpServer, ctx: ToolContext) {
  server.registerTool(
    "get_report",
    {
      description:
        "Report data for a date range, grouped by account currency: accounts, transactions (oldest first), expense totals by category, income and expense totals, plus the monthly flow and savings ratio for the range.",
      inputSchema: {
        from_date: isoDate.describe("Start date, YYYY-MM-DD (inclusive)."),
        to_date: isoDate.describe("End date, YYYY-MM-DD (inclusive)."),
        user_id: userIdParam,
      },
      annotations: { readOnlyHint: true },
    },
    async ({ from_date, to_date, user_id }) =>
      runTool("get_report", { fromDate: from_date, toDate: to_date }, () =>
        getReportData(ctx.db, resolveUserId(ctx, user_id), from_date, to_date)
      )
  );
}
