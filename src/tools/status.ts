import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { getFinancialStatus } from "../ledger/analytics.js";
import { resolveUserId, type ToolContext } from "./context.js";
import { runTool } from "./respond.js";
import { userIdParam } from "./schemas.js";

export function registerStatusTools(server: McpServer, ctx: ToolContext) {
  server.registerTool(
    "get_financial_status",
    {
      description:
        "Aggregated financial status: total balance, balances by account and by currency, savings ratio, monthly income/expense flow and expense distribution by category.",
      inputSchema: { user_id: userIdParam },
      annotations: { readOnlyHint: true },
    },
    async ({ user_id }) =>
      runTool("get_financial_status", { userId: user_id }, () =>
        getFinancialStatus(ctx.db, resolveUserId(ctx, user_id))
      )
  );
}
