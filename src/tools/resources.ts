import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { listAccounts } from "../ledger/accounts.js";
import { getFinancialStatus } from "../ledger/analytics.js";
import { loadCategories } from "../ledger/categories.js";
import type { ToolContext } from "./context.js";

function json(uri: URL, data: unknown) {
  return {
    contents: [
      {
        uri: uri.href,
        mimeType: "application/json",
        text: JSON.stringify(data, null, 2),
      },
    ],
  };
}

export function registerResources(server: McpServer, ctx: ToolContext) {
  server.registerResource(
    "accounts",
    "ledger://accounts",
    { description: "The session user's accounts with current balances" },
    async (uri) => json(uri, listAccounts(ctx.db, ctx.userId))
  );

  server.registerResource(
    "status",
    "ledger://status",
    {
      description:
        "Financial status snapshot: totals, savings ratio, monthly flow and expense distribution",
    },
    async (uri) => json(uri, getFinancialStatus(ctx.db, ctx.userId))
  );

  server.registerResource(
    "categories",
    "ledger://categories",
    { description: "Suggested transaction categories" },
    async (uri) => json(uri, loadCategories())
  );
}
