import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { loadCategories } from "../ledger/categories.js";
import { runTool } from "./respond.js";

export function registerCategoryTools(server: McpServer) {
  server.registerTool(
    "list_categories",
    {
      description:
        "Suggested expense and income categories, plus the reserved 'transfer' category used by transfer_between_accounts. Any non-empty category is accepted on a transaction.",
      annotations: { readOnlyHint: true },
    },
    async () => runTool("list_categories", {}, () => loadCategories())
  );
}
