import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Config } from "../config.js";
import type { Ledger } from "../ledger/db.js";
import {
  registerAccountTools,
  registerAnalysisTools,
  registerCategoryTools,
  registerHealthTools,
  registerPrompts,
  registerReportTools,
  registerResources,
  registerStatusTools,
  registerTransactionTools,
  type ToolContext,
} from "../tools/index.js";

export const SERVER_NAME = "ledger-mcp";
export const SERVER_VERSION = "0.1.0";

export interface McpServerOptions {
  db: Ledger;
  config: Config;
  /** User resolved from a bearer token. Scopes every call of the session. */
  userId?: string;
}

/**
 * Create and configure a fully-loaded MCP server instance
 * with all tools, resources, and prompts registered.
 */
export function createMcpServer(options: McpServerOptions): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  const ctx: ToolContext = {
    db: options.db,
    config: options.config,
    userId: options.userId ?? options.config.auth.defaultUserId,
    authenticated: options.userId !== undefined,
  };

  // Ledger tools: accounts, transactions, transfers
  registerHealthTools(server, ctx);
  registerAccountTools(server, ctx);
  registerTransactionTools(server, ctx);
  registerCategoryTools(server);

  // Analysis tools: computed over the stored ledger
  registerStatusTools(server, ctx);
  registerAnalysisTools(server, ctx);
  registerReportTools(server, ctx);

  // Resources: read-only data surfaces
  registerResources(server, ctx);

  // Prompts: canned analysis templates
  registerPrompts(server);

  return server;
}
