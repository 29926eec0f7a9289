import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { issueToken } from "../auth/tokens.js";
import { errorMessage } from "../errors.js";
import { pingLedger } from "../ledger/db.js";
import { createLogger } from "../logger.js";
import { resolveUserId, type ToolContext } from "./context.js";
import { runTool } from "./respond.js";
import { userIdParam } from "./schemas.js";

const log = createLogger("health");

export function registerHealthTools(server: McpServer, ctx: ToolContext) {
  server.registerTool(
    "health_check",
    {
      description:
        "Check that the server is running and the database answers. Use this to verify the connection before other calls.",
      annotations: { readOnlyHint: true },
    },
    async () => {
      let text: string;
      try {
        if (!pingLedger(ctx.db)) throw new Error("SELECT 1 returned no row");
        log.info("health_check", { status: "OK" });
        text = "OK: Server and database connection healthy.";
      } catch (error) {
        log.warn("health_check db unreachable", { error: errorMessage(error) });
        text = `WARN: Server running but database unreachable: ${errorMessage(error)}`;
      }
      return { content: [{ type: "text" as const, text }] };
    }
  );

  server.registerTool(
    "get_token",
    {
      description:
        "Issue a bearer token for HTTP access to /mcp. The token scopes the session to the user.",
      inputSchema: { user_id: userIdParam },
    },
    async ({ user_id }) =>
      runTool("get_token", { userId: user_id }, () => {
        const issued = issueToken(
          ctx.db,
          resolveUserId(ctx, user_id),
          ctx.config.auth.tokenTtlHours
        );
        return {
          token: issued.token,
          userId: issued.userId,
          expiresInHours: issued.expiresInHours,
        };
      })
  );
}
