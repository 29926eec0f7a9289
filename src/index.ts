#!/usr/bin/env node
/**
 * Ledger MCP Server
 *
 * Personal-finance bookkeeping and analytics over MCP, backed by SQLite.
 * Supports dual transport: stdio (desktop clients) and HTTP.
 *
 * Usage:
 *   node dist/index.js --transport stdio   # Local
 *   node dist/index.js --transport http    # HTTP server on port 3200
 */

import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { openLedger } from "./ledger/db.js";
import { createLogger, setLogLevel } from "./logger.js";
import { createMcpServer } from "./mcp/server.js";

const config = loadConfig();
setLogLevel(config.logLevel);

const log = createLogger("main");
const db = openLedger(config.dbPath, config.auth.defaultUserId);

if (config.server.transport === "stdio") {
  await startStdio();
} else {
  await startHttp();
}

// ── stdio mode ──────────────────────────────────────────────────────────────

async function startStdio() {
  const { StdioServerTransport } = await import(
    "@modelcontextprotocol/sdk/server/stdio.js"
  );

  const server = createMcpServer({ db, config });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("stdio transport ready", { dbPath: config.dbPath });

  process.on("SIGINT", async () => {
    await server.close();
    db.close();
    process.exit(0);
  });
}

// ── HTTP mode ───────────────────────────────────────────────────────────────

async function startHttp() {
  const { serve } = await import("@hono/node-server");
  const { createHttpApp } = await import("./app.js");

  const http = createHttpApp({ db, config });

  // Clean up stale sessions + expired tokens every 5 minutes
  const sweeper = setInterval(() => {
    http.sweep().catch((error: unknown) => {
      log.error("sweep failed", { message: errorMessage(error) });
    });
  }, 5 * 60_000);

  const port = config.server.port;
  const httpServer = serve({ fetch: http.app.fetch, port });

  log.info(`Ledger MCP server listening on http://localhost:${port}`, {
    mcp: "POST /mcp",
    health: "GET /health",
  });

  process.on("SIGINT", async () => {
    clearInterval(sweeper);
    await http.closeAll();
    httpServer.close();
    db.close();
    process.exit(0);
  });
}
