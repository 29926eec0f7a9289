import crypto from "node:crypto";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { JSONRPCMessageSchema } from "@modelcontextprotocol/sdk/types.js";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { cleanupExpiredTokens } from "./auth/tokens.js";
import type { Config } from "./config.js";
import type { Ledger } from "./ledger/db.js";
import { createLogger } from "./logger.js";
import { createMcpServer, SERVER_NAME, SERVER_VERSION } from "./mcp/server.js";
import { HttpTransport } from "./mcp/transport.js";
import { auditLog } from "./middleware/audit.js";
import { bearerAuth, type AuthEnv } from "./middleware/auth.js";
import { rateLimit } from "./middleware/rate-limit.js";

const log = createLogger("http");

const SESSION_IDLE_MS = 30 * 60_000;

interface McpSession {
  server: McpServer;
  transport: HttpTransport;
  userId: string;
  lastAccess: number;
}

export interface HttpAppOptions {
  db: Ledger;
  config: Config;
  /** Per-request response timeout handed to each session transport */
  timeoutMs?: number;
}

export interface HttpApp {
  app: Hono<AuthEnv>;
  /** Close idle sessions and purge expired tokens. Returns sessions closed. */
  sweep(now?: number): Promise<number>;
  /** Close every open session. */
  closeAll(): Promise<void>;
  sessionCount(): number;
}

export function createHttpApp(options: HttpAppOptions): HttpApp {
  const { db, config } = options;
  const app = new Hono<AuthEnv>();
  const sessions = new Map<string, McpSession>();

  // ── Middleware ──
  app.use(logger((message) => log.debug(message)));
  app.use(auditLog());
  app.use(
    cors({
      origin: config.server.corsOrigins,
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization", "Mcp-Session-Id"],
      exposeHeaders: [
        "Mcp-Session-Id",
        "X-RateLimit-Limit",
        "X-RateLimit-Remaining",
      ],
    })
  );

  // ── Health check ──
  app.get("/health", (c) =>
    c.json({ status: "ok", server: SERVER_NAME, version: SERVER_VERSION })
  );

  // ── MCP endpoint ──
  app.post(
    "/mcp",
    rateLimit({ rpm: config.rateLimit.rpm }),
    bearerAuth(db),
    async (c) => {
      let raw: unknown;
      try {
        raw = await c.req.json();
      } catch {
        return c.json(
          { jsonrpc: "2.0", id: null, error: { code: -32700, message: "Parse error" } },
          400
        );
      }

      const parsed = JSONRPCMessageSchema.safeParse(raw);
      if (!parsed.success) {
        return c.json(
          { jsonrpc: "2.0", id: null, error: { code: -32600, message: "Invalid Request" } },
          400
        );
      }

      const userId = c.get("userId");
      const sessionId = c.req.header("mcp-session-id");
      const existing = sessionId ? sessions.get(sessionId) : undefined;

      let transport: HttpTransport;
      let newSessionId: string | undefined;

      if (existing && existing.userId === userId) {
        transport = existing.transport;
        existing.lastAccess = Date.now();
      } else {
        newSessionId = crypto.randomUUID();
        const server = createMcpServer({ db, config, userId });
        transport = new HttpTransport({ timeoutMs: options.timeoutMs });
        await server.connect(transport);
        sessions.set(newSessionId, {
          server,
          transport,
          userId,
          lastAccess: Date.now(),
        });
        log.info("session_opened", { sessionId: newSessionId, userId });
      }

      const response = await transport.handleJsonRpc(parsed.data);

      const headers: Record<string, string> = {};
      if (newSessionId) {
        headers["mcp-session-id"] = newSessionId;
      }

      if (response === null) {
        return c.body(null, 202, headers);
      }
      return c.json(response, { headers });
    }
  );

  async function closeSession(id: string, session: McpSession): Promise<void> {
    sessions.delete(id);
    await session.server.close();
    log.info("session_closed", { sessionId: id });
  }

  return {
    app,
    async sweep(now = Date.now()) {
      const cutoff = now - SESSION_IDLE_MS;
      let closed = 0;
      for (const [id, session] of sessions) {
        if (session.lastAccess < cutoff) {
          await closeSession(id, session);
          closed++;
        }
      }
      const purged = cleanupExpiredTokens(db);
      if (closed > 0 || purged > 0) {
        log.info("sweep", { sessionsClosed: closed, tokensPurged: purged });
      }
      return closed;
    },
    async closeAll() {
      for (const [id, session] of sessions) {
        await closeSession(id, session);
      }
    },
    sessionCount: () => sessions.size,
  };
}
