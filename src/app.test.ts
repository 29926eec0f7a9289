import { LATEST_PROTOCOL_VERSION } from "@modelcontextprotocol/sdk/types.js";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, test } from "vitest";
import { createHttpApp, type HttpApp } from "./app.js";
import { issueToken } from "./auth/tokens.js";
import { DEFAULT_USER_ID, loadConfig, type Config } from "./config.js";
import { openLedger, type Ledger } from "./ledger/db.js";
import { setLogSink } from "./logger.js";

let db: Ledger;
let http: HttpApp;
let token: string;
let restoreSink: (line: string) => void;

function configWith(env: Record<string, string> = {}): Config {
  return loadConfig(env, ["node", "index.js"]);
}

function post(body: unknown, headers: Record<string, string> = {}) {
  return http.app.request("/mcp", {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

const initialize = {
  jsonrpc: "2.0",
  id: 1,
  method: "initialize",
  params: {
    protocolVersion: LATEST_PROTOCOL_VERSION,
    capabilities: {},
    clientInfo: { name: "test-client", version: "1.0.0" },
  },
};

beforeAll(() => {
  restoreSink = setLogSink(() => {});
});

afterAll(() => {
  setLogSink(restoreSink);
});

beforeEach(() => {
  db = openLedger(":memory:");
  http = createHttpApp({ db, config: configWith() });
  token = issueToken(db, DEFAULT_USER_ID, 1).token;
});

afterEach(async () => {
  await http.closeAll();
  db.close();
});

describe("GET /health", () => {
  test("reports server identity", async () => {
    const res = await http.app.request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "ok",
      server: "ledger-mcp",
      version: "0.1.0",
    });
  });
});

describe("POST /mcp authentication", () => {
  test("requires a bearer token", async () => {
    const res = await post(initialize);
    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ error: "unauthorized" });
  });

  test("rejects unknown tokens", async () => {
    const res = await post(initialize, { Authorization: "Bearer invalid-token" });
    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ error: "invalid_token" });
  });
});

describe("POST /mcp sessions", () => {
  test("initializes, then serves tool calls on the same session", async () => {
    const auth = { Authorization: `Bearer ${token}` };

    const init = await post(initialize, auth);
    expect(init.status).toBe(200);
    const sessionId = init.headers.get("mcp-session-id");
    expect(sessionId).toMatch(/^[0-9a-f-]{36}$/);
    expect(await init.json()).toMatchObject({
      jsonrpc: "2.0",
      id: 1,
      result: { serverInfo: { name: "ledger-mcp", version: "0.1.0" } },
    });

    const session = { ...auth, "mcp-session-id": sessionId ?? "" };
    const ack = await post({ jsonrpc: "2.0", method: "notifications/initialized" }, session);
    expect(ack.status).toBe(202);

    const res = await post(
      {
        jsonrpc: "2.0",
        id: 2,
        method: "tools/call",
        params: { name: "list_accounts", arguments: {} },
      },
      session
    );
    expect(res.status).toBe(200);
    expect(res.headers.get("mcp-session-id")).toBeNull();
    expect(await res.json()).toEqual({
      jsonrpc: "2.0",
      id: 2,
      result: { content: [{ type: "text", text: "[]" }] },
    });
    expect(http.sessionCount()).toBe(1);
  });

  test("rejects bodies that are not JSON-RPC", async () => {
    const auth = { Authorization: `Bearer ${token}` };

    const garbled = await post("{not json", auth);
    expect(garbled.status).toBe(400);
    expect(await garbled.json()).toMatchObject({ error: { code: -32700 } });

    const invalid = await post({ hello: "world" }, auth);
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toMatchObject({ error: { code: -32600 } });
  });

  test("sweep closes idle sessions", async () => {
    await post(initialize, { Authorization: `Bearer ${token}` });
    expect(http.sessionCount()).toBe(1);

    expect(await http.sweep(Date.now())).toBe(0);
    expect(await http.sweep(Date.now() + 31 * 60_000)).toBe(1);
    expect(http.sessionCount()).toBe(0);
  });
});

describe("POST /mcp rate limit", () => {
  test("answers 429 with Retry-After beyond the per-minute budget", async () => {
    await http.closeAll();
    http = createHttpApp({ db, config: configWith({ RATE_LIMIT_RPM: "2" }) });

    expect((await post(initialize)).status).toBe(401);
    expect((await post(initialize)).status).toBe(401);

    const limited = await post(initialize);
    expect(limited.status).toBe(429);
    expect(limited.headers.get("Retry-After")).toBe("60");
    expect(limited.headers.get("X-RateLimit-Remaining")).toBe("0");
    expect(await limited.json()).toMatchObject({ error: "rate_limit_exceeded" });
  });
});
