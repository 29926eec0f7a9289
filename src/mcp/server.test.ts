import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, test } from "vitest";
import { z } from "zod";
import { resolveToken } from "../auth/tokens.js";
import { DEFAULT_USER_ID, loadConfig } from "../config.js";
import { getAccount } from "../ledger/accounts.js";
import { openLedger, type Ledger } from "../ledger/db.js";
import { createUser } from "../ledger/users.js";
import { setLogSink } from "../logger.js";
import { createMcpServer } from "./server.js";

const config = loadConfig({}, ["node", "index.js"]);
const MISSING_ID = "99999999-9999-9999-9999-999999999999";

const withId = z.object({ id: z.string() });

let db: Ledger;
let restoreSink: (line: string) => void;
const clients: Client[] = [];

beforeAll(() => {
  restoreSink = setLogSink(() => {});
});

afterAll(() => {
  setLogSink(restoreSink);
});

beforeEach(() => {
  db = openLedger(":memory:");
});

afterEach(async () => {
  for (const client of clients.splice(0)) {
    await client.close();
  }
  db.close();
});

async function connect(userId?: string): Promise<Client> {
  const server = createMcpServer({ db, config, userId });
  const client = new Client({ name: "test-client", version: "1.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([
    client.connect(clientTransport),
    server.connect(serverTransport),
  ]);
  clients.push(client);
  return client;
}

interface ToolOutcome {
  text: string;
  isError: boolean;
}

async function call(
  client: Client,
  name: string,
  args: Record<string, unknown> = {}
): Promise<ToolOutcome> {
  const result = CallToolResultSchema.parse(
    await client.callTool({ name, arguments: args })
  );
  const first = result.content[0];
  if (first?.type !== "text") throw new Error(`${name} returned no text content`);
  return { text: first.text, isError: result.isError === true };
}

async function callJson(
  client: Client,
  name: string,
  args: Record<string, unknown> = {}
): Promise<unknown> {
  const outcome = await call(client, name, args);
  if (outcome.isError) throw new Error(`${name} failed: ${outcome.text}`);
  return JSON.parse(outcome.text);
}

/** Schema rejections surface either as a thrown protocol error or an error result. */
async function rejects(
  client: Client,
  name: string,
  args: Record<string, unknown>
): Promise<boolean> {
  try {
    return (await call(client, name, args)).isError;
  } catch {
    return true;
  }
}

async function newAccount(
  client: Client,
  args: Record<string, unknown> = {}
): Promise<string> {
  const created = await callJson(client, "create_account", {
    name: "Checking",
    account_type: "checking",
    ...args,
  });
  return withId.parse(created).id;
}

describe("createMcpServer", () => {
  test("registers every tool", async () => {
    const client = await connect();
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "add_transaction",
      "adjust_account_balance",
      "analyze_month",
      "create_account",
      "delete_account",
      "delete_transaction",
      "detect_anomalies",
      "edit_account",
      "edit_transaction",
      "forecast_balance",
      "get_financial_status",
      "get_monthly_trend",
      "get_report",
      "get_token",
      "health_check",
      "list_accounts",
      "list_categories",
      "list_transactions",
      "transfer_between_accounts",
    ]);
  });

  test("registers resources and prompts", async () => {
    const client = await connect();
    const { resources } = await client.listResources();
    expect(resources.map((r) => r.uri).sort()).toEqual([
      "ledger://accounts",
      "ledger://categories",
      "ledger://status",
    ]);

    const { prompts } = await client.listPrompts();
    expect(prompts.map((p) => p.name).sort()).toEqual([
      "anomaly-audit",
      "forecast-check",
      "monthly-review",
    ]);

    const prompt = await client.getPrompt({ name: "forecast-check" });
    expect(prompt.messages[0]?.role).toBe("user");
  });
});

describe("health and auth tools", () => {
  test("health_check reports a healthy database", async () => {
    const client = await connect();
    expect(await call(client, "health_check")).toEqual({
      text: "OK: Server and database connection healthy.",
      isError: false,
    });
  });

  test("get_token issues a token for the default user", async () => {
    const client = await connect();
    const issued = z
      .object({ token: z.string(), userId: z.string(), expiresInHours: z.number() })
      .parse(await callJson(client, "get_token"));

    expect(issued.userId).toBe(DEFAULT_USER_ID);
    expect(issued.expiresInHours).toBe(24);
    expect(resolveToken(db, issued.token)).toBe(DEFAULT_USER_ID);
  });
});

describe("account tools", () => {
  test("create, list, edit, adjust and delete", async () => {
    const client = await connect();
    const id = await newAccount(client, { initial_balance: 100, currency: "EUR" });

    expect(await callJson(client, "list_accounts")).toMatchObject([
      { id, name: "Checking", type: "checking", currency: "EUR", balance: 100 },
    ]);

    expect(
      await callJson(client, "edit_account", { account_id: id, name: "Main" })
    ).toMatchObject({ id, name: "Main", currency: "EUR", balance: 100 });

    expect(
      await callJson(client, "adjust_account_balance", { account_id: id, new_balance: 42 })
    ).toMatchObject({ id, balance: 42 });

    expect(await callJson(client, "delete_account", { account_id: id })).toEqual({
      message: "Account deleted successfully",
      accountId: id,
    });
    expect(await callJson(client, "list_accounts")).toEqual([]);
  });

  test("missing accounts produce a JSON error result", async () => {
    const client = await connect();
    expect(await call(client, "edit_account", { account_id: MISSING_ID, name: "x" })).toEqual({
      text: JSON.stringify({ error: `Account ${MISSING_ID} not found` }),
      isError: true,
    });
  });

  test("rejects malformed input", async () => {
    const client = await connect();
    expect(await rejects(client, "create_account", { name: "x", account_type: "credit" })).toBe(true);
    expect(await rejects(client, "edit_account", { account_id: "not-a-uuid" })).toBe(true);
  });
});

describe("transaction tools", () => {
  test("transactions move balances and show up in the status", async () => {
    const client = await connect();
    const checking = await newAccount(client);
    const savings = await newAccount(client, { name: "Savings", account_type: "savings" });

    await callJson(client, "add_transaction", {
      account_id: checking,
      amount: 1000,
      transaction_type: "income",
      category: "salary",
      transaction_date: "2025-03-01",
    });
    const groceries = withId.parse(
      await callJson(client, "add_transaction", {
        account_id: checking,
        amount: 80,
        transaction_type: "expense",
        category: "groceries",
        transaction_date: "2025-03-04",
      })
    ).id;
    await callJson(client, "transfer_between_accounts", {
      from_account_id: checking,
      to_account_id: savings,
      amount: 200,
      transaction_date: "2025-03-05",
    });

    expect(getAccount(db, checking).balance).toBe(720);
    expect(getAccount(db, savings).balance).toBe(200);

    await callJson(client, "edit_transaction", { transaction_id: groceries, amount: 100 });
    expect(getAccount(db, checking).balance).toBe(700);

    const listed = await callJson(client, "list_transactions", {
      account_id: checking,
      transaction_type: "expense",
    });
    expect(listed).toMatchObject([
      { category: "transfer", amount: 200, date: "2025-03-05" },
      { category: "groceries", amount: 100, date: "2025-03-04" },
    ]);

    expect(await callJson(client, "delete_transaction", { transaction_id: groceries })).toEqual({
      message: "Transaction deleted successfully",
      transactionId: groceries,
    });
    expect(getAccount(db, checking).balance).toBe(800);

    expect(await callJson(client, "get_financial_status")).toMatchObject({
      totalBalance: 1000,
      byCurrency: { USD: 1000 },
      savingsRatio: 0.8333,
      monthlyFlow: [{ year: 2025, month: 3, income: 1200, expense: 200, net: 1000 }],
    });
  });

  test("a transfer to the same account is a domain error", async () => {
    const client = await connect();
    const id = await newAccount(client);
    expect(
      await call(client, "transfer_between_accounts", {
        from_account_id: id,
        to_account_id: id,
        amount: 5,
      })
    ).toEqual({
      text: JSON.stringify({ error: "Source and destination accounts must be different" }),
      isError: true,
    });
  });

  test("a reversed date range is a domain error", async () => {
    const client = await connect();
    const outcome = await call(client, "list_transactions", {
      from_date: "2025-02-01",
      to_date: "2025-01-01",
    });
    expect(outcome).toEqual({
      text: JSON.stringify({ error: "from_date must be before or equal to to_date" }),
      isError: true,
    });
  });

  test("rejects impossible dates and non-positive amounts", async () => {
    const client = await connect();
    const id = await newAccount(client);
    const base = {
      account_id: id,
      amount: 10,
      transaction_type: "expense",
      category: "fuel",
      transaction_date: "2025-01-01",
    };
    expect(await rejects(client, "add_transaction", { ...base, transaction_date: "2025-02-30" })).toBe(true);
    expect(await rejects(client, "add_transaction", { ...base, transaction_date: "01/02/2025" })).toBe(true);
    expect(await rejects(client, "add_transaction", { ...base, amount: 0 })).toBe(true);
    expect(getAccount(db, id).balance).toBe(0);
  });

  test("list_categories returns suggestions", async () => {
    const client = await connect();
    expect(await callJson(client, "list_categories")).toMatchObject({ transfer: "transfer" });
  });
});

describe("analysis tools", () => {
  test("analyze_month, trend, forecast and anomalies", async () => {
    const client = await connect();
    const id = await newAccount(client);
    const add = (amount: number, type: string, date: string) =>
      callJson(client, "add_transaction", {
        account_id: id,
        amount,
        transaction_type: type,
        category: type === "income" ? "salary" : "rent",
        transaction_date: date,
      });
    await add(100, "income", "2025-01-05");
    await add(60, "expense", "2025-01-20");
    await add(100, "income", "2025-02-05");
    await add(80, "expense", "2025-02-20");

    expect(await callJson(client, "analyze_month", { year: 2025, month: 2 })).toEqual({
      year: 2025,
      month: 2,
      flow: { year: 2025, month: 2, income: 100, expense: 80, net: 20 },
      expenseByCategory: { rent: 80 },
      incomeByCategory: { salary: 100 },
      savingsRatio: 0.2,
    });

    expect(await callJson(client, "get_monthly_trend", { metric: "net" })).toEqual({
      monthly: [
        ["2025-01", 40],
        ["2025-02", 20],
      ],
      average: 30,
    });

    expect(await callJson(client, "forecast_balance", { months_ahead: 2 })).toEqual({
      points: [
        { period: "2025-03", value: 90 },
        { period: "2025-04", value: 120 },
      ],
      slope: 30,
    });

    expect(
      await callJson(client, "detect_anomalies", { threshold: 1, transaction_type: "expense" })
    ).toMatchObject({ threshold: 1, mean: 70, std: 10 });
  });

  test("rejects out-of-range month and non-positive inputs", async () => {
    const client = await connect();
    expect(await rejects(client, "analyze_month", { year: 2025, month: 13 })).toBe(true);
    expect(await rejects(client, "forecast_balance", { months_ahead: 0 })).toBe(true);
    expect(await rejects(client, "detect_anomalies", { threshold: -1 })).toBe(true);
  });

  test("get_report validates the range", async () => {
    const client = await connect();
    const outcome = await call(client, "get_report", {
      from_date: "2025-03-01",
      to_date: "2025-02-01",
    });
    expect(outcome.isError).toBe(true);
    expect(JSON.parse(outcome.text)).toEqual({
      error: "from_date must be before or equal to to_date",
      details: { fromDate: "2025-03-01", toDate: "2025-02-01" },
    });
  });
});

describe("authenticated sessions", () => {
  test("act only for the token's user", async () => {
    const owner = createUser(db, "owner@example.com");
    const stranger = createUser(db, "stranger@example.com");

    const ownerClient = await connect(owner.id);
    const accountId = await newAccount(ownerClient);
    expect(await callJson(ownerClient, "list_accounts")).toMatchObject([{ id: accountId }]);

    const strangerClient = await connect(stranger.id);
    expect(await callJson(strangerClient, "list_accounts")).toEqual([]);
    expect(
      await call(strangerClient, "list_accounts", { user_id: owner.id })
    ).toEqual({
      text: JSON.stringify({ error: "user_id does not match the authenticated user" }),
      isError: true,
    });
    expect(
      await call(strangerClient, "delete_account", { account_id: accountId })
    ).toEqual({
      text: JSON.stringify({ error: `Account ${accountId} not found` }),
      isError: true,
    });
    expect(getAccount(db, accountId).userId).toBe(owner.id);
  });

  test("resources follow the session user", async () => {
    const owner = createUser(db, "owner@example.com");
    const client = await connect(owner.id);
    await newAccount(client, { name: "Owned" });

    const { contents } = await client.readResource({ uri: "ledger://accounts" });
    const first = contents[0];
    const text = first && "text" in first ? first.text : "";
    expect(JSON.parse(text)).toMatchObject([{ name: "Owned", userId: owner.id }]);
  });
});
