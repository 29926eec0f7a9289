import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  adjustAccountBalance,
  createAccount,
  deleteAccount,
  listAccounts,
  updateAccount,
} from "../ledger/accounts.js";
import { accessibleAccount, resolveUserId, type ToolContext } from "./context.js";
import { runTool } from "./respond.js";
import { accountType, currencyCode, userIdParam, uuid } from "./schemas.js";

export function registerAccountTools(server: McpServer, ctx: ToolContext) {
  server.registerTool(
    "list_accounts",
    {
      description:
        "List all accounts of a user with name, type, currency and current balance, newest first. Use this to find account IDs for other tools.",
      inputSchema: { user_id: userIdParam },
      annotations: { readOnlyHint: true },
    },
    async ({ user_id }) =>
      runTool("list_accounts", { userId: user_id }, () =>
        listAccounts(ctx.db, resolveUserId(ctx, user_id))
      )
  );

  server.registerTool(
    "create_account",
    {
      description:
        "Create a new financial account (checking, savings or investment) with an optional starting balance.",
      inputSchema: {
        name: z.string().min(1).max(100).describe("Account display name."),
        account_type: accountType.describe("One of: checking, savings, investment."),
        currency: currencyCode
          .optional()
          .describe("ISO 4217 code such as USD. Defaults to USD."),
        initial_balance: z
          .number()
          .optional()
          .describe("Starting balance. Defaults to 0."),
        user_id: userIdParam,
      },
    },
    async ({ name, account_type, currency, initial_balance, user_id }) =>
      runTool("create_account", { name, accountType: account_type }, () =>
        createAccount(ctx.db, {
          userId: resolveUserId(ctx, user_id),
          name,
          type: account_type,
          currency,
          initialBalance: initial_balance,
        })
      )
  );

  server.registerTool(
    "edit_account",
    {
      description:
        "Edit an existing account. Only the provided fields change; the balance is left alone (see adjust_account_balance).",
      inputSchema: {
        account_id: uuid.describe("Account UUID to edit."),
        name: z.string().min(1).max(100).optional().describe("New display name."),
        account_type: accountType.optional().describe("New account type."),
        currency: currencyCode.optional().describe("New ISO 4217 currency code."),
      },
    },
    async ({ account_id, name, account_type, currency }) =>
      runTool("edit_account", { accountId: account_id }, () => {
        accessibleAccount(ctx, account_id);
        return updateAccount(ctx.db, account_id, {
          name,
          type: account_type,
          currency,
        });
      })
  );

  server.registerTool(
    "adjust_account_balance",
    {
      description:
        "Set an account's stored balance to a new value. A manual correction: no transaction is recorded.",
      inputSchema: {
        account_id: uuid.describe("Account UUID to adjust."),
        new_balance: z.number().describe("New balance value."),
      },
    },
    async ({ account_id, new_balance }) =>
      runTool(
        "adjust_account_balance",
        { accountId: account_id, newBalance: new_balance },
        () => {
          accessibleAccount(ctx, account_id);
          return adjustAccountBalance(ctx.db, account_id, new_balance);
        }
      )
  );

  server.registerTool(
    "delete_account",
    {
      description: "Delete an account together with all of its transactions.",
      inputSchema: { account_id: uuid.describe("Account UUID to delete.") },
      annotations: { destructiveHint: true },
    },
    async ({ account_id }) =>
      runTool("delete_account", { accountId: account_id }, () => {
        accessibleAccount(ctx, account_id);
        deleteAccount(ctx.db, account_id);
        return {
          message: "Account deleted successfully",
          accountId: account_id,
        };
      })
  );
}
