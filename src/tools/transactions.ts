import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ValidationError } from "../errors.js";
import {
  addTransaction,
  deleteTransaction,
  listTransactions,
  transferBetweenAccounts,
  updateTransaction,
} from "../ledger/transactions.js";
import {
  accessibleAccount,
  accessibleTransaction,
  resolveUserId,
  type ToolContext,
} from "./context.js";
import { runTool } from "./respond.js";
import {
  category,
  isoDate,
  positiveAmount,
  transactionType,
  userIdParam,
  uuid,
} from "./schemas.js";

export function registerTransactionTools(server: McpServer, ctx: ToolContext) {
  server.registerTool(
    "add_transaction",
    {
      description:
        "Record an income or expense on an account. The account balance moves by the amount (up for income, down for expense).",
      inputSchema: {
        account_id: uuid.describe("Account UUID."),
        amount: positiveAmount.describe("Positive amount."),
        transaction_type: transactionType.describe("income or expense."),
        category: category.describe(
          "Category such as groceries or salary. See list_categories for suggestions."
        ),
        transaction_date: isoDate.describe("Date in YYYY-MM-DD format."),
        description: z.string().max(500).optional().describe("Optional note."),
      },
    },
    async (args) =>
      runTool(
        "add_transaction",
        {
          accountId: args.account_id,
          amount: args.amount,
          type: args.transaction_type,
        },
        () => {
          accessibleAccount(ctx, args.account_id);
          return addTransaction(ctx.db, {
            accountId: args.account_id,
            amount: args.amount,
            type: args.transaction_type,
            category: args.category,
            date: args.transaction_date,
            description: args.description,
          });
        }
      )
  );

  server.registerTool(
    "edit_transaction",
    {
      description:
        "Edit a transaction. Only provided fields change; the account balance is corrected for the difference.",
      inputSchema: {
        transaction_id: uuid.describe("Transaction UUID to edit."),
        amount: positiveAmount.optional().describe("New positive amount."),
        transaction_type: transactionType.optional().describe("income or expense."),
        category: category.optional().describe("New category."),
        transaction_date: isoDate.optional().describe("New date, YYYY-MM-DD."),
        description: z.string().max(500).optional().describe("New description."),
      },
    },
    async (args) =>
      runTool("edit_transaction", { transactionId: args.transaction_id }, () => {
        accessibleTransaction(ctx, args.transaction_id);
        return updateTransaction(ctx.db, args.transaction_id, {
          amount: args.amount,
          type: args.transaction_type,
          category: args.category,
          date: args.transaction_date,
          description: args.description,
        });
      })
  );

  server.registerTool(
    "delete_transaction",
    {
      description:
        "Delete a transaction and revert its effect on the account balance.",
      inputSchema: {
        transaction_id: uuid.describe("Transaction UUID to delete."),
      },
      annotations: { destructiveHint: true },
    },
    async ({ transaction_id }) =>
      runTool("delete_transaction", { transactionId: transaction_id }, () => {
        accessibleTransaction(ctx, transaction_id);
        deleteTransaction(ctx.db, transaction_id);
        return {
          message: "Transaction deleted successfully",
          transactionId: transaction_id,
        };
      })
  );

  server.registerTool(
    "list_transactions",
    {
      description:
        "List a user's transactions, newest first. Optionally narrow by account, inclusive date range, category or type.",
      inputSchema: {
        user_id: userIdParam,
        account_id: uuid.optional().describe("Only this account."),
        from_date: isoDate.optional().describe("Earliest date, YYYY-MM-DD."),
        to_date: isoDate.optional().describe("Latest date, YYYY-MM-DD."),
        category: category.optional().describe("Exact category match."),
        transaction_type: transactionType.optional().describe("income or expense."),
      },
      annotations: { readOnlyHint: true },
    },
    async (args) =>
      runTool("list_transactions", { userId: args.user_id, accountId: args.account_id }, () => {
        if (args.from_date && args.to_date && args.from_date > args.to_date) {
          throw new ValidationError("from_date must be before or equal to to_date");
        }
        const userId = resolveUserId(ctx, args.user_id);
        if (args.account_id !== undefined) accessibleAccount(ctx, args.account_id);
        return listTransactions(ctx.db, userId, {
          accountId: args.account_id,
          fromDate: args.from_date,
          toDate: args.to_date,
          category: args.category,
          type: args.transaction_type,
        });
      })
  );

  server.registerTool(
    "transfer_between_accounts",
    {
      description:
        "Move money between two accounts. Records an expense in the source and an income in the destination, both in the 'transfer' category.",
      inputSchema: {
        from_account_id: uuid.describe("Source account UUID."),
        to_account_id: uuid.describe("Destination account UUID."),
        amount: positiveAmount.describe("Positive amount to move."),
        transaction_date: isoDate
          .optional()
          .describe("Date in YYYY-MM-DD format. Defaults to today."),
        description: z.string().max(500).optional().describe("Optional note for both legs."),
      },
    },
    async (args) =>
      runTool(
        "transfer_between_accounts",
        { from: args.from_account_id, to: args.to_account_id, amount: args.amount },
        () => {
          accessibleAccount(ctx, args.from_account_id);
          accessibleAccount(ctx, args.to_account_id);
          return transferBetweenAccounts(ctx.db, {
            fromAccountId: args.from_account_id,
            toAccountId: args.to_account_id,
            amount: args.amount,
            date: args.transaction_date,
            description: args.description,
          });
        }
      )
  );
}
