import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

function userPrompt(text: string) {
  return {
    messages: [
      {
        role: "user" as const,
        content: { type: "text" as const, text },
      },
    ],
  };
}

export function registerPrompts(server: McpServer) {
  server.registerPrompt(
    "monthly-review",
    {
      description:
        "Monthly review covering balances, cash flow, category spending, anomalies and the short-term forecast",
    },
    async () =>
      userPrompt(
        "Please review my finances for the most recent month. Use these tools in order:\n\n1. **get_financial_status** - Current balances by account and currency, and the overall savings ratio\n2. **analyze_month** - Income, expenses and savings ratio for the most recent month with data\n3. **get_monthly_trend** - How the monthly net flow has moved over time\n4. **detect_anomalies** - Unusually large transactions (use threshold 2)\n5. **forecast_balance** - Where the total balance is heading over the next 3 months\n\nFormat the review with these sections:\n- **Balances**: Totals by account and currency\n- **Cash Flow**: Income vs expenses and the savings ratio\n- **Spending Breakdown**: Top expense categories with their share of total spending\n- **Alerts**: Anomalous transactions worth checking\n- **Outlook**: The forecast and what drives it\n- **Recommendations**: 3-5 concrete steps for next month"
      )
  );

  server.registerPrompt(
    "anomaly-audit",
    {
      description:
        "Look for unusual transactions per account and explain what makes each one stand out",
    },
    async () =>
      userPrompt(
        "Please audit my transactions for anomalies. Use these tools:\n\n1. **list_accounts** - Get every account ID\n2. **detect_anomalies** - Run it across all accounts with threshold 2, then per account with transaction_type expense\n3. **list_transactions** - Pull the surrounding transactions for each flagged date to give context\n\nFor each anomaly report the date, account, category, amount and z-score, say whether it looks like a one-off (e.g. annual insurance) or something to investigate, and finish with a short list of follow-ups."
      )
  );

  server.registerPrompt(
    "forecast-check",
    {
      description:
        "Project balances forward and check whether the current trend is sustainable",
    },
    async () =>
      userPrompt(
        "Please check where my balances are heading. Use these tools:\n\n1. **get_monthly_trend** - Monthly net flow with its average\n2. **forecast_balance** - Total balance for the next 6 months, then each account separately\n3. **analyze_month** - The latest month, to compare it against the average\n\nExplain the projected balances, which accounts grow or shrink, whether the latest month is above or below the trend, and what would change the outlook."
      )
  );
}
