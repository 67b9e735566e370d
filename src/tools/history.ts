import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ALL_ASSETS } from "../history/history-reader.js";
import { logError } from "../utils/logger.js";
import { errorResult, textResult, toJson, type ToolContext } from "./context.js";

const HOUR_MS = 60 * 60 * 1000;

const accountArg = z
  .string()
  .optional()
  .describe("Wallet address. Defaults to the first monitored wallet.");

export function registerHistoryTools(server: McpServer, ctx: ToolContext): void {
  const unknownAccount = (account: string | undefined) =>
    textResult(`No data for account ${account ?? ctx.monitor.defaultAccount}`);

  server.tool(
    "get_metrics_history",
    "Logged portfolio metrics over the trailing window, oldest first",
    {
      hours: z.number().positive().max(24 * 90).optional().describe("Window in hours. Defaults to 24."),
      account: accountArg,
    },
    async ({ hours, account }) => {
      const reader = ctx.monitor.reader(account);
      if (!reader) return unknownAccount(account);
      try {
        const rows = await reader.metricsHistory((hours ?? 24) * HOUR_MS);
        return textResult(toJson(rows));
      } catch (err) {
        logError("get_metrics_history", err);
        return errorResult("fetching metrics history", err);
      }
    }
  );

  server.tool(
    "get_realized_pnl",
    "Realized PnL over the trailing window. 0 means nothing closed in the window.",
    {
      asset: z.string().optional().describe("Asset symbol. Omit for all assets."),
      hours: z.number().positive().optional().describe("Window in hours. Defaults to 168 (7 days)."),
      account: accountArg,
    },
    async ({ asset, hours, account }) => {
      const reader = ctx.monitor.reader(account);
      if (!reader) return unknownAccount(account);
      try {
        const windowHours = hours ?? 24 * 7;
        const pnl = await reader.realizedPnlWindow(asset ?? ALL_ASSETS, windowHours * HOUR_MS);
        return textResult(
          toJson({
            account: reader.account,
            asset: asset ?? ALL_ASSETS,
            hours: windowHours,
            realized_pnl: pnl,
          })
        );
      } catch (err) {
        logError("get_realized_pnl", err);
        return errorResult("fetching realized PnL", err);
      }
    }
  );

  server.tool(
    "get_closed_trades",
    "Most recent closed trades (entry, exit, profit), newest first",
    {
      limit: z.number().int().positive().max(500).optional().describe("Defaults to 20."),
      account: accountArg,
    },
    async ({ limit, account }) => {
      const reader = ctx.monitor.reader(account);
      if (!reader) return unknownAccount(account);
      try {
        const trades = await reader.closedTrades(limit ?? 20);
        return textResult(toJson(trades));
      } catch (err) {
        logError("get_closed_trades", err);
        return errorResult("fetching closed trades", err);
      }
    }
  );
}
