import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { suggestPositionSize } from "../risk/sizing.js";
import { logError } from "../utils/logger.js";
import { errorResult, textResult, toJson, type ToolContext } from "./context.js";

export function registerPositionTools(server: McpServer, ctx: ToolContext): void {
  server.tool(
    "get_position_risk",
    "Per-position risk: distance to liquidation (%), size as % of account, leverage, ROE " +
      "and the 0-100 risk score with its components",
    {
      asset: z.string().optional().describe("Asset symbol (e.g. BTC). Omit for all positions."),
      account: z.string().optional().describe("Wallet address"),
    },
    async ({ asset, account }) => {
      try {
        const report = await ctx.monitor.current(account);
        if (!report?.portfolio) {
          return textResult(`No position data: ${report?.error?.message ?? "no cycle has run"}`);
        }

        const wanted = asset?.toUpperCase();
        const positions = report.portfolio.positions.filter(
          (p) => wanted === undefined || p.asset.toUpperCase() === wanted
        );
        if (asset && positions.length === 0) {
          return textResult(`No open position for ${asset}`);
        }
        return textResult(toJson(positions));
      } catch (err) {
        logError("get_position_risk", err);
        return errorResult("fetching position risk", err);
      }
    }
  );

  server.tool(
    "suggest_position_size",
    "Largest position size within the configured per-position limits, given a price and leverage. " +
      "Advisory only; no order is placed.",
    {
      price: z.number().positive().describe("Entry price"),
      leverage: z.number().min(1).describe("Intended leverage"),
      account: z.string().optional().describe("Wallet address"),
    },
    async ({ price, leverage, account }) => {
      try {
        const report = await ctx.monitor.current(account);
        const accountValue = report?.portfolio?.accountValue;
        if (accountValue === undefined) {
          return textResult("No account value available yet");
        }
        const suggestion = suggestPositionSize(accountValue, price, leverage, ctx.risk);
        if (!suggestion) {
          return textResult(`No size fits: account value is $${accountValue.toFixed(2)}`);
        }
        return textResult(toJson({ account_value: accountValue, ...suggestion }));
      } catch (err) {
        logError("suggest_position_size", err);
        return errorResult("suggesting position size", err);
      }
    }
  );
}
