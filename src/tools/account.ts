import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { logError } from "../utils/logger.js";
import { errorResult, textResult, toJson, type ToolContext } from "./context.js";

const accountArg = z
  .string()
  .optional()
  .describe("Wallet address. Defaults to the first monitored wallet.");

export function registerAccountTools(server: McpServer, ctx: ToolContext): void {
  server.tool(
    "get_risk_summary",
    "Portfolio risk for the latest poll: exposure, leverage, margin utilization, " +
      "concentration (HHI, 0-100), portfolio heat (0-100), risk-adjusted return. " +
      "null means the ratio is undefined (no equity or no history), not zero.",
    { account: accountArg },
    async ({ account }) => {
      try {
        const report = await ctx.monitor.current(account);
        if (!report) return textResult(`No data for account ${account ?? ctx.monitor.defaultAccount}`);
        if (!report.portfolio) {
          return textResult(`Last cycle failed: ${report.error?.message ?? "unknown error"}`);
        }

        const { positions, rejected, ...portfolio } = report.portfolio;
        return textResult(
          toJson({
            account: report.account,
            as_of: report.startedAt,
            stale: report.stale,
            ...portfolio,
            position_count: positions.length,
            rejected_positions: rejected,
            last_write: report.record ?? null,
            last_error: report.error?.message ?? null,
          })
        );
      } catch (err) {
        logError("get_risk_summary", err);
        return errorResult("fetching risk summary", err);
      }
    }
  );

  server.tool(
    "get_risk_signals",
    "Threshold crossings from the latest poll (liquidation proximity, size, leverage, " +
      "margin, heat, drawdown, stale data) and suggested adjustments.",
    { account: accountArg },
    async ({ account }) => {
      try {
        const report = await ctx.monitor.current(account);
        if (!report) return textResult(`No data for account ${account ?? ctx.monitor.defaultAccount}`);
        return textResult(
          toJson({ signals: report.signals, suggestions: report.suggestions })
        );
      } catch (err) {
        logError("get_risk_signals", err);
        return errorResult("fetching risk signals", err);
      }
    }
  );
}
