#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { HyperliquidClient } from "./exchange/hyperliquid-client.js";
import { MemoryHistoryStore } from "./history/memory-store.js";
import type { HistoryStore } from "./history/store.js";
import { SupabaseHistoryStore } from "./history/supabase-store.js";
import { Monitor } from "./monitor/monitor.js";
import { registerAccountTools } from "./tools/account.js";
import { registerHistoryTools } from "./tools/history.js";
import { registerPositionTools } from "./tools/positions.js";
import { loadConfig } from "./utils/config.js";
import { log, logError, logWarn } from "./utils/logger.js";

async function main() {
  const config = loadConfig();

  let store: HistoryStore;
  if (config.supabase) {
    store = SupabaseHistoryStore.connect(config.supabase.url, config.supabase.key);
  } else {
    logWarn("SUPABASE_URL/SUPABASE_KEY not set, history is kept in memory only");
    store = new MemoryHistoryStore();
  }

  const source = new HyperliquidClient({
    baseUrl: config.apiUrl,
    timeoutMs: config.cycleTimeoutMs,
  });
  const monitor = new Monitor({ config, source, store });

  const server = new McpServer({
    name: "perp-risk-monitor",
    version: "1.0.0",
  });

  // Register all tools
  const ctx = { monitor, risk: config.risk };
  registerAccountTools(server, ctx);
  registerPositionTools(server, ctx);
  registerHistoryTools(server, ctx);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log(`Risk monitor MCP server running (key mode=${config.keyMode}, pnl source=${config.pnlSource})`);

  monitor.start();

  const shutdown = () => {
    monitor.stop();
    server
      .close()
      .catch((err) => logError("closing MCP server", err))
      .finally(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
