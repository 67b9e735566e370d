import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MemoryHistoryStore } from "../../src/history/memory-store.js";
import { toFillRow, type MetricsRow } from "../../src/history/store.js";
import { Monitor } from "../../src/monitor/monitor.js";
import { registerAccountTools } from "../../src/tools/account.js";
import type { ToolContext } from "../../src/tools/context.js";
import { registerHistoryTools } from "../../src/tools/history.js";
import { registerPositionTools } from "../../src/tools/positions.js";
import { loadConfig, type MonitorConfig } from "../../src/utils/config.js";
import { fill, manualClock } from "../helpers.js";
import { FakeSource } from "../monitor/fake-source.js";

const T0 = Date.parse("2024-03-01T12:00:00Z");
const HOUR = 60 * 60 * 1000;

class BrokenReads extends MemoryHistoryStore {
  override async queryMetrics(): Promise<MetricsRow[]> {
    throw new Error("read timeout");
  }
}

async function connect(ctx: ToolContext) {
  const server = new McpServer({ name: "risk-monitor-test", version: "0.0.0" });
  registerAccountTools(server, ctx);
  registerPositionTools(server, ctx);
  registerHistoryTools(server, ctx);

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const client = new Client({ name: "test-client", version: "0.0.0" });
  await server.connect(serverTransport);
  await client.connect(clientTransport);
  return { client, server };
}

async function callText(client: Client, name: string, args: Record<string, unknown> = {}) {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const [first] = result.content;
  if (first?.type !== "text") throw new Error(`${name} returned no text content`);
  return first.text;
}

describe("MCP tools", () => {
  let client: Client;
  let server: McpServer;
  let store: MemoryHistoryStore;
  let source: FakeSource;
  let ctx: ToolContext;
  let config: MonitorConfig;
  let time: ReturnType<typeof manualClock>;

  beforeEach(async () => {
    config = loadConfig({ WALLET_ADDRESSES: "0xaaa" });
    time = manualClock(T0);
    store = new MemoryHistoryStore();
    source = new FakeSource(
      {
        "0xaaa": {
          accountValue: 10_000,
          freeMargin: 5_000,
          positions: [
            { asset: "ETH", size: 1, entryPrice: 3_000, liquidationPrice: 2_000, leverage: 3 },
            { asset: "BTC", size: 0.01, entryPrice: 50_000, leverage: 1 },
          ],
          marks: { ETH: 3_000, BTC: 50_000 },
        },
      },
      time.clock
    );
    const monitor = new Monitor({ config, source, store, clock: time.clock });
    ctx = { monitor, risk: config.risk };
    ({ client, server } = await connect(ctx));
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it("registers the read tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "get_closed_trades",
      "get_metrics_history",
      "get_position_risk",
      "get_realized_pnl",
      "get_risk_signals",
      "get_risk_summary",
      "suggest_position_size",
    ]);
  });

  it("summarizes portfolio risk for the default account", async () => {
    const summary: unknown = JSON.parse(await callText(client, "get_risk_summary"));

    expect(summary).toMatchObject({
      account: "0xaaa",
      as_of: "2024-03-01T12:00:00.000Z",
      stale: false,
      accountValue: 10_000,
      totalExposure: 3_500,
      marginUtilization: 0.5,
      riskAdjustedReturn: null,
      position_count: 2,
      rejected_positions: [],
      last_error: null,
    });
    expect(summary).not.toHaveProperty("positions");
  });

  it("renders an unbounded liquidation distance as text", async () => {
    const text = await callText(client, "get_position_risk", { asset: "btc" });

    expect(JSON.parse(text)).toMatchObject([
      { asset: "BTC", distanceToLiquidation: "unbounded", liquidationBreached: false },
    ]);
  });

  it("says when an asset has no open position", async () => {
    expect(await callText(client, "get_position_risk", { asset: "DOGE" })).toBe(
      "No open position for DOGE"
    );
  });

  it("returns signals and suggestions", async () => {
    const body: unknown = JSON.parse(await callText(client, "get_risk_signals"));

    expect(body).toMatchObject({
      signals: [{ kind: "position_size", asset: "ETH", severity: "warning" }],
      suggestions: ["Consider reducing ETH position size"],
    });
  });

  it("suggests a position size from the latest account value", async () => {
    const body: unknown = JSON.parse(
      await callText(client, "suggest_position_size", { price: 50, leverage: 5 })
    );

    expect(body).toEqual({
      account_value: 10_000,
      size: 40,
      notional: 2_000,
      margin: 400,
      limitedBy: "account_pct",
    });
  });

  it("reads metrics history written by the monitor", async () => {
    await ctx.monitor.tick();
    const rows: unknown = JSON.parse(await callText(client, "get_metrics_history", { hours: 1 }));

    expect(rows).toMatchObject([
      { timestamp: "2024-03-01T12:00:00.000Z", accountValue: 10_000, totalExposure: 3_500 },
    ]);
  });

  it("reports realized PnL and closed trades from stored fills", async () => {
    await store.insertFills([
      toFillRow(
        "0xaaa",
        fill("t1", { side: "SELL", size: 2, price: 3_100, closedPnl: 12.5, timestamp: new Date(T0 - HOUR) })
      ),
    ]);

    expect(JSON.parse(await callText(client, "get_realized_pnl"))).toEqual({
      account: "0xaaa",
      asset: "all",
      hours: 168,
      realized_pnl: 12.5,
    });
    expect(JSON.parse(await callText(client, "get_realized_pnl", { asset: "ETH", hours: 2 }))).toEqual({
      account: "0xaaa",
      asset: "ETH",
      hours: 2,
      realized_pnl: 0,
    });
    expect(JSON.parse(await callText(client, "get_closed_trades", { limit: 1 }))).toEqual([
      {
        asset: "BTC",
        side: "LONG",
        size: 2,
        entryPrice: 3_093.75,
        exitPrice: 3_100,
        profit: 12.5,
        timestamp: "2024-03-01T11:00:00.000Z",
      },
    ]);
  });

  it("answers history reads for an unmonitored wallet with a message", async () => {
    expect(await callText(client, "get_closed_trades", { account: "0xccc" })).toBe(
      "No data for account 0xccc"
    );
  });

  it("returns the cycle failure instead of a summary", async () => {
    source.failure = new Error("exchange unreachable");
    expect(await callText(client, "get_risk_summary")).toBe(
      "Last cycle failed: exchange unreachable"
    );
  });

  it("returns read errors as text", async () => {
    await client.close();
    await server.close();
    const monitor = new Monitor({ config, source, store: new BrokenReads(), clock: time.clock });
    ({ client, server } = await connect({ ...ctx, monitor }));

    expect(await callText(client, "get_metrics_history")).toBe(
      "Error fetching metrics history: read timeout"
    );
  });
});
