/**
 * Time-windowed views over one account's stored history.
 *
 * Windows are `[now - duration, now]` in epoch milliseconds; the local
 * timezone of the host never enters the arithmetic.
 */

import type { Side } from "../risk/snapshot.js";
import type { MetricsRecord, PnlHistory } from "../risk/types.js";
import type { PnlSource } from "../utils/config.js";
import {
  fromMetricsRow,
  fromPositionRow,
  parseStoreTimestamp,
  type HistoryStore,
  type PositionRecord,
  type PositionRow,
  type TimeRange,
} from "./store.js";
import { systemClock, type Clock } from "./write-policy.js";

export const ALL_ASSETS = "all";

export interface ClosedTrade {
  asset: string;
  /** Side of the position the fill closed. */
  side: Side;
  size: number;
  entryPrice: number;
  exitPrice: number;
  profit: number;
  timestamp: Date;
}

export interface HistoryReaderOptions {
  clock?: Clock;
  pnlSource?: PnlSource;
}

/** Sum over coins of the change in cumulative realized PnL across the window. */
function realizedFromPositions(rows: PositionRow[]): number {
  const byCoin = new Map<string, PositionRow[]>();
  for (const row of rows) {
    const list = byCoin.get(row.coin) ?? [];
    list.push(row);
    byCoin.set(row.coin, list);
  }

  let total = 0;
  for (const list of byCoin.values()) {
    for (let i = 1; i < list.length; i++) {
      total += list[i].realized_pnl - list[i - 1].realized_pnl;
    }
  }
  return total;
}

export class HistoryReader {
  private readonly clock: Clock;
  private readonly pnlSource: PnlSource;

  constructor(
    private readonly store: HistoryStore,
    readonly account: string,
    options: HistoryReaderOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.pnlSource = options.pnlSource ?? "fills";
  }

  private window(durationMs: number): TimeRange {
    if (!(durationMs >= 0)) throw new RangeError(`duration must be >= 0, got ${durationMs}`);
    const now = this.clock();
    return { from: new Date(now - durationMs), to: new Date(now) };
  }

  /** Realized PnL over the window; 0 when nothing closed in it. */
  async realizedPnlWindow(asset: string, durationMs: number): Promise<number> {
    const range = this.window(durationMs);
    const coin = asset === ALL_ASSETS ? undefined : asset;

    if (this.pnlSource === "positions") {
      return realizedFromPositions(await this.store.queryPositions(this.account, range, coin));
    }

    const fills = await this.store.queryFills({ account: this.account, range, coin });
    return fills.reduce((sum, f) => sum + f.closed_pnl, 0);
  }

  /** Most recent closing fills, newest first. */
  async closedTrades(limit: number): Promise<ClosedTrade[]> {
    if (limit <= 0) return [];
    const rows = await this.store.queryFills({
      account: this.account,
      closedOnly: true,
      limit,
      newestFirst: true,
    });

    return rows.map((row) => {
      // A sell closes a long, a buy closes a short.
      const side: Side = row.side === "SELL" ? "LONG" : "SHORT";
      const perUnit = row.size > 0 ? row.closed_pnl / row.size : 0;
      return {
        asset: row.coin,
        side,
        size: row.size,
        entryPrice: side === "LONG" ? row.price - perUnit : row.price + perUnit,
        exitPrice: row.price,
        profit: row.closed_pnl,
        timestamp: parseStoreTimestamp(row.timestamp),
      };
    });
  }

  async metricsHistory(durationMs: number): Promise<MetricsRecord[]> {
    const rows = await this.store.queryMetrics(this.account, this.window(durationMs));
    return rows.map(fromMetricsRow);
  }

  async positionHistory(durationMs: number, asset?: string): Promise<PositionRecord[]> {
    const rows = await this.store.queryPositions(this.account, this.window(durationMs), asset);
    return rows.map(fromPositionRow);
  }

  /** Mean total exposure over the window, or null without history. */
  async averageExposure(durationMs: number): Promise<number | null> {
    const rows = await this.store.queryMetrics(this.account, this.window(durationMs));
    if (rows.length === 0) return null;
    return rows.reduce((sum, r) => sum + r.total_exposure, 0) / rows.length;
  }

  async pnlHistory(durationMs: number): Promise<PnlHistory> {
    const [realizedPnl, averageExposure] = await Promise.all([
      this.realizedPnlWindow(ALL_ASSETS, durationMs),
      this.averageExposure(durationMs),
    ]);
    return { realizedPnl, averageExposure };
  }
}
