/**
 * Time-series store contract and row shapes.
 *
 * Rows use the table column names and carry the wallet they belong to;
 * every query is scoped to one account. Timestamps are ISO strings on the way
 * in; on the way out they are parsed as absolute instants, with zone-less
 * values read as UTC.
 */

import { z } from "zod";
import type { AccountSnapshot, Fill, Position } from "../risk/snapshot.js";
import type { MetricsRecord } from "../risk/types.js";

export const TABLES = {
  positions: "position_history",
  metrics: "metrics_history",
  fills: "fills_history",
} as const;

const decimal = z.union([z.number(), z.string().min(1)]).pipe(z.coerce.number().finite());

export const metricsRowSchema = z.object({
  account: z.string(),
  timestamp: z.string(),
  account_value: decimal,
  total_position_value: decimal,
  total_unrealized_pnl: decimal,
  account_leverage: decimal.nullable(),
  portfolio_heat: decimal,
  risk_adjusted_return: decimal.nullable(),
  margin_utilization: decimal.nullable(),
  concentration_score: decimal,
  free_margin: decimal,
  total_exposure: decimal,
  exposure_equity_ratio: decimal.nullable(),
});

export const positionRowSchema = z.object({
  account: z.string(),
  timestamp: z.string(),
  coin: z.string(),
  side: z
    .string()
    .transform((s) => s.toUpperCase())
    .pipe(z.enum(["LONG", "SHORT"])),
  size: decimal,
  entry_price: decimal,
  leverage: decimal,
  liquidation_price: decimal.nullable(),
  unrealized_pnl: decimal,
  realized_pnl: decimal,
  margin_used: decimal,
});

export const fillRowSchema = z.object({
  account: z.string(),
  timestamp: z.string(),
  coin: z.string(),
  side: z
    .string()
    .transform((s) => s.toUpperCase())
    .pipe(z.enum(["BUY", "SELL"])),
  size: decimal,
  price: decimal,
  closed_pnl: decimal,
  fill_id: z.union([z.string(), z.number()]).transform(String),
  order_id: z.union([z.string(), z.number()]).transform(String).nullable(),
});

export type MetricsRow = z.infer<typeof metricsRowSchema>;
export type PositionRow = z.infer<typeof positionRowSchema>;
export type FillRow = z.infer<typeof fillRowSchema>;

export interface TimeRange {
  from: Date;
  to: Date;
}

export interface InsertOptions {
  /**
   * Skip rows whose natural key already exists: (account, timestamp) for
   * metrics, (account, timestamp, coin) for positions.
   */
  dedupe: boolean;
}

export interface FillQuery {
  account: string;
  range?: TimeRange;
  coin?: string;
  /** Only fills with non-zero closed PnL. */
  closedOnly?: boolean;
  limit?: number;
  newestFirst?: boolean;
}

export interface HistoryStore {
  insertMetrics(row: MetricsRow, options: InsertOptions): Promise<void>;
  insertPositions(rows: PositionRow[], options: InsertOptions): Promise<void>;
  /** Insert-ignore on (account, fill_id); resolves to the number of new rows. */
  insertFills(rows: FillRow[]): Promise<number>;
  /** Oldest first. */
  queryMetrics(account: string, range: TimeRange): Promise<MetricsRow[]>;
  /** Oldest first. */
  queryPositions(account: string, range: TimeRange, coin?: string): Promise<PositionRow[]>;
  queryFills(query: FillQuery): Promise<FillRow[]>;
}

const ZONED = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const HOUR_OFFSET = /[+-]\d{2}$/;

export function parseStoreTimestamp(value: string): Date {
  let s = value.trim().replace(" ", "T");
  if (!s.includes("T")) {
    s = `${s}T00:00:00Z`;
  } else if (HOUR_OFFSET.test(s.slice(s.indexOf("T")))) {
    s = `${s}:00`;
  } else if (!ZONED.test(s)) {
    s = `${s}Z`;
  }
  const date = new Date(s);
  if (Number.isNaN(date.getTime())) {
    throw new RangeError(`Unparseable store timestamp "${value}"`);
  }
  return date;
}

export function toMetricsRow(account: string, record: MetricsRecord): MetricsRow {
  return {
    account,
    timestamp: record.timestamp.toISOString(),
    account_value: record.accountValue,
    total_position_value: record.totalPositionValue,
    total_unrealized_pnl: record.totalUnrealizedPnl,
    account_leverage: record.accountLeverage,
    portfolio_heat: record.portfolioHeat,
    risk_adjusted_return: record.riskAdjustedReturn,
    margin_utilization: record.marginUtilization,
    concentration_score: record.concentrationScore,
    free_margin: record.freeMargin,
    total_exposure: record.totalExposure,
    exposure_equity_ratio: record.exposureEquityRatio,
  };
}

export function fromMetricsRow(row: MetricsRow): MetricsRecord {
  return {
    timestamp: parseStoreTimestamp(row.timestamp),
    accountValue: row.account_value,
    totalPositionValue: row.total_position_value,
    totalUnrealizedPnl: row.total_unrealized_pnl,
    accountLeverage: row.account_leverage,
    portfolioHeat: row.portfolio_heat,
    riskAdjustedReturn: row.risk_adjusted_return,
    marginUtilization: row.margin_utilization,
    concentrationScore: row.concentration_score,
    totalExposure: row.total_exposure,
    exposureEquityRatio: row.exposure_equity_ratio,
    freeMargin: row.free_margin,
  };
}

export function toPositionRows(snapshot: AccountSnapshot): PositionRow[] {
  const timestamp = snapshot.timestamp.toISOString();
  return snapshot.positions.map((p) => ({
    account: snapshot.account,
    timestamp,
    coin: p.asset,
    side: p.side,
    size: Math.abs(p.size),
    entry_price: p.entryPrice,
    leverage: p.leverage,
    liquidation_price: p.liquidationPrice ?? null,
    unrealized_pnl: p.unrealizedPnl,
    realized_pnl: p.realizedPnl,
    margin_used: p.marginUsed,
  }));
}

export interface PositionRecord extends Position {
  timestamp: Date;
}

export function fromPositionRow(row: PositionRow): PositionRecord {
  return {
    timestamp: parseStoreTimestamp(row.timestamp),
    asset: row.coin,
    side: row.side,
    size: row.size,
    entryPrice: row.entry_price,
    liquidationPrice: row.liquidation_price ?? undefined,
    leverage: row.leverage,
    unrealizedPnl: row.unrealized_pnl,
    realizedPnl: row.realized_pnl,
    marginUsed: row.margin_used,
  };
}

export function toFillRow(account: string, fill: Fill): FillRow {
  return {
    account,
    timestamp: fill.timestamp.toISOString(),
    coin: fill.asset,
    side: fill.side,
    size: fill.size,
    price: fill.price,
    closed_pnl: fill.closedPnl,
    fill_id: fill.fillId,
    order_id: fill.orderId ?? null,
  };
}

export function fromFillRow(row: FillRow): Fill {
  return {
    fillId: row.fill_id,
    orderId: row.order_id ?? undefined,
    asset: row.coin,
    side: row.side,
    size: row.size,
    price: row.price,
    closedPnl: row.closed_pnl,
    timestamp: parseStoreTimestamp(row.timestamp),
  };
}
