import type { Side } from "./snapshot.js";
import type { InvalidInputError } from "./errors.js";

/** `null` marks an undefined ratio (zero or negative denominator), never zero. */
export type Metric = number | null;

export interface PositionRisk {
  asset: string;
  side: Side;
  markPrice: number;
  notional: number;
  /** Percent; `Infinity` when the position has no liquidation price. */
  distanceToLiquidation: number;
  liquidationBreached: boolean;
  positionSizePct: Metric;
  leverage: number;
  unrealizedPnl: number;
  roe: Metric;
  riskScore: number;
  components: {
    liquidation: number;
    leverage: number;
    size: number;
  };
}

/** Trailing realized PnL and exposure proxy, from the history reader. */
export interface PnlHistory {
  realizedPnl: number;
  averageExposure: Metric;
}

export interface PortfolioRisk {
  timestamp: Date;
  accountValue: number;
  freeMargin: number;
  totalMarginUsed: number;
  totalExposure: number;
  totalPositionValue: number;
  totalUnrealizedPnl: number;
  longExposure: number;
  shortExposure: number;
  accountLeverage: Metric;
  exposureEquityRatio: Metric;
  marginUtilization: Metric;
  concentrationScore: number;
  portfolioHeat: number;
  riskAdjustedReturn: Metric;
  largestPositionPct: Metric;
  worstDistanceToLiquidation: number;
  positions: PositionRisk[];
  rejected: InvalidInputError[];
}

export interface MetricsRecord {
  timestamp: Date;
  accountValue: number;
  totalPositionValue: number;
  totalUnrealizedPnl: number;
  accountLeverage: Metric;
  portfolioHeat: number;
  riskAdjustedReturn: Metric;
  marginUtilization: Metric;
  concentrationScore: number;
  totalExposure: number;
  exposureEquityRatio: Metric;
  freeMargin: number;
}

export type SignalKind =
  | "liquidation_proximity"
  | "position_size"
  | "leverage"
  | "margin_utilization"
  | "portfolio_heat"
  | "drawdown"
  | "stale_data";

export interface RiskSignal {
  kind: SignalKind;
  severity: "warning" | "critical";
  asset?: string;
  value: number;
  threshold: number;
  message: string;
}
