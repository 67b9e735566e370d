/**
 * Portfolio-level risk aggregation.
 * Pure: the same snapshot, marks and history always give the same result.
 */

import type { RiskConfig } from "../utils/config.js";
import { logWarn } from "../utils/logger.js";
import { InvalidInputError } from "./errors.js";
import {
  clampScore,
  liquidationComponent,
  scorePosition,
} from "./position-risk.js";
import { signedSize, type AccountSnapshot, type Position } from "./snapshot.js";
import type { MetricsRecord, PnlHistory, PortfolioRisk, PositionRisk } from "./types.js";

export function resolveMarkPrice(
  position: Position,
  markPrices: ReadonlyMap<string, number>
): number {
  const mark = markPrices.get(position.asset);
  if (mark !== undefined && Number.isFinite(mark) && mark > 0) return mark;
  logWarn(`No mark price for ${position.asset}, using entry price ${position.entryPrice}`);
  return position.entryPrice;
}

/**
 * Herfindahl-Hirschman index over exposure shares, scaled to [0, 100].
 * One position gives 100; N equal positions give 100 / N.
 */
export function concentrationScore(exposures: readonly number[]): number {
  const total = exposures.reduce((sum, e) => sum + e, 0);
  if (exposures.length === 0 || total <= 0) return 0;
  const hhi = exposures.reduce((sum, e) => {
    const share = e / total;
    return sum + share * share;
  }, 0);
  return clampScore(hhi * 100);
}

function leverageHeat(
  totalExposure: number,
  accountLeverage: number | null,
  maxAccountLeverage: number
): number {
  if (totalExposure === 0) return 0;
  // Exposure with no equity behind it.
  if (accountLeverage === null) return 100;
  return Math.min(1, accountLeverage / maxAccountLeverage) * 100;
}

export function aggregatePortfolio(
  snapshot: AccountSnapshot,
  markPrices: ReadonlyMap<string, number>,
  history: PnlHistory,
  config: RiskConfig
): PortfolioRisk {
  const positions: PositionRisk[] = [];
  const rejected: InvalidInputError[] = [];

  let totalExposure = 0;
  let totalPositionValue = 0;
  let totalUnrealizedPnl = 0;
  let longExposure = 0;
  let shortExposure = 0;
  let largestNotional = 0;

  for (const position of snapshot.positions) {
    const mark = resolveMarkPrice(position, markPrices);
    let risk: PositionRisk;
    try {
      risk = scorePosition(position, snapshot, mark, config);
    } catch (err) {
      if (!(err instanceof InvalidInputError)) throw err;
      logWarn(`Skipping position in aggregation: ${err.message}`);
      rejected.push(err);
      continue;
    }

    positions.push(risk);
    totalExposure += risk.notional;
    totalPositionValue += signedSize(position) * mark;
    totalUnrealizedPnl += position.unrealizedPnl;
    if (position.side === "LONG") longExposure += risk.notional;
    else shortExposure += risk.notional;
    largestNotional = Math.max(largestNotional, risk.notional);
  }

  const accountValue = snapshot.accountValue;
  const freeMargin = Math.max(0, snapshot.freeMargin);
  const hasEquity = accountValue > 0;

  const accountLeverage = hasEquity ? totalExposure / accountValue : null;
  const marginUtilization = hasEquity
    ? Math.min(1, Math.max(0, (accountValue - freeMargin) / accountValue))
    : null;

  const concentration = concentrationScore(positions.map((p) => p.notional));

  const worstDistanceToLiquidation = positions.reduce(
    (worst, p) => Math.min(worst, p.distanceToLiquidation),
    Number.POSITIVE_INFINITY
  );
  const anyBreached = positions.some((p) => p.liquidationBreached);

  const w = config.heatWeights;
  const portfolioHeat = clampScore(
    w.leverage * leverageHeat(totalExposure, accountLeverage, config.maxAccountLeverage) +
      w.liquidation *
        liquidationComponent(
          worstDistanceToLiquidation,
          anyBreached,
          config.liquidationCriticalPct
        ) +
      w.concentration * concentration
  );

  const riskAdjustedReturn =
    history.averageExposure !== null && history.averageExposure > 0
      ? history.realizedPnl / history.averageExposure
      : null;

  return {
    timestamp: snapshot.timestamp,
    accountValue,
    freeMargin,
    totalMarginUsed: snapshot.totalMarginUsed,
    totalExposure,
    totalPositionValue,
    totalUnrealizedPnl,
    longExposure,
    shortExposure,
    accountLeverage,
    exposureEquityRatio: accountLeverage,
    marginUtilization,
    concentrationScore: concentration,
    portfolioHeat,
    riskAdjustedReturn,
    largestPositionPct: hasEquity ? (largestNotional / accountValue) * 100 : null,
    worstDistanceToLiquidation,
    positions,
    rejected,
  };
}

export function toMetricsRecord(portfolio: PortfolioRisk): MetricsRecord {
  return {
    timestamp: portfolio.timestamp,
    accountValue: portfolio.accountValue,
    totalPositionValue: portfolio.totalPositionValue,
    totalUnrealizedPnl: portfolio.totalUnrealizedPnl,
    accountLeverage: portfolio.accountLeverage,
    portfolioHeat: portfolio.portfolioHeat,
    riskAdjustedReturn: portfolio.riskAdjustedReturn,
    marginUtilization: portfolio.marginUtilization,
    concentrationScore: portfolio.concentrationScore,
    totalExposure: portfolio.totalExposure,
    exposureEquityRatio: portfolio.exposureEquityRatio,
    freeMargin: portfolio.freeMargin,
  };
}
