/**
 * Threshold-crossing signals for alerting. Delivery is someone else's job;
 * this only says what crossed which line.
 */

import type { RiskConfig } from "../utils/config.js";
import type { DrawdownState } from "./drawdown.js";
import type { StaleDataError } from "./errors.js";
import type { PortfolioRisk, RiskSignal } from "./types.js";

export interface SignalContext {
  drawdown?: DrawdownState;
  stale?: StaleDataError | null;
}

export function evaluateSignals(
  portfolio: PortfolioRisk,
  config: RiskConfig,
  context: SignalContext = {}
): RiskSignal[] {
  const signals: RiskSignal[] = [];

  for (const p of portfolio.positions) {
    if (p.liquidationBreached) {
      signals.push({
        kind: "liquidation_proximity",
        severity: "critical",
        asset: p.asset,
        value: p.distanceToLiquidation,
        threshold: config.minDistanceToLiquidationPct,
        message: `${p.asset} mark $${p.markPrice} is past its liquidation price`,
      });
    } else if (p.distanceToLiquidation < config.minDistanceToLiquidationPct) {
      signals.push({
        kind: "liquidation_proximity",
        severity:
          p.distanceToLiquidation <= config.liquidationCriticalPct ? "critical" : "warning",
        asset: p.asset,
        value: p.distanceToLiquidation,
        threshold: config.minDistanceToLiquidationPct,
        message: `${p.asset} position close to liquidation (${p.distanceToLiquidation.toFixed(1)}%)`,
      });
    }

    if (p.positionSizePct !== null && p.positionSizePct > config.maxPositionPct) {
      signals.push({
        kind: "position_size",
        severity: "warning",
        asset: p.asset,
        value: p.positionSizePct,
        threshold: config.maxPositionPct,
        message: `${p.asset} position size exceeds maximum (${p.positionSizePct.toFixed(1)}% of account)`,
      });
    }

    if (p.leverage > config.maxLeverage) {
      signals.push({
        kind: "leverage",
        severity: "warning",
        asset: p.asset,
        value: p.leverage,
        threshold: config.maxLeverage,
        message: `${p.asset} leverage exceeds maximum (${p.leverage}x)`,
      });
    }
  }

  if (
    portfolio.marginUtilization !== null &&
    portfolio.marginUtilization > config.marginUtilizationWarn
  ) {
    signals.push({
      kind: "margin_utilization",
      severity: "warning",
      value: portfolio.marginUtilization,
      threshold: config.marginUtilizationWarn,
      message: `High margin utilization (${(portfolio.marginUtilization * 100).toFixed(1)}%)`,
    });
  }

  if (portfolio.portfolioHeat > config.heatWarn) {
    signals.push({
      kind: "portfolio_heat",
      severity: "warning",
      value: portfolio.portfolioHeat,
      threshold: config.heatWarn,
      message: `High portfolio heat (${portfolio.portfolioHeat.toFixed(1)})`,
    });
  }

  const { drawdown, stale } = context;
  if (drawdown?.breached) {
    signals.push({
      kind: "drawdown",
      severity: "critical",
      value: drawdown.drawdownPct,
      threshold: config.maxDrawdownPct,
      message: `Drawdown ${drawdown.drawdownPct.toFixed(1)}% from peak $${drawdown.peak.toFixed(2)}`,
    });
  }

  if (stale) {
    signals.push({
      kind: "stale_data",
      severity: "warning",
      value: stale.ageMs,
      threshold: stale.maxAgeMs,
      message: stale.message,
    });
  }

  return signals;
}

export function suggestAdjustments(portfolio: PortfolioRisk, config: RiskConfig): string[] {
  const suggestions: string[] = [];
  for (const p of portfolio.positions) {
    if (p.distanceToLiquidation < config.minDistanceToLiquidationPct) {
      suggestions.push(`Consider reducing leverage or adding margin to ${p.asset} position`);
    }
    if (p.positionSizePct !== null && p.positionSizePct > config.maxPositionPct) {
      suggestions.push(`Consider reducing ${p.asset} position size`);
    }
  }
  return suggestions;
}
