/**
 * Per-position risk scoring.
 *
 * Each component is mapped to [0, 100] before the weighted blend:
 *   - liquidation: critical distance / actual distance, saturating at 100
 *   - leverage:    leverage / max leverage
 *   - size:        % of account / max single-position %
 */

import type { RiskConfig } from "../utils/config.js";
import { logWarn } from "../utils/logger.js";
import { InvalidInputError } from "./errors.js";
import type { AccountSnapshot, Position } from "./snapshot.js";
import type { PositionRisk } from "./types.js";

export function clampScore(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

/** Fraction of `limit` used by `value`, capped at 100%. */
function saturate(value: number, limit: number): number {
  return Math.min(1, Math.max(0, value / limit)) * 100;
}

export function liquidationComponent(
  distancePct: number,
  breached: boolean,
  criticalPct: number
): number {
  if (breached || distancePct <= 0) return 100;
  if (!Number.isFinite(distancePct)) return 0;
  return Math.min(1, criticalPct / distancePct) * 100;
}

export function distanceToLiquidation(position: Position, markPrice: number): number {
  if (position.liquidationPrice === undefined) return Number.POSITIVE_INFINITY;
  return (Math.abs(position.liquidationPrice - markPrice) / markPrice) * 100;
}

export function isLiquidationBreached(position: Position, markPrice: number): boolean {
  const liq = position.liquidationPrice;
  if (liq === undefined) return false;
  return position.side === "LONG" ? markPrice <= liq : markPrice >= liq;
}

export function scorePosition(
  position: Position,
  snapshot: AccountSnapshot,
  markPrice: number,
  config: RiskConfig
): PositionRisk {
  if (!(position.entryPrice > 0)) {
    throw new InvalidInputError(
      `${position.asset}: entry price must be positive, got ${position.entryPrice}`,
      "entryPrice",
      position.asset
    );
  }
  if (!(markPrice > 0) || !Number.isFinite(markPrice)) {
    throw new InvalidInputError(
      `${position.asset}: mark price must be positive, got ${markPrice}`,
      "markPrice",
      position.asset
    );
  }

  const notional = Math.abs(position.size) * markPrice;
  const distance = distanceToLiquidation(position, markPrice);
  const breached = isLiquidationBreached(position, markPrice);

  let positionSizePct: number | null = null;
  if (snapshot.accountValue > 0) {
    positionSizePct = Math.max(0, (notional / snapshot.accountValue) * 100);
  } else {
    logWarn(
      `${position.asset}: account value ${snapshot.accountValue} leaves position size % undefined`
    );
  }

  const components = {
    liquidation: liquidationComponent(distance, breached, config.liquidationCriticalPct),
    leverage: saturate(position.leverage, config.maxLeverage),
    // No equity left behind the position counts as fully oversized.
    size: positionSizePct === null ? 100 : saturate(positionSizePct, config.maxPositionPct),
  };

  const w = config.positionWeights;
  const riskScore = clampScore(
    w.liquidation * components.liquidation +
      w.leverage * components.leverage +
      w.size * components.size
  );

  return {
    asset: position.asset,
    side: position.side,
    markPrice,
    notional,
    distanceToLiquidation: distance,
    liquidationBreached: breached,
    positionSizePct,
    leverage: position.leverage,
    unrealizedPnl: position.unrealizedPnl,
    roe: position.marginUsed > 0 ? (position.unrealizedPnl / position.marginUsed) * 100 : null,
    riskScore,
    components,
  };
}
