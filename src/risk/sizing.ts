/**
 * Position sizing against configured limits. Advisory only; nothing here
 * submits orders.
 */

import type { RiskConfig } from "../utils/config.js";

export interface SizeSuggestion {
  size: number;
  notional: number;
  /** Margin the suggested size would commit at the given leverage. */
  margin: number;
  limitedBy: "account_pct" | "max_notional";
}

export interface LimitCheck {
  allowed: boolean;
  violations: string[];
}

export function suggestPositionSize(
  accountValue: number,
  price: number,
  leverage: number,
  config: RiskConfig
): SizeSuggestion | null {
  if (!(accountValue > 0) || !(price > 0) || !(leverage >= 1)) return null;

  const pctNotional = accountValue * (config.maxPositionPct / 100);
  const limitedBy = pctNotional <= config.maxPositionNotional ? "account_pct" : "max_notional";
  const notional = Math.min(pctNotional, config.maxPositionNotional);

  return {
    size: notional / price,
    notional,
    margin: notional / leverage,
    limitedBy,
  };
}

export function validatePosition(
  params: { asset: string; size: number; price: number; leverage: number },
  accountValue: number,
  config: RiskConfig
): LimitCheck {
  const violations: string[] = [];
  const notional = Math.abs(params.size) * params.price;

  if (params.leverage > config.maxLeverage) {
    violations.push(
      `${params.asset}: leverage ${params.leverage}x exceeds max ${config.maxLeverage}x`
    );
  }
  if (notional > config.maxPositionNotional) {
    violations.push(
      `${params.asset}: notional $${notional.toFixed(2)} exceeds max $${config.maxPositionNotional}`
    );
  }
  if (accountValue <= 0) {
    violations.push(`${params.asset}: account value $${accountValue.toFixed(2)} leaves no room`);
  } else {
    const pct = (notional / accountValue) * 100;
    if (pct > config.maxPositionPct) {
      violations.push(
        `${params.asset}: ${pct.toFixed(1)}% of account exceeds max ${config.maxPositionPct}%`
      );
    }
  }

  return { allowed: violations.length === 0, violations };
}
