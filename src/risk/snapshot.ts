/**
 * Per-cycle account snapshot.
 *
 * Snapshots are rebuilt from the exchange on every poll and never mutated;
 * `buildSnapshot` freezes what it returns.
 */

import { InvalidInputError, StaleDataError } from "./errors.js";
import { logWarn } from "../utils/logger.js";

export type Side = "LONG" | "SHORT";
export type FillSide = "BUY" | "SELL";

export interface Position {
  readonly asset: string;
  readonly side: Side;
  /** Signed as reported; the magnitude is the position size. */
  readonly size: number;
  readonly entryPrice: number;
  /** Absent when the position carries no liquidation risk. */
  readonly liquidationPrice?: number;
  readonly leverage: number;
  readonly unrealizedPnl: number;
  readonly realizedPnl: number;
  readonly marginUsed: number;
}

export interface AccountSnapshot {
  readonly account: string;
  readonly timestamp: Date;
  /** May be negative transiently near liquidation. */
  readonly accountValue: number;
  readonly freeMargin: number;
  readonly totalMarginUsed: number;
  readonly positions: readonly Position[];
}

export interface Fill {
  readonly fillId: string;
  readonly orderId?: string;
  readonly asset: string;
  readonly side: FillSide;
  readonly size: number;
  readonly price: number;
  /** Zero when the fill opened or increased a position. */
  readonly closedPnl: number;
  readonly timestamp: Date;
}

export interface PositionInput {
  asset: string;
  side?: Side;
  size: number;
  entryPrice: number;
  liquidationPrice?: number | null;
  leverage: number;
  unrealizedPnl?: number;
  realizedPnl?: number;
  marginUsed?: number;
}

export interface SnapshotInput {
  account: string;
  timestamp: Date | string | number;
  accountValue: number;
  freeMargin: number;
  totalMarginUsed?: number;
  positions: PositionInput[];
}

export interface SnapshotBuildResult {
  snapshot: AccountSnapshot;
  rejected: InvalidInputError[];
}

function requireFinite(value: number, field: string, asset?: string): number {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(`${field} must be a finite number, got ${value}`, field, asset);
  }
  return value;
}

export function signedSize(position: Position): number {
  const magnitude = Math.abs(position.size);
  return position.side === "LONG" ? magnitude : -magnitude;
}

export function validatePositionInput(input: PositionInput): Position {
  const { asset } = input;
  if (!asset) throw new InvalidInputError("asset is required", "asset");

  const size = requireFinite(input.size, "size", asset);
  if (size === 0) throw new InvalidInputError(`${asset}: size must be non-zero`, "size", asset);

  const side: Side = input.side ?? (size < 0 ? "SHORT" : "LONG");
  if (side === "LONG" && size < 0) {
    throw new InvalidInputError(`${asset}: negative size on a LONG position`, "size", asset);
  }

  const entryPrice = requireFinite(input.entryPrice, "entryPrice", asset);
  if (entryPrice <= 0) {
    throw new InvalidInputError(`${asset}: entry price must be positive, got ${entryPrice}`, "entryPrice", asset);
  }

  const leverage = requireFinite(input.leverage, "leverage", asset);
  if (leverage < 1) {
    throw new InvalidInputError(`${asset}: leverage must be at least 1, got ${leverage}`, "leverage", asset);
  }

  let liquidationPrice: number | undefined;
  if (input.liquidationPrice !== undefined && input.liquidationPrice !== null) {
    liquidationPrice = requireFinite(input.liquidationPrice, "liquidationPrice", asset);
    const onLossSide =
      side === "LONG" ? liquidationPrice < entryPrice : liquidationPrice > entryPrice;
    if (liquidationPrice <= 0 || !onLossSide) {
      throw new InvalidInputError(
        `${asset}: liquidation price ${liquidationPrice} is not on the loss side of entry ${entryPrice} for a ${side} position`,
        "liquidationPrice",
        asset
      );
    }
  }

  const marginUsed = requireFinite(input.marginUsed ?? 0, "marginUsed", asset);
  if (marginUsed < 0) {
    throw new InvalidInputError(`${asset}: margin used cannot be negative`, "marginUsed", asset);
  }

  return Object.freeze({
    asset,
    side,
    size,
    entryPrice,
    liquidationPrice,
    leverage,
    unrealizedPnl: requireFinite(input.unrealizedPnl ?? 0, "unrealizedPnl", asset),
    realizedPnl: requireFinite(input.realizedPnl ?? 0, "realizedPnl", asset),
    marginUsed,
  });
}

/**
 * Build an immutable snapshot. Invalid positions are dropped and reported
 * individually; account-level fields that are not numbers reject the whole
 * snapshot.
 */
export function buildSnapshot(input: SnapshotInput): SnapshotBuildResult {
  const timestamp = new Date(input.timestamp);
  if (Number.isNaN(timestamp.getTime())) {
    throw new InvalidInputError(`invalid snapshot timestamp: ${String(input.timestamp)}`, "timestamp");
  }
  const accountValue = requireFinite(input.accountValue, "accountValue");
  const freeMargin = Math.max(0, requireFinite(input.freeMargin, "freeMargin"));

  const positions: Position[] = [];
  const rejected: InvalidInputError[] = [];
  for (const raw of input.positions) {
    try {
      positions.push(validatePositionInput(raw));
    } catch (err) {
      if (!(err instanceof InvalidInputError)) throw err;
      logWarn(`Rejected position: ${err.message}`);
      rejected.push(err);
    }
  }

  const totalMarginUsed =
    input.totalMarginUsed ?? positions.reduce((sum, p) => sum + p.marginUsed, 0);

  const snapshot: AccountSnapshot = Object.freeze({
    account: input.account,
    timestamp,
    accountValue,
    freeMargin,
    totalMarginUsed: requireFinite(totalMarginUsed, "totalMarginUsed"),
    positions: Object.freeze(positions),
  });

  return { snapshot, rejected };
}

/** Returns the staleness condition rather than throwing it. */
export function checkFreshness(
  snapshot: AccountSnapshot,
  nowMs: number,
  maxAgeMs: number
): StaleDataError | null {
  const ageMs = nowMs - snapshot.timestamp.getTime();
  return ageMs > maxAgeMs ? new StaleDataError(ageMs, maxAgeMs) : null;
}
