import {
  buildSnapshot,
  type AccountSnapshot,
  type Fill,
  type PositionInput,
  type SnapshotInput,
} from "../src/risk/snapshot.js";
import { parseRiskConfig } from "../src/utils/config.js";

export const ACCOUNT = "0xtest-wallet";

export const defaultRisk = parseRiskConfig();

export function snapshotOf(
  positions: PositionInput[],
  overrides: Partial<Omit<SnapshotInput, "positions">> = {}
): AccountSnapshot {
  return buildSnapshot({
    account: ACCOUNT,
    timestamp: "2024-03-01T12:00:00Z",
    accountValue: 10_000,
    freeMargin: 5_000,
    positions,
    ...overrides,
  }).snapshot;
}

export function fill(id: string, overrides: Partial<Fill> = {}): Fill {
  return {
    fillId: id,
    orderId: `o-${id}`,
    asset: "BTC",
    side: "SELL",
    size: 1,
    price: 100,
    closedPnl: 0,
    timestamp: new Date("2024-03-01T12:00:00Z"),
    ...overrides,
  };
}

/** Settable clock for write-policy and reader tests. */
export function manualClock(start: number) {
  let now = start;
  const clock = () => now;
  return {
    clock,
    set(ms: number) {
      now = ms;
    },
    advance(ms: number) {
      now += ms;
    },
  };
}
