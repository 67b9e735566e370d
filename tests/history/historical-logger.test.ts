import { beforeEach, describe, expect, it } from "vitest";
import { HistoricalLogger } from "../../src/history/historical-logger.js";
import { WritePolicy } from "../../src/history/write-policy.js";
import { PersistenceError } from "../../src/risk/errors.js";
import { aggregatePortfolio, toMetricsRecord } from "../../src/risk/portfolio-risk.js";
import type { AccountSnapshot, Fill } from "../../src/risk/snapshot.js";
import type { KeyMode } from "../../src/utils/config.js";
import { ACCOUNT, defaultRisk, fill, manualClock, snapshotOf } from "../helpers.js";
import { FlakyStore } from "./fakes.js";

const T0 = Date.parse("2024-03-01T12:00:00Z");

function snapshotAt(ms: number): AccountSnapshot {
  return snapshotOf(
    [{ asset: "BTC", size: 0.5, entryPrice: 60_000, liquidationPrice: 50_000, leverage: 5 }],
    { timestamp: ms }
  );
}

function metricsFor(snapshot: AccountSnapshot) {
  return toMetricsRecord(
    aggregatePortfolio(snapshot, new Map(), { realizedPnl: 0, averageExposure: null }, defaultRisk)
  );
}

describe("HistoricalLogger", () => {
  let store: FlakyStore;
  let time: ReturnType<typeof manualClock>;
  let policy: WritePolicy;

  function loggerFor(keyMode: KeyMode = "surrogate", interval = 60_000) {
    policy = new WritePolicy(interval, time.clock);
    return new HistoricalLogger(store, policy, { keyMode });
  }

  async function cycle(logger: HistoricalLogger, fills: Fill[] = []) {
    const snapshot = snapshotAt(time.clock());
    return logger.record(snapshot, metricsFor(snapshot), fills);
  }

  beforeEach(() => {
    store = new FlakyStore();
    time = manualClock(T0);
  });

  describe("metrics and position ticks", () => {
    it("writes one tick for two cycles 30 seconds apart", async () => {
      const logger = loggerFor();

      const first = await cycle(logger);
      time.advance(30_000);
      const second = await cycle(logger);

      expect(first).toEqual({ metricsWritten: true, positionsWritten: 1, fillsWritten: 0, fillsSkipped: 0 });
      expect(second).toEqual({ metricsWritten: false, positionsWritten: 0, fillsWritten: 0, fillsSkipped: 0 });
      expect(store.metrics).toHaveLength(1);
      expect(store.positions).toHaveLength(1);
    });

    it("writes a second tick once the interval has passed", async () => {
      const logger = loggerFor();

      await cycle(logger);
      time.advance(30_000);
      await cycle(logger);
      time.advance(60_000);
      await cycle(logger);

      expect(store.metrics.map((m) => m.timestamp)).toEqual([
        "2024-03-01T12:00:00.000Z",
        "2024-03-01T12:01:30.000Z",
      ]);
      expect(policy.lastWrittenAt(ACCOUNT, "metrics")).toBe(T0 + 90_000);
      expect(policy.lastWrittenAt(ACCOUNT, "positions")).toBe(T0 + 90_000);
    });

    it("stores position rows with absolute size and a null liquidation price when absent", async () => {
      const logger = loggerFor();
      const snapshot = snapshotOf([{ asset: "ETH", size: -2, entryPrice: 3_000, leverage: 3 }], {
        timestamp: T0,
      });
      await logger.record(snapshot, metricsFor(snapshot), []);

      expect(store.positions).toEqual([
        {
          account: ACCOUNT,
          timestamp: "2024-03-01T12:00:00.000Z",
          coin: "ETH",
          side: "SHORT",
          size: 2,
          entry_price: 3_000,
          leverage: 3,
          liquidation_price: null,
          unrealized_pnl: 0,
          realized_pnl: 0,
          margin_used: 0,
        },
      ]);
    });

    it("leaves the rate-limit clock alone when the metrics write fails", async () => {
      const logger = loggerFor();
      store.failMetrics = 1;

      const failure = await cycle(logger).catch((err: unknown) => err);
      expect(failure).toBeInstanceOf(PersistenceError);
      if (failure instanceof PersistenceError) {
        expect(failure.table).toBe("metrics_history");
        expect(failure.operation).toBe("insert");
        expect(failure.partial).toBe(false);
        expect(failure.message).toBe("connection refused");
      }
      expect(policy.lastWrittenAt(ACCOUNT, "metrics")).toBeUndefined();

      time.advance(1_000);
      const retry = await cycle(logger);
      expect(retry.metricsWritten).toBe(true);
      expect(store.metrics).toHaveLength(1);
    });

    it("reports a partial tick when position rows fail after the metrics row", async () => {
      const logger = loggerFor();
      store.failPositions = 1;

      const failure = await cycle(logger).catch((err: unknown) => err);
      expect(failure).toBeInstanceOf(PersistenceError);
      if (failure instanceof PersistenceError) {
        expect(failure.table).toBe("position_history");
        expect(failure.partial).toBe(true);
        expect(failure.message).toBe(
          "position_history insert failed after metrics row was stored: boom"
        );
      }
      expect(store.metrics).toHaveLength(1);
      expect(store.positions).toHaveLength(0);
      expect(policy.lastWrittenAt(ACCOUNT, "metrics")).toBe(T0);
      expect(policy.lastWrittenAt(ACCOUNT, "positions")).toBeUndefined();
    });

    it("writes only the position rows on the cycle after a partial tick", async () => {
      const logger = loggerFor();
      store.failPositions = 1;
      await expect(cycle(logger)).rejects.toBeInstanceOf(PersistenceError);

      time.advance(10_000);
      const retry = await cycle(logger);

      expect(retry).toEqual({ metricsWritten: false, positionsWritten: 1, fillsWritten: 0, fillsSkipped: 0 });
      expect(store.metrics).toHaveLength(1);
      expect(store.positions.map((p) => p.timestamp)).toEqual(["2024-03-01T12:00:10.000Z"]);
      expect(policy.lastWrittenAt(ACCOUNT, "positions")).toBe(T0 + 10_000);
    });

    it("writes metrics and positions together again once the metrics interval passes", async () => {
      const logger = loggerFor();
      store.failPositions = 1;
      await expect(cycle(logger)).rejects.toBeInstanceOf(PersistenceError);
      time.advance(10_000);
      await cycle(logger);

      time.advance(60_000);
      const next = await cycle(logger);

      expect(next.metricsWritten).toBe(true);
      expect(next.positionsWritten).toBe(1);
      expect(policy.lastWrittenAt(ACCOUNT, "metrics")).toBe(T0 + 70_000);
      expect(policy.lastWrittenAt(ACCOUNT, "positions")).toBe(T0 + 70_000);
    });

    it("ignores repeated snapshots in natural key mode without an interval", async () => {
      const logger = loggerFor("natural", 0);
      const snapshot = snapshotAt(T0);
      const metrics = metricsFor(snapshot);

      await logger.record(snapshot, metrics, []);
      await logger.record(snapshot, metrics, []);

      expect(store.metrics).toHaveLength(1);
      expect(store.positions).toHaveLength(1);
    });

    it("writes every cycle in surrogate mode without an interval", async () => {
      const logger = loggerFor("surrogate", 0);
      await cycle(logger);
      await cycle(logger);
      expect(store.metrics).toHaveLength(2);
    });
  });

  describe("fills", () => {
    it("stores a fill id once across batches and cycles", async () => {
      const logger = loggerFor();

      const first = await cycle(logger, [fill("f1"), fill("f1")]);
      expect(first.fillsWritten).toBe(1);
      expect(first.fillsSkipped).toBe(1);

      time.advance(5_000);
      const second = await cycle(logger, [fill("f1"), fill("f2")]);
      expect(second.fillsWritten).toBe(1);
      expect(second.fillsSkipped).toBe(1);

      expect(store.fills.map((f) => f.fill_id)).toEqual(["f1", "f2"]);
    });

    it("relies on the store to skip fills another logger already stored", async () => {
      await cycle(loggerFor(), [fill("f1")]);
      const fresh = loggerFor();

      const result = await cycle(fresh, [fill("f1")]);
      expect(result.fillsWritten).toBe(0);
      expect(result.fillsSkipped).toBe(1);
      expect(store.fills).toHaveLength(1);
    });

    it("stores the same fill id once per account", async () => {
      const logger = loggerFor();
      await cycle(logger, [fill("t1")]);

      const other = snapshotOf([], { account: "0xother", timestamp: T0 });
      const result = await logger.record(other, metricsFor(other), [fill("t1")]);

      expect(result.fillsWritten).toBe(1);
      expect(store.fills.map((f) => [f.account, f.fill_id])).toEqual([
        [ACCOUNT, "t1"],
        ["0xother", "t1"],
      ]);
    });

    it("writes fills every cycle regardless of the tick interval", async () => {
      const logger = loggerFor();
      await cycle(logger, [fill("f1")]);
      time.advance(1_000);
      const result = await cycle(logger, [fill("f2")]);

      expect(result.metricsWritten).toBe(false);
      expect(result.fillsWritten).toBe(1);
    });

    it("retries fills after a failed write and still records the tick", async () => {
      const logger = loggerFor();
      store.failFills = 1;

      const failure = await cycle(logger, [fill("f1")]).catch((err: unknown) => err);
      expect(failure).toBeInstanceOf(PersistenceError);
      if (failure instanceof PersistenceError) {
        expect(failure.table).toBe("fills_history");
        expect(failure.operation).toBe("upsert");
      }
      expect(store.metrics).toHaveLength(1);
      expect(store.fills).toHaveLength(0);

      time.advance(1_000);
      const retry = await cycle(logger, [fill("f1")]);
      expect(retry.fillsWritten).toBe(1);
      expect(store.fills).toHaveLength(1);
    });
  });
});
