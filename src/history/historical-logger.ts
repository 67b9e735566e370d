/**
 * Decides, per poll cycle, which history rows get written.
 *
 *   - metrics + positions: one rate-limited tick per account. Each artifact
 *     keeps its own clock, so when position rows fail after the metrics row
 *     landed, the next cycle writes the position rows alone.
 *   - fills: written every cycle, deduplicated by fill id
 *
 * Assumes a single writer per account. Two processes recording the same
 * account can both see a tick as due and write it twice.
 */

import { PersistenceError, type PersistenceOperation } from "../risk/errors.js";
import type { AccountSnapshot, Fill } from "../risk/snapshot.js";
import type { MetricsRecord } from "../risk/types.js";
import type { KeyMode } from "../utils/config.js";
import { log, logDebug, logError } from "../utils/logger.js";
import {
  TABLES,
  toFillRow,
  toMetricsRow,
  toPositionRows,
  type FillRow,
  type HistoryStore,
} from "./store.js";
import type { WritePolicy } from "./write-policy.js";

const MAX_REMEMBERED_FILLS = 10_000;

export interface RecordResult {
  metricsWritten: boolean;
  positionsWritten: number;
  fillsWritten: number;
  fillsSkipped: number;
}

export interface HistoricalLoggerOptions {
  keyMode: KeyMode;
}

function toPersistenceError(
  err: unknown,
  table: string,
  operation: PersistenceOperation,
  partial = false
): PersistenceError {
  if (err instanceof PersistenceError && err.partial === partial) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new PersistenceError(
    partial ? `${table} ${operation} failed after metrics row was stored: ${message}` : message,
    table,
    operation,
    { partial, cause: err }
  );
}

export class HistoricalLogger {
  private readonly storedFillIds = new Set<string>();

  constructor(
    private readonly store: HistoryStore,
    private readonly policy: WritePolicy,
    private readonly options: HistoricalLoggerOptions
  ) {}

  /**
   * Persist what is due for this cycle. Throws PersistenceError when any
   * write fails; fills and the tick are attempted independently, so a fill
   * failure does not hold back a due tick or the other way round.
   */
  async record(
    snapshot: AccountSnapshot,
    metrics: MetricsRecord,
    fills: readonly Fill[]
  ): Promise<RecordResult> {
    const result: RecordResult = {
      metricsWritten: false,
      positionsWritten: 0,
      fillsWritten: 0,
      fillsSkipped: 0,
    };
    const failures: PersistenceError[] = [];

    try {
      const written = await this.recordTick(snapshot, metrics);
      result.metricsWritten = written.metrics;
      result.positionsWritten = written.positions;
    } catch (err) {
      failures.push(
        err instanceof PersistenceError ? err : toPersistenceError(err, TABLES.metrics, "insert")
      );
    }

    try {
      const { written, skipped } = await this.recordFills(snapshot.account, fills);
      result.fillsWritten = written;
      result.fillsSkipped = skipped;
    } catch (err) {
      failures.push(toPersistenceError(err, TABLES.fills, "upsert"));
    }

    if (failures.length > 0) {
      for (const failure of failures) logError(`${snapshot.account} history write`, failure);
      throw failures[0];
    }
    return result;
  }

  private async recordTick(
    snapshot: AccountSnapshot,
    metrics: MetricsRecord
  ): Promise<{ metrics: boolean; positions: number }> {
    const account = snapshot.account;
    const now = this.policy.now();
    const metricsDue = this.policy.isDue(account, "metrics", now);
    // Position rows trail the metrics clock only after a partial tick.
    const positionsDue = metricsDue || this.policy.isDue(account, "positions", now);
    if (!positionsDue) {
      logDebug(`${account}: metrics tick not due`);
      return { metrics: false, positions: 0 };
    }

    const dedupe = this.options.keyMode === "natural";
    const operation: PersistenceOperation = dedupe ? "upsert" : "insert";

    if (metricsDue) {
      try {
        await this.store.insertMetrics(toMetricsRow(account, metrics), { dedupe });
      } catch (err) {
        throw toPersistenceError(err, TABLES.metrics, operation);
      }
      this.policy.markWritten(account, "metrics", now);
    }

    const rows = toPositionRows(snapshot);
    if (rows.length > 0) {
      try {
        await this.store.insertPositions(rows, { dedupe });
      } catch (err) {
        throw toPersistenceError(err, TABLES.positions, operation, true);
      }
    }
    this.policy.markWritten(account, "positions", now);

    log(
      metricsDue
        ? `${account}: logged metrics and ${rows.length} position rows`
        : `${account}: caught up ${rows.length} position rows`
    );
    return { metrics: metricsDue, positions: rows.length };
  }

  private async recordFills(
    account: string,
    fills: readonly Fill[]
  ): Promise<{ written: number; skipped: number }> {
    // Both sides of a trade share its id, so ids are only unique per account.
    const pending = new Map<string, FillRow>();
    for (const fill of fills) {
      const key = `${account}:${fill.fillId}`;
      if (this.storedFillIds.has(key) || pending.has(key)) continue;
      pending.set(key, toFillRow(account, fill));
    }
    if (pending.size === 0) return { written: 0, skipped: fills.length };

    const written = await this.store.insertFills([...pending.values()]);
    for (const key of pending.keys()) this.remember(key);
    if (written > 0) log(`${account}: logged ${written} new fills`);
    return { written, skipped: fills.length - written };
  }

  private remember(key: string): void {
    this.storedFillIds.add(key);
    if (this.storedFillIds.size > MAX_REMEMBERED_FILLS) {
      const oldest = this.storedFillIds.values().next();
      if (!oldest.done) this.storedFillIds.delete(oldest.value);
    }
  }
}
