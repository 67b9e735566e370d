/**
 * In-process store with the same insert and query semantics as the
 * Supabase tables. Used when no Supabase credentials are configured.
 */

import {
  parseStoreTimestamp,
  type FillQuery,
  type FillRow,
  type HistoryStore,
  type InsertOptions,
  type MetricsRow,
  type PositionRow,
  type TimeRange,
} from "./store.js";

function instant(row: { timestamp: string }): number {
  return parseStoreTimestamp(row.timestamp).getTime();
}

function inRange(row: { timestamp: string }, range: TimeRange | undefined): boolean {
  if (!range) return true;
  const t = instant(row);
  return t >= range.from.getTime() && t <= range.to.getTime();
}

function byTime<T extends { timestamp: string }>(a: T, b: T): number {
  return instant(a) - instant(b);
}

export class MemoryHistoryStore implements HistoryStore {
  readonly metrics: MetricsRow[] = [];
  readonly positions: PositionRow[] = [];
  readonly fills: FillRow[] = [];

  async insertMetrics(row: MetricsRow, options: InsertOptions): Promise<void> {
    const exists =
      options.dedupe &&
      this.metrics.some((m) => m.account === row.account && instant(m) === instant(row));
    if (exists) return;
    this.metrics.push({ ...row });
  }

  async insertPositions(rows: PositionRow[], options: InsertOptions): Promise<void> {
    for (const row of rows) {
      const exists =
        options.dedupe &&
        this.positions.some(
          (p) => p.account === row.account && p.coin === row.coin && instant(p) === instant(row)
        );
      if (!exists) this.positions.push({ ...row });
    }
  }

  async insertFills(rows: FillRow[]): Promise<number> {
    let inserted = 0;
    for (const row of rows) {
      if (this.fills.some((f) => f.account === row.account && f.fill_id === row.fill_id)) continue;
      this.fills.push({ ...row });
      inserted++;
    }
    return inserted;
  }

  async queryMetrics(account: string, range: TimeRange): Promise<MetricsRow[]> {
    return this.metrics.filter((m) => m.account === account && inRange(m, range)).sort(byTime);
  }

  async queryPositions(account: string, range: TimeRange, coin?: string): Promise<PositionRow[]> {
    return this.positions
      .filter(
        (p) => p.account === account && inRange(p, range) && (coin === undefined || p.coin === coin)
      )
      .sort(byTime);
  }

  async queryFills(query: FillQuery): Promise<FillRow[]> {
    const rows = this.fills
      .filter(
        (f) =>
          f.account === query.account &&
          inRange(f, query.range) &&
          (query.coin === undefined || f.coin === query.coin) &&
          (!query.closedOnly || f.closed_pnl !== 0)
      )
      .sort(byTime);
    if (query.newestFirst) rows.reverse();
    return query.limit === undefined ? rows : rows.slice(0, query.limit);
  }
}
