/**
 * Supabase-backed history store.
 *
 * Inserts go out in batches of BATCH_SIZE rows. Natural-key dedupe and fill
 * dedupe use upsert with ignoreDuplicates, which needs the unique
 * constraints from sql/schema.sql.
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { z } from "zod";
import { PersistenceError, type PersistenceOperation } from "../risk/errors.js";
import { log, logDebug } from "../utils/logger.js";
import {
  TABLES,
  fillRowSchema,
  metricsRowSchema,
  positionRowSchema,
  type FillQuery,
  type FillRow,
  type HistoryStore,
  type InsertOptions,
  type MetricsRow,
  type PositionRow,
  type TimeRange,
} from "./store.js";

const BATCH_SIZE = 100;
const PAGE_SIZE = 1000;

interface QueryResult {
  data: unknown;
  error: { message: string } | null;
}

function chunk<T>(rows: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < rows.length; i += size) {
    batches.push(rows.slice(i, i + size));
  }
  return batches;
}

function fail(
  table: string,
  operation: PersistenceOperation,
  error: { message: string }
): PersistenceError {
  return new PersistenceError(`${table} ${operation} failed: ${error.message}`, table, operation, {
    cause: error,
  });
}

export interface SupabaseStoreOptions {
  /** Replaces the global fetch, e.g. for an in-process stand-in. */
  fetch?: typeof fetch;
}

export class SupabaseHistoryStore implements HistoryStore {
  constructor(private readonly client: SupabaseClient) {}

  static connect(url: string, key: string, options: SupabaseStoreOptions = {}): SupabaseHistoryStore {
    const client = createClient(url, key, {
      auth: { persistSession: false, autoRefreshToken: false },
      ...(options.fetch ? { global: { fetch: options.fetch } } : {}),
    });
    log(`Supabase history store connected (${new URL(url).host})`);
    return new SupabaseHistoryStore(client);
  }

  async insertMetrics(row: MetricsRow, options: InsertOptions): Promise<void> {
    await this.write(TABLES.metrics, [row], options.dedupe ? "account,timestamp" : null);
  }

  async insertPositions(rows: PositionRow[], options: InsertOptions): Promise<void> {
    await this.write(TABLES.positions, rows, options.dedupe ? "account,timestamp,coin" : null);
  }

  async insertFills(rows: FillRow[]): Promise<number> {
    let inserted = 0;
    for (const batch of chunk(rows, BATCH_SIZE)) {
      const { data, error } = await this.client
        .from(TABLES.fills)
        .upsert(batch, { onConflict: "account,fill_id", ignoreDuplicates: true })
        .select("fill_id");
      if (error) throw fail(TABLES.fills, "upsert", error);
      inserted += Array.isArray(data) ? data.length : 0;
    }
    return inserted;
  }

  async queryMetrics(account: string, range: TimeRange): Promise<MetricsRow[]> {
    return this.selectPaged(TABLES.metrics, metricsRowSchema, (from, to) =>
      this.client
        .from(TABLES.metrics)
        .select("*")
        .eq("account", account)
        .gte("timestamp", range.from.toISOString())
        .lte("timestamp", range.to.toISOString())
        .order("timestamp", { ascending: true })
        .range(from, to)
    );
  }

  async queryPositions(account: string, range: TimeRange, coin?: string): Promise<PositionRow[]> {
    return this.selectPaged(TABLES.positions, positionRowSchema, (from, to) => {
      let query = this.client
        .from(TABLES.positions)
        .select("*")
        .eq("account", account)
        .gte("timestamp", range.from.toISOString())
        .lte("timestamp", range.to.toISOString());
      if (coin !== undefined) query = query.eq("coin", coin);
      return query.order("timestamp", { ascending: true }).range(from, to);
    });
  }

  async queryFills(q: FillQuery): Promise<FillRow[]> {
    return this.selectPaged(
      TABLES.fills,
      fillRowSchema,
      (from, to) => {
        let query = this.client.from(TABLES.fills).select("*").eq("account", q.account);
        if (q.range) {
          query = query
            .gte("timestamp", q.range.from.toISOString())
            .lte("timestamp", q.range.to.toISOString());
        }
        if (q.coin !== undefined) query = query.eq("coin", q.coin);
        if (q.closedOnly) query = query.neq("closed_pnl", 0);
        return query.order("timestamp", { ascending: !q.newestFirst }).range(from, to);
      },
      q.limit
    );
  }

  private async write(
    table: string,
    rows: Array<MetricsRow | PositionRow>,
    naturalKey: string | null
  ): Promise<void> {
    const operation: PersistenceOperation = naturalKey ? "upsert" : "insert";
    for (const batch of chunk(rows, BATCH_SIZE)) {
      const { error } = naturalKey
        ? await this.client
            .from(table)
            .upsert(batch, { onConflict: naturalKey, ignoreDuplicates: true })
        : await this.client.from(table).insert(batch);
      if (error) throw fail(table, operation, error);
    }
  }

  private async selectPaged<T>(
    table: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    page: (from: number, to: number) => PromiseLike<QueryResult>,
    limit?: number
  ): Promise<T[]> {
    const rows: T[] = [];
    for (;;) {
      const remaining = limit === undefined ? PAGE_SIZE : Math.min(PAGE_SIZE, limit - rows.length);
      if (remaining <= 0) break;

      const { data, error } = await page(rows.length, rows.length + remaining - 1);
      if (error) throw fail(table, "select", error);

      const parsed = schema.array().safeParse(data ?? []);
      if (!parsed.success) {
        throw fail(table, "select", { message: `unexpected row shape: ${parsed.error.message}` });
      }
      rows.push(...parsed.data);
      if (parsed.data.length < remaining) break;
    }
    logDebug(`${table}: read ${rows.length} rows`);
    return rows;
  }
}
