/**
 * Read-only Hyperliquid info API client.
 * Produces the per-cycle snapshot, mark prices and recent fills; it never
 * signs or places anything.
 */

import { z } from "zod";
import {
  buildSnapshot,
  type Fill,
  type PositionInput,
  type SnapshotBuildResult,
} from "../risk/snapshot.js";
import { logDebug, logWarn } from "../utils/logger.js";

export class ExchangeApiError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExchangeApiError";
  }
}

export interface ExchangeData {
  snapshot: SnapshotBuildResult;
  markPrices: Map<string, number>;
  fills: Fill[];
}

export interface SnapshotSource {
  fetchAccount(account: string): Promise<ExchangeData>;
}

const decimalString = z.union([z.string(), z.number()]).pipe(z.coerce.number());

const clearinghouseStateSchema = z.object({
  marginSummary: z.object({
    accountValue: decimalString,
    totalNtlPos: decimalString,
    totalMarginUsed: decimalString,
  }),
  withdrawable: decimalString,
  assetPositions: z.array(
    z.object({
      position: z.object({
        coin: z.string(),
        szi: decimalString,
        entryPx: decimalString.nullable(),
        liquidationPx: decimalString.nullable(),
        leverage: z.object({ value: z.number() }),
        unrealizedPnl: decimalString,
        realizedPnl: decimalString.optional(),
        marginUsed: decimalString,
      }),
    })
  ),
  time: z.number(),
});

const metaAndAssetCtxsSchema = z.tuple([
  z.object({ universe: z.array(z.object({ name: z.string() })) }),
  z.array(z.object({ markPx: decimalString.nullable() })),
]);

const userFillsSchema = z.array(
  z.object({
    coin: z.string(),
    px: decimalString,
    sz: decimalString,
    side: z.enum(["B", "A"]),
    time: z.number(),
    closedPnl: decimalString,
    oid: z.number(),
    tid: z.number(),
  })
);

export type ClearinghouseState = z.infer<typeof clearinghouseStateSchema>;

export interface HyperliquidClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export class HyperliquidClient implements SnapshotSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HyperliquidClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async fetchAccount(account: string): Promise<ExchangeData> {
    const [state, markPrices, fills] = await Promise.all([
      this.getClearinghouseState(account),
      this.getMarkPrices(),
      this.getUserFills(account),
    ]);
    return { snapshot: toSnapshot(account, state), markPrices, fills };
  }

  async getClearinghouseState(user: string): Promise<ClearinghouseState> {
    return this.info({ type: "clearinghouseState", user }, clearinghouseStateSchema);
  }

  async getMarkPrices(): Promise<Map<string, number>> {
    const [meta, ctxs] = await this.info({ type: "metaAndAssetCtxs" }, metaAndAssetCtxsSchema);
    const marks = new Map<string, number>();
    meta.universe.forEach((asset, i) => {
      const mark = ctxs[i]?.markPx;
      if (mark !== undefined && mark !== null && Number.isFinite(mark) && mark > 0) {
        marks.set(asset.name, mark);
      }
    });
    return marks;
  }

  async getUserFills(user: string): Promise<Fill[]> {
    const rows = await this.info({ type: "userFills", user }, userFillsSchema);
    return rows.map((f): Fill => ({
      fillId: String(f.tid),
      orderId: String(f.oid),
      asset: f.coin,
      side: f.side === "B" ? "BUY" : "SELL",
      size: f.sz,
      price: f.px,
      closedPnl: f.closedPnl,
      timestamp: new Date(f.time),
    }));
  }

  private async info<T>(
    payload: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    logDebug(`POST /info ${payload.type}`);
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/info`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new ExchangeApiError(`${payload.type} request failed: ${String(err)}`, { cause: err });
    }
    if (!response.ok) {
      throw new ExchangeApiError(`${payload.type} request failed: HTTP ${response.status}`);
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExchangeApiError(`${payload.type} response malformed: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}

export function toSnapshot(account: string, state: ClearinghouseState): SnapshotBuildResult {
  const positions: PositionInput[] = [];
  for (const { position } of state.assetPositions) {
    if (position.szi === 0) continue;
    if (position.entryPx === null) {
      logWarn(`${position.coin}: position without entry price skipped`);
      continue;
    }
    positions.push({
      asset: position.coin,
      side: position.szi < 0 ? "SHORT" : "LONG",
      size: position.szi,
      entryPrice: position.entryPx,
      liquidationPrice: position.liquidationPx,
      leverage: position.leverage.value,
      unrealizedPnl: position.unrealizedPnl,
      realizedPnl: position.realizedPnl,
      marginUsed: position.marginUsed,
    });
  }

  return buildSnapshot({
    account,
    timestamp: state.time,
    accountValue: state.marginSummary.accountValue,
    freeMargin: state.withdrawable,
    totalMarginUsed: state.marginSummary.totalMarginUsed,
    positions,
  });
}
