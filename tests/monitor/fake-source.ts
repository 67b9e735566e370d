import type { ExchangeData, SnapshotSource } from "../../src/exchange/hyperliquid-client.js";
import { buildSnapshot, type Fill, type PositionInput } from "../../src/risk/snapshot.js";

export interface AccountState {
  accountValue: number;
  freeMargin: number;
  positions: PositionInput[];
  marks: Record<string, number>;
  fills?: Fill[];
  /** Snapshot age relative to the clock, in ms. */
  ageMs?: number;
}

/** Serves canned exchange data per account, stamped with the injected clock. */
export class FakeSource implements SnapshotSource {
  readonly calls: string[] = [];
  failure: Error | null = null;
  gate: Promise<void> | null = null;

  constructor(
    private readonly states: Record<string, AccountState>,
    private readonly clock: () => number
  ) {}

  async fetchAccount(account: string): Promise<ExchangeData> {
    this.calls.push(account);
    if (this.gate) await this.gate;
    if (this.failure) throw this.failure;

    const state = this.states[account];
    if (!state) throw new Error(`unknown account ${account}`);
    return {
      snapshot: buildSnapshot({
        account,
        timestamp: this.clock() - (state.ageMs ?? 0),
        accountValue: state.accountValue,
        freeMargin: state.freeMargin,
        positions: state.positions,
      }),
      markPrices: new Map(Object.entries(state.marks)),
      fills: state.fills ?? [],
    };
  }
}
