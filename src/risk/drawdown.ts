/**
 * Drawdown tracking: peak account value versus current value.
 *
 * One tracker per monitored account; nothing here is module-global.
 */

import { log, logWarn } from "../utils/logger.js";

export interface DrawdownState {
  peak: number;
  current: number;
  /** Percent below peak; 0 until a positive peak has been seen. */
  drawdownPct: number;
  breached: boolean;
}

export class DrawdownTracker {
  private peak = 0;
  private wasBreached = false;

  constructor(
    private readonly account: string,
    private readonly maxDrawdownPct: number
  ) {}

  update(accountValue: number): DrawdownState {
    if (accountValue > this.peak) {
      this.peak = accountValue;
    }

    const drawdownPct =
      this.peak > 0 ? Math.max(0, ((this.peak - accountValue) / this.peak) * 100) : 0;
    const breached = drawdownPct >= this.maxDrawdownPct;

    if (breached && !this.wasBreached) {
      logWarn(
        `${this.account}: drawdown ${drawdownPct.toFixed(1)}% from peak $${this.peak.toFixed(2)} exceeds ${this.maxDrawdownPct}%`
      );
    }
    this.wasBreached = breached;

    return { peak: this.peak, current: accountValue, drawdownPct, breached };
  }

  reset(): void {
    this.peak = 0;
    this.wasBreached = false;
    log(`${this.account}: drawdown tracker reset`);
  }
}
