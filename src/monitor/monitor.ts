/**
 * Interval loop over the monitored accounts.
 *
 * Each account has its own logger, write policy, history reader and
 * drawdown tracker; no state is shared between accounts but the store. A
 * cycle that outlives `cycleTimeoutMs` is reported as timed out; while it is
 * still in flight the account's next ticks are skipped.
 */

import type { SnapshotSource } from "../exchange/hyperliquid-client.js";
import { HistoricalLogger } from "../history/historical-logger.js";
import { HistoryReader } from "../history/history-reader.js";
import type { HistoryStore } from "../history/store.js";
import { WritePolicy, systemClock, type Clock } from "../history/write-policy.js";
import { DrawdownTracker } from "../risk/drawdown.js";
import type { MonitorConfig } from "../utils/config.js";
import { log, logError, logWarn } from "../utils/logger.js";
import { runCycle, type CycleReport } from "./cycle.js";

interface AccountWorker {
  account: string;
  logger: HistoricalLogger;
  reader: HistoryReader;
  drawdown: DrawdownTracker;
  inFlight: boolean;
  latest?: CycleReport;
}

export interface MonitorDeps {
  config: MonitorConfig;
  source: SnapshotSource;
  store: HistoryStore;
  clock?: Clock;
}

export class Monitor {
  private readonly workers = new Map<string, AccountWorker>();
  private readonly clock: Clock;
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly deps: MonitorDeps) {
    this.clock = deps.clock ?? systemClock;
    for (const account of deps.config.wallets) {
      this.workers.set(account, {
        account,
        logger: new HistoricalLogger(
          deps.store,
          new WritePolicy(deps.config.minLogIntervalMs, this.clock),
          { keyMode: deps.config.keyMode }
        ),
        reader: new HistoryReader(deps.store, account, {
          clock: this.clock,
          pnlSource: deps.config.pnlSource,
        }),
        drawdown: new DrawdownTracker(account, deps.config.risk.maxDrawdownPct),
        inFlight: false,
      });
    }
  }

  get accounts(): string[] {
    return [...this.workers.keys()];
  }

  get defaultAccount(): string {
    return this.deps.config.wallets[0];
  }

  /** History of one monitored account, or undefined for an unknown wallet. */
  reader(account: string = this.defaultAccount): HistoryReader | undefined {
    return this.workers.get(account)?.reader;
  }

  latest(account: string = this.defaultAccount): CycleReport | undefined {
    return this.workers.get(account)?.latest;
  }

  /** Latest report, running a cycle first if the account has none yet. */
  async current(account: string = this.defaultAccount): Promise<CycleReport | undefined> {
    const worker = this.workers.get(account);
    if (!worker) return undefined;
    if (!worker.latest) await this.runAccount(worker);
    return worker.latest;
  }

  async tick(): Promise<CycleReport[]> {
    const reports = await Promise.all([...this.workers.values()].map((w) => this.runAccount(w)));
    return reports.filter((r): r is CycleReport => r !== undefined);
  }

  start(): void {
    if (this.timer) return;
    const { pollIntervalMs } = this.deps.config;
    log(`Monitoring ${this.workers.size} account(s) every ${pollIntervalMs / 1000}s`);
    const run = () => {
      this.tick().catch((err) => logError("monitor tick", err));
    };
    run();
    this.timer = setInterval(run, pollIntervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log("Monitor stopped");
    }
  }

  private async runAccount(worker: AccountWorker): Promise<CycleReport | undefined> {
    if (worker.inFlight) {
      logWarn(`${worker.account}: previous cycle still running, skipping`);
      return undefined;
    }

    worker.inFlight = true;
    const cycle = runCycle({
      account: worker.account,
      source: this.deps.source,
      reader: worker.reader,
      logger: worker.logger,
      drawdown: worker.drawdown,
      risk: this.deps.config.risk,
      maxSnapshotAgeMs: this.deps.config.maxSnapshotAgeMs,
      pnlWindowMs: this.deps.config.pnlWindowMs,
      clock: this.clock,
    })
      .then((report) => {
        // A cycle that finishes after its timeout still replaces the timeout report.
        worker.latest = report;
        return report;
      })
      .finally(() => {
        worker.inFlight = false;
      });

    const report = await withTimeout(cycle, this.deps.config.cycleTimeoutMs, () => ({
      account: worker.account,
      startedAt: new Date(this.clock()),
      ok: false,
      stale: false,
      signals: [],
      suggestions: [],
      error: {
        name: "TimeoutError",
        message: `cycle exceeded ${this.deps.config.cycleTimeoutMs}ms`,
      },
    }));

    if (report.error?.name === "TimeoutError") {
      logWarn(`${worker.account}: ${report.error.message}, retrying next interval`);
      worker.latest = report;
    }
    return report;
  }
}

function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => T): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => resolve(onTimeout()), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}
