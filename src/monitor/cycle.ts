/**
 * One poll cycle for one account:
 *   fetch → freshness check → aggregate → signals → record
 *
 * Nothing thrown inside a cycle escapes it; failures end up in the report.
 */

import type { SnapshotSource } from "../exchange/hyperliquid-client.js";
import type { HistoricalLogger, RecordResult } from "../history/historical-logger.js";
import type { HistoryReader } from "../history/history-reader.js";
import { systemClock, type Clock } from "../history/write-policy.js";
import type { DrawdownTracker } from "../risk/drawdown.js";
import { aggregatePortfolio, toMetricsRecord } from "../risk/portfolio-risk.js";
import { evaluateSignals, suggestAdjustments } from "../risk/signals.js";
import { checkFreshness } from "../risk/snapshot.js";
import type { PnlHistory, PortfolioRisk, RiskSignal } from "../risk/types.js";
import type { RiskConfig } from "../utils/config.js";
import { log, logError, logWarn } from "../utils/logger.js";

export interface CycleDeps {
  account: string;
  source: SnapshotSource;
  reader: HistoryReader;
  logger: HistoricalLogger;
  drawdown: DrawdownTracker;
  risk: RiskConfig;
  maxSnapshotAgeMs: number;
  pnlWindowMs: number;
  clock?: Clock;
}

export interface CycleFailure {
  name: string;
  message: string;
}

export interface CycleReport {
  account: string;
  startedAt: Date;
  ok: boolean;
  stale: boolean;
  portfolio?: PortfolioRisk;
  signals: RiskSignal[];
  suggestions: string[];
  record?: RecordResult;
  error?: CycleFailure;
}

function describe(err: unknown): CycleFailure {
  return err instanceof Error
    ? { name: err.name, message: err.message }
    : { name: "Error", message: String(err) };
}

const NO_HISTORY: PnlHistory = { realizedPnl: 0, averageExposure: null };

export async function runCycle(deps: CycleDeps): Promise<CycleReport> {
  const clock = deps.clock ?? systemClock;
  const report: CycleReport = {
    account: deps.account,
    startedAt: new Date(clock()),
    ok: false,
    stale: false,
    signals: [],
    suggestions: [],
  };

  try {
    const data = await deps.source.fetchAccount(deps.account);
    const { snapshot, rejected } = data.snapshot;

    const stale = checkFreshness(snapshot, clock(), deps.maxSnapshotAgeMs);
    if (stale) logWarn(`${deps.account}: ${stale.message}`);
    report.stale = stale !== null;

    let history = NO_HISTORY;
    try {
      history = await deps.reader.pnlHistory(deps.pnlWindowMs);
    } catch (err) {
      logError(`${deps.account}: reading PnL history`, err);
    }

    const aggregated = aggregatePortfolio(snapshot, data.markPrices, history, deps.risk);
    const portfolio: PortfolioRisk = {
      ...aggregated,
      rejected: [...rejected, ...aggregated.rejected],
    };
    const drawdown = deps.drawdown.update(snapshot.accountValue);

    report.portfolio = portfolio;
    report.signals = evaluateSignals(portfolio, deps.risk, { drawdown, stale });
    report.suggestions = suggestAdjustments(portfolio, deps.risk);

    report.record = await deps.logger.record(snapshot, toMetricsRecord(portfolio), data.fills);
    report.ok = true;

    log(
      `${deps.account}: heat ${portfolio.portfolioHeat.toFixed(1)}, ` +
        `${portfolio.positions.length} positions, ${report.signals.length} signals`
    );
  } catch (err) {
    logError(`${deps.account}: cycle failed`, err);
    report.error = describe(err);
  }

  return report;
}
