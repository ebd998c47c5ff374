/**
 * Snapshot Loop - Periodic equity snapshot for reporting
 *
 * - Account equity, balance and open position totals
 * - Then a 24h summary of fills and the equity curve (persisted once there are fills)
 */

import type { ExchangeGateway } from "@grid-bot/adapters";
import { summarizePeriod } from "@grid-bot/core";
import type { StateStore } from "@grid-bot/repositories";
import { logger, type IterationOutcome } from "@grid-bot/utils";

import type { GridBotConfig } from "../config";
import type { Clock } from "../services/clock";

const SUMMARY_PERIOD_HOURS = 24;
const HOUR_MS = 3_600_000;

export interface SnapshotDeps {
  gateway: ExchangeGateway;
  store: Pick<StateStore, "saveEquitySnapshot" | "getEquitySnapshotsSince" | "getTradesSince" | "savePnlSummary">;
  config: GridBotConfig;
  now: Clock;
}

/**
 * A failed summary is logged; the snapshot itself already landed.
 */
async function saveSummary(deps: SnapshotDeps, currentEquity: number): Promise<void> {
  const { store, config } = deps;
  const nowMs = deps.now();
  const since = new Date(nowMs - SUMMARY_PERIOD_HOURS * HOUR_MS);

  const trades = await store.getTradesSince(since);
  if (trades.isErr()) {
    logger.warn("PnL summary skipped: trades unavailable", { error: trades.error.message });
    return;
  }
  const curve = await store.getEquitySnapshotsSince(since);
  if (curve.isErr()) {
    logger.warn("PnL summary skipped: equity history unavailable", { error: curve.error.message });
    return;
  }

  const summary = summarizePeriod(
    SUMMARY_PERIOD_HOURS,
    trades.value.filter(t => t.symbol === config.trading.symbol),
    curve.value.map(s => s.totalEquity),
    currentEquity,
  );
  logger.info("24h summary", {
    trades: summary.totalTrades,
    fees: summary.totalFees.toFixed(4),
    equityChange: summary.equityChange === null ? "n/a" : summary.equityChange.toFixed(2),
    maxDrawdownPct: (summary.maxDrawdown * 100).toFixed(2),
  });
  if (summary.totalTrades === 0) return;

  const saved = await store.savePnlSummary({
    calculatedAt: new Date(nowMs),
    period: `${SUMMARY_PERIOD_HOURS}h`,
    symbol: config.trading.symbol,
    totalTrades: summary.totalTrades,
    buyTrades: summary.buyTrades,
    sellTrades: summary.sellTrades,
    makerTrades: summary.makerTrades,
    volume: summary.volume,
    totalFees: summary.totalFees,
    equityChange: summary.equityChange,
    maxDrawdown: summary.maxDrawdown,
  });
  if (saved.isErr()) {
    logger.warn("Failed to persist PnL summary", { error: saved.error.message });
  }
}

export async function runSnapshotIteration(deps: SnapshotDeps): Promise<IterationOutcome> {
  const { gateway, store, config } = deps;
  const { monitoring, trading } = config;

  const wallet = await gateway.getWalletBalance(trading.settleCoin);
  if (wallet.isErr()) {
    logger.warn("Snapshot skipped: wallet unavailable", { error: wallet.error.message });
    return { nextDelayMs: monitoring.snapshotErrorBackoffMs };
  }

  const positions = await gateway.getPositions(trading.symbol);
  if (positions.isErr()) {
    logger.warn("Snapshot skipped: positions unavailable", { error: positions.error.message });
    return { nextDelayMs: monitoring.snapshotErrorBackoffMs };
  }

  const open = positions.value.filter(p => p.size > 0);
  const snapshot = {
    ts: new Date(deps.now()),
    totalEquity: wallet.value.totalEquity,
    availableBalance: wallet.value.availableBalance,
    unrealizedPnl: open.reduce((sum, p) => sum + p.unrealizedPnl, 0),
    totalPositionsValue: open.reduce((sum, p) => sum + p.positionValue, 0),
  };

  const saved = await store.saveEquitySnapshot(snapshot);
  if (saved.isErr()) {
    logger.warn("Failed to persist equity snapshot", { error: saved.error.message });
    return { nextDelayMs: monitoring.snapshotErrorBackoffMs };
  }

  logger.debug("Equity snapshot saved", { totalEquity: snapshot.totalEquity });
  await saveSummary(deps, snapshot.totalEquity);
  return { nextDelayMs: monitoring.snapshotIntervalMs };
}
