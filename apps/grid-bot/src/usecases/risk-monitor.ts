/**
 * Risk Monitor - One risk pass
 *
 * equity tracking (may trip the kill switch) → exposure → metrics → stop trading
 * when the kill switch is active.
 */

import { logger, type IterationOutcome, type RunningFlag } from "@grid-bot/utils";

import type { GridBotConfig } from "../config";
import type { RiskController } from "../services/risk-controller";

export interface RiskMonitorDeps {
  risk: RiskController;
  config: GridBotConfig;
  running: RunningFlag;
  stopTrading: () => Promise<void>;
}

export async function runRiskMonitorIteration(deps: RiskMonitorDeps): Promise<IterationOutcome> {
  const { risk, config } = deps;
  const { monitoring } = config;

  const equity = await risk.updateEquityTracking();
  if (equity.isErr()) {
    logger.warn("Equity tracking failed", { error: equity.error.message });
  }

  const exposure = await risk.checkMaxExposure();
  if (exposure.isErr()) {
    logger.warn("Exposure check failed", { error: exposure.error.message });
  }

  const metrics = risk.getRiskMetrics();
  logger.debug("Risk metrics", {
    equity: metrics.totalEquity.toFixed(2),
    exposurePct: (metrics.exposurePct * 100).toFixed(1),
    drawdownPct: (metrics.currentDrawdownPct * 100).toFixed(2),
  });

  if (risk.killSwitchActive && deps.running.isRunning()) {
    logger.critical("Kill switch active - stopping trading", { reason: metrics.killSwitchReason });
    await deps.stopTrading();
  }

  return { nextDelayMs: equity.isErr() ? monitoring.riskErrorBackoffMs : monitoring.riskPollIntervalMs };
}
