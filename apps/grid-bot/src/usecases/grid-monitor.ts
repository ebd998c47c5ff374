/**
 * Grid Monitor - One recenter check
 *
 * Kill switch active → idle. Otherwise evaluate the recenter policy and, when it
 * fires and exposure is within limits, rebuild the ladder.
 */

import type { GridProfile } from "@grid-bot/core";
import { logger, type IterationOutcome, type RunningFlag } from "@grid-bot/utils";

import type { GridBotConfig } from "../config";
import type { GridEngine } from "../services/grid-engine";
import type { RiskController } from "../services/risk-controller";

export interface GridMonitorDeps {
  engine: GridEngine;
  risk: RiskController;
  config: GridBotConfig;
  running: RunningFlag;
  activeProfile: () => GridProfile;
}

export async function runGridMonitorIteration(deps: GridMonitorDeps): Promise<IterationOutcome> {
  const { engine, risk, config } = deps;
  const { monitoring } = config;
  if (risk.killSwitchActive) return { nextDelayMs: monitoring.killSwitchIdleMs };

  const decision = await engine.shouldRecenter();
  if (decision.isErr()) {
    logger.warn("Recenter check failed", { error: decision.error.message });
    return { nextDelayMs: monitoring.gridErrorBackoffMs };
  }
  const verdict = decision.value;
  if (!verdict.shouldRecenter) return { nextDelayMs: monitoring.gridPollIntervalMs };

  const { trigger, reason } = verdict;
  logger.info("Recenter triggered", { trigger, reason });

  const exposure = await risk.checkMaxExposure();
  if (exposure.isErr()) {
    logger.warn("Skipping recenter: exposure unavailable", { error: exposure.error.message });
    return { nextDelayMs: monitoring.gridErrorBackoffMs };
  }
  if (!exposure.value) {
    logger.warn("Skipping recenter: max exposure exceeded");
    return { nextDelayMs: monitoring.gridPollIntervalMs };
  }

  // Stopped or tripped while we were checking: rebuilding now would leave orders behind.
  if (!deps.running.isRunning()) return { nextDelayMs: monitoring.gridPollIntervalMs };
  if (risk.killSwitchActive) return { nextDelayMs: monitoring.killSwitchIdleMs };

  const result = await engine.recenterGrid(reason, deps.activeProfile());
  if (result.isErr()) {
    logger.error("Failed to recenter grid", { type: result.error.type, error: result.error.message });
  }
  return { nextDelayMs: monitoring.gridPollIntervalMs };
}
