/**
 * Risk Policy - Pure logic for risk evaluation
 *
 * - Kill-switch latch: trips on daily drawdown, cleared only manually
 * - Daily max equity resets on UTC day change
 * - Exposure, maker and order-size gates
 *
 * This module is pure (no I/O, no throw).
 */

import type { BestQuotes, Ms, PositionExposure, RiskLimits, RiskMetrics, RiskState, Side } from "./types";

/**
 * Funding rate assumed per 8h settlement, three settlements a day
 */
export const FUNDING_RATE_ESTIMATE = 0.0001;
export const FUNDING_SETTLEMENTS_PER_DAY = 3;

export function createInitialRiskState(): RiskState {
  return {
    killSwitchActive: false,
    killSwitchReason: "",
    dailyMaxEquity: 0,
    lastEquityCheckMs: null,
    currentExposure: 0,
    totalEquity: 0,
  };
}

const utcDay = (tsMs: Ms): string => new Date(tsMs).toISOString().slice(0, 10);

export function isSameUtcDay(a: Ms, b: Ms): boolean {
  return utcDay(a) === utcDay(b);
}

// ─────────────────────────────────────────────────────────────────────────────
// Equity tracking
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Fold a fresh equity observation into the state.
 *
 * On a new UTC day (or the first observation) the daily max restarts at
 * the observed equity; otherwise it only ratchets up.
 */
export function updateEquity(state: RiskState, equity: number, nowMs: Ms): RiskState {
  const newDay = state.lastEquityCheckMs === null || !isSameUtcDay(state.lastEquityCheckMs, nowMs);
  return {
    ...state,
    totalEquity: equity,
    dailyMaxEquity: newDay ? equity : Math.max(state.dailyMaxEquity, equity),
    lastEquityCheckMs: nowMs,
  };
}

/**
 * Drawdown from the daily max as a fraction (0.1 = 10%)
 */
export function calculateDrawdown(dailyMaxEquity: number, equity: number): number {
  if (dailyMaxEquity <= 0) return 0;
  return (dailyMaxEquity - equity) / dailyMaxEquity;
}

export type KillSwitchEvaluation = { shouldTrigger: false; drawdown: number } | { shouldTrigger: true; drawdown: number; reason: string };

/**
 * Decide whether the latch must trip. An already-active latch never re-trips.
 */
export function evaluateKillSwitch(state: RiskState, drawdownThreshold: number): KillSwitchEvaluation {
  const drawdown = calculateDrawdown(state.dailyMaxEquity, state.totalEquity);
  if (state.killSwitchActive || drawdown < drawdownThreshold) {
    return { shouldTrigger: false, drawdown };
  }
  return {
    shouldTrigger: true,
    drawdown,
    reason:
      `Drawdown ${(drawdown * 100).toFixed(2)}% exceeds threshold ${(drawdownThreshold * 100).toFixed(2)}% ` +
      `(Max: $${state.dailyMaxEquity.toFixed(2)}, Current: $${state.totalEquity.toFixed(2)})`,
  };
}

export function activateKillSwitch(state: RiskState, reason: string): { state: RiskState; activated: boolean } {
  if (state.killSwitchActive) return { state, activated: false };
  return { state: { ...state, killSwitchActive: true, killSwitchReason: reason }, activated: true };
}

/**
 * Clear the latch. The daily max restarts at `observedEquity` so the old
 * drawdown does not re-trip immediately.
 */
export function deactivateKillSwitch(
  state: RiskState,
  observedEquity: number,
): { state: RiskState; deactivated: boolean } {
  if (!state.killSwitchActive) return { state, deactivated: false };
  return {
    state: {
      ...state,
      killSwitchActive: false,
      killSwitchReason: "",
      totalEquity: observedEquity,
      dailyMaxEquity: observedEquity,
    },
    deactivated: true,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Gates
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Σ |size| × markPrice over open positions
 */
export function calculateExposure(positions: readonly PositionExposure[]): number {
  return positions.reduce((total, p) => total + Math.abs(p.size) * p.markPrice, 0);
}

export function checkExposure(
  exposure: number,
  equity: number,
  maxExposurePct: number,
): { withinLimit: boolean; exposurePct: number } {
  if (equity <= 0) return { withinLimit: false, exposurePct: 0 };
  const exposurePct = exposure / equity;
  return { withinLimit: exposurePct <= maxExposurePct, exposurePct };
}

/**
 * A limit order rests (maker) only if it does not cross the book.
 */
export function isMakerPrice(side: Side, price: number, quotes: BestQuotes): boolean {
  return side === "buy" ? price < quotes.bestAsk : price > quotes.bestBid;
}

export function isOrderSizeWithinLimit(
  quantity: number,
  price: number,
  equity: number,
  maxPositionSizePct: number,
): boolean {
  if (equity <= 0) return false;
  return (quantity * price) / equity <= maxPositionSizePct;
}

/**
 * Estimated daily funding cost of the open positions
 */
export function calculateFundingImpact(positions: readonly PositionExposure[]): number {
  return calculateExposure(positions) * FUNDING_RATE_ESTIMATE * FUNDING_SETTLEMENTS_PER_DAY;
}

export function buildRiskMetrics(state: RiskState, limits: RiskLimits): RiskMetrics {
  const { withinLimit, exposurePct } = checkExposure(state.currentExposure, state.totalEquity, limits.maxExposurePct);
  return {
    killSwitchActive: state.killSwitchActive,
    killSwitchReason: state.killSwitchReason,
    totalEquity: state.totalEquity,
    dailyMaxEquity: state.dailyMaxEquity,
    currentExposure: state.currentExposure,
    exposurePct,
    maxExposurePct: limits.maxExposurePct,
    currentDrawdownPct: calculateDrawdown(state.dailyMaxEquity, state.totalEquity),
    killSwitchThresholdPct: limits.killSwitchDrawdownPct,
    availableForTrading: Math.max(0, state.totalEquity * limits.maxExposurePct - state.currentExposure),
    withinLimits: withinLimit && !state.killSwitchActive,
  };
}
