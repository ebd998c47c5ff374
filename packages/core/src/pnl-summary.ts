/**
 * PnL Summary - Period roll-up of fills and the equity curve
 *
 * Grid fills are not paired into round trips, so the period result comes from
 * the equity curve rather than per-trade profit.
 */

import { calculateDrawdown } from "./risk-policy";
import type { Side } from "./types";

export interface SummaryFill {
  side: Side;
  price: number;
  qty: number;
  fee: number;
  isMaker: boolean;
}

export interface PeriodSummary {
  periodHours: number;
  totalTrades: number;
  buyTrades: number;
  sellTrades: number;
  makerTrades: number;
  /** Σ price × qty */
  volume: number;
  totalFees: number;
  /** Current equity minus the oldest point of the curve; null without one */
  equityChange: number | null;
  /** Largest peak-to-trough drop across the curve and current equity, as a fraction */
  maxDrawdown: number;
}

export function summarizePeriod(
  periodHours: number,
  fills: readonly SummaryFill[],
  equityCurve: readonly number[],
  currentEquity: number,
): PeriodSummary {
  let peak = 0;
  let maxDrawdown = 0;
  for (const equity of [...equityCurve, currentEquity]) {
    peak = Math.max(peak, equity);
    maxDrawdown = Math.max(maxDrawdown, calculateDrawdown(peak, equity));
  }

  const first = equityCurve[0];
  return {
    periodHours,
    totalTrades: fills.length,
    buyTrades: fills.filter(f => f.side === "buy").length,
    sellTrades: fills.filter(f => f.side === "sell").length,
    makerTrades: fills.filter(f => f.isMaker).length,
    volume: fills.reduce((sum, f) => sum + f.price * f.qty, 0),
    totalFees: fills.reduce((sum, f) => sum + f.fee, 0),
    equityChange: first === undefined ? null : currentEquity - first,
    maxDrawdown,
  };
}
