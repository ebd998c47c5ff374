/**
 * Recenter Policy - Decide when the ladder must be rebuilt around a new center
 *
 * Priority order (first match wins):
 * 1. No active orders
 * 2. Price outside the band (highest sell / lowest buy ± deviation)
 * 3. Time since last recenter
 * 4. One-sided drift over the lookback window
 * 5. Pump/dump range over the last hour
 *
 * This module is pure (no I/O, no throw).
 */

import type { ActiveOrderPrice, Ms, PricePoint, RecenterConfig, RecenterDecision } from "./types";

const HOUR_MS = 3_600_000;

export interface RecenterInput {
  nowMs: Ms;
  currentPrice: number;
  centerPrice: number | null;
  activeOrders: readonly ActiveOrderPrice[];
  lastRecenterMs: Ms | null;
  history: readonly PricePoint[];
  config: RecenterConfig;
}

const pct = (ratio: number, digits: number): string => `${(ratio * 100).toFixed(digits)}%`;

function pricesSince(history: readonly PricePoint[], sinceMs: Ms): number[] {
  return history.filter(p => p.tsMs >= sinceMs).map(p => p.price);
}

/**
 * Band check. When only one side has orders only that side is checked.
 */
function checkBand(input: RecenterInput): RecenterDecision {
  const { currentPrice, activeOrders, config } = input;
  const sells = activeOrders.filter(o => o.side === "sell").map(o => o.price);
  const buys = activeOrders.filter(o => o.side === "buy").map(o => o.price);

  if (sells.length > 0) {
    const highestSell = Math.max(...sells);
    const upper = highestSell * (1 + config.priceDeviationPct);
    if (currentPrice > upper) {
      return {
        shouldRecenter: true,
        trigger: "PRICE_ABOVE_BAND",
        reason: `Price ${currentPrice.toFixed(4)} > highest sell ${highestSell.toFixed(4)} + ${pct(config.priceDeviationPct, 2)}`,
        metric: currentPrice / highestSell - 1,
      };
    }
  }

  if (buys.length > 0) {
    const lowestBuy = Math.min(...buys);
    const lower = lowestBuy * (1 - config.priceDeviationPct);
    if (currentPrice < lower) {
      return {
        shouldRecenter: true,
        trigger: "PRICE_BELOW_BAND",
        reason: `Price ${currentPrice.toFixed(4)} < lowest buy ${lowestBuy.toFixed(4)} - ${pct(config.priceDeviationPct, 2)}`,
        metric: 1 - currentPrice / lowestBuy,
      };
    }
  }

  return { shouldRecenter: false };
}

function checkTime(input: RecenterInput): RecenterDecision {
  if (input.lastRecenterMs === null) return { shouldRecenter: false };

  const elapsedHours = (input.nowMs - input.lastRecenterMs) / HOUR_MS;
  if (elapsedHours >= input.config.timeBasedHours) {
    return {
      shouldRecenter: true,
      trigger: "TIME_ELAPSED",
      reason: `Time-based recenter: ${elapsedHours.toFixed(1)}h >= ${input.config.timeBasedHours}h`,
      metric: elapsedHours,
    };
  }
  return { shouldRecenter: false };
}

function checkOneSided(input: RecenterInput): RecenterDecision {
  const { centerPrice, config } = input;
  if (centerPrice === null || input.history.length < config.minHistorySamples) return { shouldRecenter: false };

  const recent = pricesSince(input.history, input.nowMs - config.oneSideHours * HOUR_MS);
  if (recent.length === 0) return { shouldRecenter: false };

  const above = recent.filter(p => p > centerPrice).length;
  const fraction = above / recent.length;

  if (fraction > config.oneSideUpperFraction) {
    return {
      shouldRecenter: true,
      trigger: "ONE_SIDED_ABOVE",
      reason: `Price above center ${pct(fraction, 0)} of the last ${config.oneSideHours}h`,
      metric: fraction,
    };
  }
  if (fraction < config.oneSideLowerFraction) {
    return {
      shouldRecenter: true,
      trigger: "ONE_SIDED_BELOW",
      reason: `Price below center ${pct(1 - fraction, 0)} of the last ${config.oneSideHours}h`,
      metric: fraction,
    };
  }
  return { shouldRecenter: false };
}

function checkPumpDump(input: RecenterInput): RecenterDecision {
  const { config } = input;
  if (input.history.length < config.minHistorySamples) return { shouldRecenter: false };

  const recent = pricesSince(input.history, input.nowMs - config.pumpDumpWindowHours * HOUR_MS);
  if (recent.length === 0) return { shouldRecenter: false };

  const low = Math.min(...recent);
  const high = Math.max(...recent);
  if (low <= 0) return { shouldRecenter: false };

  const range = (high - low) / low;
  if (range >= config.pumpDumpPct) {
    return {
      shouldRecenter: true,
      trigger: "PUMP_DUMP",
      reason: `Pump/dump detected: ${pct(range, 1)} in ${config.pumpDumpWindowHours}h`,
      metric: range,
    };
  }
  return { shouldRecenter: false };
}

/**
 * Evaluate all recenter triggers in priority order.
 */
export function evaluateRecenter(input: RecenterInput): RecenterDecision {
  if (input.activeOrders.length === 0) {
    return { shouldRecenter: true, trigger: "NO_ACTIVE_ORDERS", reason: "No active orders found" };
  }

  for (const check of [checkBand, checkTime, checkOneSided, checkPumpDump]) {
    const decision = check(input);
    if (decision.shouldRecenter) return decision;
  }
  return { shouldRecenter: false };
}
