/**
 * Take-profit placement after a fill
 *
 * This module is pure (no I/O, no throw).
 */

import type { BestQuotes, Side } from "./types";

export interface TakeProfitOrder {
  side: Side;
  price: number;
}

/**
 * Opposite-side order `profitTarget` away from the fill.
 */
export function calculateTakeProfit(fillSide: Side, fillPrice: number, profitTarget: number): TakeProfitOrder {
  return fillSide === "buy"
    ? { side: "sell", price: fillPrice * (1 + profitTarget) }
    : { side: "buy", price: fillPrice * (1 - profitTarget) };
}

/**
 * Pull a crossing take-profit just behind the touch (1bp) so it rests.
 */
export function makerFallbackPrice(side: Side, quotes: BestQuotes): number {
  return side === "buy" ? quotes.bestBid * 0.9999 : quotes.bestAsk * 1.0001;
}
