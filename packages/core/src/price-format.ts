/**
 * Tick / step formatting
 *
 * Always floors toward the increment so an order never commits more
 * price or size than the caller budgeted. Formatting is idempotent.
 */

import Decimal from "decimal.js";

/**
 * Floor `value` to a multiple of `increment` and render it with the
 * increment's decimal places ("0.0010" → 3).
 */
export function floorToIncrement(value: Decimal.Value, increment: string): string {
  const amount = new Decimal(value);
  const step = new Decimal(increment);
  if (step.lte(0)) {
    return amount.toFixed();
  }
  return amount.div(step).floor().mul(step).toFixed(step.decimalPlaces());
}

export function formatPrice(price: Decimal.Value, tickSize: string): string {
  return floorToIncrement(price, tickSize);
}

export function formatQuantity(qty: Decimal.Value, qtyStep: string): string {
  return floorToIncrement(qty, qtyStep);
}
