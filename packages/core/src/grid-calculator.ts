/**
 * Grid Calculator - Pure ladder construction
 *
 * - Spacing widens under high volatility, capped at gridSpacingMax
 * - Level count shrinks symmetrically when capital cannot fund every level
 * - Prices floor to tick, quantities floor to step
 *
 * This module is pure (no I/O, no throw).
 */

import Decimal from "decimal.js";
import { err, ok, type Result } from "neverthrow";

import { formatPrice, formatQuantity } from "./price-format";
import type {
  GridCalculationError,
  GridLevel,
  GridLevels,
  GridProfile,
  InstrumentSpec,
  PricePoint,
  Side,
  SpacingConfig,
} from "./types";

export interface GridCalculationInput {
  centerPrice: number;
  profile: GridProfile;
  availableCapital: number;
  instrument: InstrumentSpec;
  history: readonly PricePoint[];
  spacingConfig: SpacingConfig;
  /** Per-level budget floor as a multiple of minNotional */
  minNotionalBuffer: number;
}

/**
 * Mean absolute change between consecutive prices over the last
 * `2 * period` samples. Returns 0 when history is shorter than that.
 */
export function calculateVolatility(history: readonly PricePoint[], period: number): number {
  const window = period * 2;
  if (window < 2 || history.length < window) return 0;

  const prices = history.slice(-window).map(p => p.price);
  let total = 0;
  for (let i = 1; i < prices.length; i++) {
    total += Math.abs(prices[i] - prices[i - 1]);
  }
  return total / (prices.length - 1);
}

/**
 * Effective spacing for the given history.
 */
export function calculateGridSpacing(
  profile: GridProfile,
  history: readonly PricePoint[],
  centerPrice: number,
  config: SpacingConfig,
): number {
  const volatility = calculateVolatility(history, config.volatilityPeriod);
  if (volatility <= 0 || centerPrice <= 0) return profile.gridSpacing;

  const volatilityPct = volatility / centerPrice;
  if (volatilityPct > config.volatilityThreshold) {
    return Math.min(profile.gridSpacing * config.volatilityMultiplier, config.gridSpacingMax);
  }
  return profile.gridSpacing;
}

function buildLevel(
  side: Side,
  index: number,
  centerPrice: number,
  spacing: number,
  budgetPerLevel: number,
  instrument: InstrumentSpec,
): GridLevel | null {
  const offset = new Decimal(spacing).mul(index);
  const multiplier = side === "buy" ? new Decimal(1).minus(offset) : new Decimal(1).plus(offset);
  const price = new Decimal(formatPrice(new Decimal(centerPrice).mul(multiplier), instrument.tickSize));

  // Coarse ticks can floor a level onto (or past) the center
  if (price.lte(0)) return null;
  if (side === "sell" && price.lte(centerPrice)) return null;

  const rawQty = Decimal.max(
    new Decimal(budgetPerLevel).div(price),
    instrument.minOrderQty,
    new Decimal(instrument.minNotional).div(price),
  );
  const quantity = new Decimal(formatQuantity(rawQty, instrument.qtyStep));
  if (quantity.lte(0)) return null;

  const notional = quantity.mul(price);
  if (notional.lt(instrument.minNotional)) return null;

  return {
    levelIndex: side === "buy" ? -index : index,
    price: price.toNumber(),
    quantity: quantity.toNumber(),
    side,
    notional: notional.toNumber(),
  };
}

function buildSide(
  side: Side,
  count: number,
  input: GridCalculationInput,
  spacing: number,
  budgetPerLevel: number,
): GridLevel[] {
  const levels: GridLevel[] = [];
  for (let i = 1; i <= count; i++) {
    const level = buildLevel(side, i, input.centerPrice, spacing, budgetPerLevel, input.instrument);
    if (level) levels.push(level);
  }
  return levels;
}

/**
 * Build the buy/sell ladder around `centerPrice`.
 *
 * Buy levels sit strictly below center, sell levels strictly above.
 * Levels whose floored notional drops under minNotional are skipped.
 */
export function calculateGridLevels(input: GridCalculationInput): Result<GridLevels, GridCalculationError> {
  const { centerPrice, profile, availableCapital, instrument } = input;

  if (!Number.isFinite(centerPrice) || centerPrice <= 0) {
    return err({ type: "INVALID_CENTER_PRICE", message: `Invalid center price: ${centerPrice}` });
  }

  const spacing = calculateGridSpacing(profile, input.history, centerPrice, input.spacingConfig);

  const minBudgetPerLevel = instrument.minNotional * input.minNotionalBuffer;
  const maxPossibleLevels = minBudgetPerLevel > 0 ? Math.floor(availableCapital / minBudgetPerLevel) : Infinity;
  if (availableCapital <= 0 || !(maxPossibleLevels >= 2)) {
    return err({
      type: "INSUFFICIENT_CAPITAL",
      message: `Insufficient capital ${availableCapital} for at least 2 levels`,
      requiredCapital: minBudgetPerLevel * 2,
    });
  }

  let levelsPerSide = profile.targetLevels;
  if (maxPossibleLevels < profile.targetLevels * 2) {
    levelsPerSide = Math.floor(maxPossibleLevels / 2);
  }

  const budgetPerLevel = availableCapital / (levelsPerSide * 2);
  const buyLevels = buildSide("buy", levelsPerSide, input, spacing, budgetPerLevel);
  const sellLevels = buildSide("sell", levelsPerSide, input, spacing, budgetPerLevel);

  if (buyLevels.length === 0 && sellLevels.length === 0) {
    return err({ type: "NO_VALID_LEVELS", message: "No level satisfies the exchange minimums" });
  }

  return ok({ buyLevels, sellLevels, spacing, budgetPerLevel });
}
