/**
 * Core Domain Types
 *
 * Pure type definitions for the grid strategy and risk policy.
 * No I/O dependencies, no side effects.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Value Objects
// ─────────────────────────────────────────────────────────────────────────────

/** Milliseconds since epoch (or a duration in ms) */
export type Ms = number;

/** Side of an order */
export type Side = "buy" | "sell";

// ─────────────────────────────────────────────────────────────────────────────
// Instrument
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Exchange-enforced trading increments for one symbol.
 *
 * `tickSize` and `qtyStep` stay as the exchange's strings: their decimal
 * places decide how prices and quantities are rendered.
 */
export interface InstrumentSpec {
  symbol: string;
  minOrderQty: number;
  qtyStep: string;
  tickSize: string;
  minNotional: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Grid
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Named grid profile (Conservative / Normal / Aggressive ...)
 */
export interface GridProfile {
  /** Base distance between levels as a fraction of center price (0.01 = 1%) */
  gridSpacing: number;
  /** Desired levels per side */
  targetLevels: number;
  /** Take-profit distance as a fraction of fill price */
  profitTarget: number;
}

/**
 * One rung of the ladder.
 *
 * levelIndex: negative for buys, positive for sells; magnitude = distance from center.
 */
export interface GridLevel {
  levelIndex: number;
  price: number;
  quantity: number;
  side: Side;
  notional: number;
}

export interface GridLevels {
  /** Closest-to-center first */
  buyLevels: GridLevel[];
  /** Closest-to-center first */
  sellLevels: GridLevel[];
  spacing: number;
  budgetPerLevel: number;
}

export interface PricePoint {
  price: number;
  tsMs: Ms;
}

/**
 * Volatility-driven spacing adjustment
 */
export interface SpacingConfig {
  gridSpacingMax: number;
  volatilityPeriod: number;
  /** Mean absolute delta / center price above which spacing widens */
  volatilityThreshold: number;
  volatilityMultiplier: number;
}

export type GridCalculationError =
  | { type: "INVALID_CENTER_PRICE"; message: string }
  | { type: "INSUFFICIENT_CAPITAL"; message: string; requiredCapital: number }
  | { type: "NO_VALID_LEVELS"; message: string };

export type ProfileError = { type: "UNKNOWN_PROFILE"; message: string; profile: string };

// ─────────────────────────────────────────────────────────────────────────────
// Recenter
// ─────────────────────────────────────────────────────────────────────────────

export interface RecenterConfig {
  priceDeviationPct: number;
  timeBasedHours: number;
  oneSideHours: number;
  pumpDumpPct: number;
  minHistorySamples: number;
  oneSideUpperFraction: number;
  oneSideLowerFraction: number;
  pumpDumpWindowHours: number;
}

/**
 * Reason codes for recenter triggers, in evaluation priority order.
 */
export type RecenterTrigger =
  | "NO_ACTIVE_ORDERS"
  | "PRICE_ABOVE_BAND"
  | "PRICE_BELOW_BAND"
  | "TIME_ELAPSED"
  | "ONE_SIDED_ABOVE"
  | "ONE_SIDED_BELOW"
  | "PUMP_DUMP";

export interface ActiveOrderPrice {
  side: Side;
  price: number;
}

export type RecenterDecision =
  | { shouldRecenter: false }
  | {
      shouldRecenter: true;
      trigger: RecenterTrigger;
      reason: string;
      /** Ratio behind the trigger (band margin, fraction above center, range) */
      metric?: number;
    };

// ─────────────────────────────────────────────────────────────────────────────
// Risk
// ─────────────────────────────────────────────────────────────────────────────

export interface RiskLimits {
  maxExposurePct: number;
  killSwitchDrawdownPct: number;
  maxPositionSizePct: number;
}

/**
 * Kill-switch latch + equity tracking.
 *
 * dailyMaxEquity resets once per UTC day and only increases within a day.
 */
export interface RiskState {
  killSwitchActive: boolean;
  killSwitchReason: string;
  dailyMaxEquity: number;
  lastEquityCheckMs: Ms | null;
  currentExposure: number;
  totalEquity: number;
}

export interface PositionExposure {
  size: number;
  markPrice: number;
}

export interface BestQuotes {
  bestBid: number;
  bestAsk: number;
}

export interface RiskMetrics {
  killSwitchActive: boolean;
  killSwitchReason: string;
  totalEquity: number;
  dailyMaxEquity: number;
  currentExposure: number;
  exposurePct: number;
  maxExposurePct: number;
  currentDrawdownPct: number;
  killSwitchThresholdPct: number;
  availableForTrading: number;
  withinLimits: boolean;
}
