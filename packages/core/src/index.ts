/**
 * @grid-bot/core
 *
 * Pure grid strategy and risk policy. No I/O.
 */

export * from "./types";
export { floorToIncrement, formatPrice, formatQuantity } from "./price-format";
export { PriceHistory } from "./price-history";
export { calculateGridLevels, calculateGridSpacing, calculateVolatility } from "./grid-calculator";
export type { GridCalculationInput } from "./grid-calculator";
export { evaluateRecenter } from "./recenter-policy";
export type { RecenterInput } from "./recenter-policy";
export {
  activateKillSwitch,
  buildRiskMetrics,
  calculateDrawdown,
  calculateExposure,
  calculateFundingImpact,
  checkExposure,
  createInitialRiskState,
  deactivateKillSwitch,
  evaluateKillSwitch,
  FUNDING_RATE_ESTIMATE,
  FUNDING_SETTLEMENTS_PER_DAY,
  isMakerPrice,
  isOrderSizeWithinLimit,
  isSameUtcDay,
  updateEquity,
} from "./risk-policy";
export type { KillSwitchEvaluation } from "./risk-policy";
export { calculateTakeProfit, makerFallbackPrice } from "./take-profit";
export type { TakeProfitOrder } from "./take-profit";
export { resolveProfile } from "./profiles";
export { summarizePeriod } from "./pnl-summary";
export type { PeriodSummary, SummaryFill } from "./pnl-summary";
