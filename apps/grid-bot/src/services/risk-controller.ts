/**
 * Risk Controller - Kill switch, exposure and order gates
 *
 * - Kill switch: Normal → Triggered on daily drawdown, back only via deactivateKillSwitch()
 * - Triggering cancels every resting order and records a CRITICAL event
 * - Exposure / maker / order-size gates answer with a boolean and never touch the kill switch
 *
 * State transitions are decided by the pure policy in @grid-bot/core.
 */

import { err, ok, type Result } from "neverthrow";
import type { ExchangeGateway, GatewayError } from "@grid-bot/adapters";
import {
  activateKillSwitch,
  buildRiskMetrics,
  calculateDrawdown,
  calculateExposure,
  calculateFundingImpact,
  checkExposure,
  createInitialRiskState,
  deactivateKillSwitch,
  evaluateKillSwitch,
  isMakerPrice,
  isOrderSizeWithinLimit,
  isSameUtcDay,
  updateEquity,
  type PositionExposure,
  type RiskLimits,
  type RiskMetrics,
  type RiskState,
  type Side,
} from "@grid-bot/core";
import type { BotEventRepository } from "@grid-bot/repositories";
import { logger } from "@grid-bot/utils";

import { toRiskLimits, type GridBotConfig } from "../config";
import { recordEvent } from "./bot-events";
import { systemClock, type Clock } from "./clock";

export type RiskControllerError = { type: "GATEWAY_ERROR"; operation: string; message: string; cause: GatewayError };

export interface RiskControllerDeps {
  gateway: ExchangeGateway;
  store: Pick<BotEventRepository, "logEvent">;
  config: GridBotConfig;
  now?: Clock;
}

export interface SafetyStatus {
  safeToTrade: boolean;
  killSwitchActive: boolean;
  killSwitchReason: string;
  exposureOk: boolean;
  lastCheckAt: Date | null;
}

const gatewayError = (operation: string, cause: GatewayError): RiskControllerError => ({
  type: "GATEWAY_ERROR",
  operation,
  message: `${operation} failed: ${cause.message}`,
  cause,
});

const toExposure = (positions: readonly { size: number; markPrice: number }[]): PositionExposure[] =>
  positions.filter(p => p.size > 0).map(p => ({ size: p.size, markPrice: p.markPrice }));

export class RiskController {
  private readonly gateway: ExchangeGateway;
  private readonly store: Pick<BotEventRepository, "logEvent">;
  private readonly limits: RiskLimits;
  private readonly symbol: string;
  private readonly settleCoin: string;
  private readonly now: Clock;
  private state: RiskState = createInitialRiskState();

  constructor(deps: RiskControllerDeps) {
    this.gateway = deps.gateway;
    this.store = deps.store;
    this.limits = toRiskLimits(deps.config);
    this.symbol = deps.config.trading.symbol;
    this.settleCoin = deps.config.trading.settleCoin;
    this.now = deps.now ?? systemClock;
  }

  get killSwitchActive(): boolean {
    return this.state.killSwitchActive;
  }

  getState(): Readonly<RiskState> {
    return this.state;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Equity / kill switch
  // ─────────────────────────────────────────────────────────────────────────

  private async fetchEquity(): Promise<Result<number, RiskControllerError>> {
    const wallet = await this.gateway.getWalletBalance(this.settleCoin);
    if (wallet.isErr()) return err(gatewayError("getWalletBalance", wallet.error));
    return ok(wallet.value.totalEquity);
  }

  /**
   * Fold the current equity into the daily max, then trip the kill switch on breach.
   */
  async updateEquityTracking(): Promise<Result<Readonly<RiskState>, RiskControllerError>> {
    const equity = await this.fetchEquity();
    if (equity.isErr()) return err(equity.error);

    const previousCheckMs = this.state.lastEquityCheckMs;
    const nowMs = this.now();
    this.state = updateEquity(this.state, equity.value, nowMs);
    if (previousCheckMs !== null && !isSameUtcDay(previousCheckMs, nowMs)) {
      logger.info("New day - reset daily max equity", { dailyMaxEquity: equity.value });
    }

    const evaluation = evaluateKillSwitch(this.state, this.limits.killSwitchDrawdownPct);
    if (evaluation.shouldTrigger) {
      await this.triggerKillSwitch(evaluation.reason);
    }
    return ok(this.state);
  }

  /**
   * Latch the kill switch. Returns false when it was already active,
   * in which case nothing is cancelled and the first reason is kept.
   */
  async triggerKillSwitch(reason: string): Promise<boolean> {
    const { state, activated } = activateKillSwitch(this.state, reason);
    if (!activated) return false;
    this.state = state;

    logger.critical("KILL SWITCH ACTIVATED", { reason });

    const cancelled = await this.gateway.cancelAllOrders(this.symbol);
    if (cancelled.isErr()) {
      logger.error("Kill switch could not cancel orders", { error: cancelled.error.message });
    } else {
      logger.info("All orders cancelled", { count: cancelled.value });
    }

    await recordEvent(this.store, this.now, {
      eventType: "kill_switch",
      severity: "CRITICAL",
      message: `Kill-switch activated: ${reason}`,
      details: {
        equity: this.state.totalEquity,
        dailyMax: this.state.dailyMaxEquity,
        drawdownPct: calculateDrawdown(this.state.dailyMaxEquity, this.state.totalEquity) * 100,
      },
    });
    return true;
  }

  /**
   * Manual reset. The daily max restarts at the equity observed now.
   * A no-op (and no gateway call) when the switch is not active.
   */
  async deactivateKillSwitch(): Promise<Result<boolean, RiskControllerError>> {
    if (!this.state.killSwitchActive) return ok(false);

    const equity = await this.fetchEquity();
    if (equity.isErr()) return err(equity.error);

    const { state, deactivated } = deactivateKillSwitch(this.state, equity.value);
    this.state = state;
    if (deactivated) {
      logger.warn("Kill switch manually deactivated", { dailyMaxEquity: equity.value });
      await recordEvent(this.store, this.now, {
        eventType: "kill_switch_reset",
        severity: "WARNING",
        message: "Kill-switch manually deactivated",
        details: { equity: equity.value },
      });
    }
    return ok(deactivated);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Gates
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Σ position value / equity against maxExposurePct. A breach is logged
   * and recorded; the kill switch is left alone.
   */
  async checkMaxExposure(): Promise<Result<boolean, RiskControllerError>> {
    const positions = await this.gateway.getPositions(this.symbol);
    if (positions.isErr()) return err(gatewayError("getPositions", positions.error));

    const equity = await this.fetchEquity();
    if (equity.isErr()) return err(equity.error);

    const exposure = calculateExposure(toExposure(positions.value));
    this.state = { ...this.state, currentExposure: exposure, totalEquity: equity.value };

    if (equity.value <= 0) {
      logger.warn("Total equity is 0, cannot check exposure");
      return ok(false);
    }

    const { withinLimit, exposurePct } = checkExposure(exposure, equity.value, this.limits.maxExposurePct);
    if (!withinLimit) {
      logger.warn("Max exposure exceeded", {
        exposurePct: (exposurePct * 100).toFixed(1),
        maxExposurePct: (this.limits.maxExposurePct * 100).toFixed(0),
        exposure,
        equity: equity.value,
      });
      await recordEvent(this.store, this.now, {
        eventType: "max_exposure",
        severity: "WARNING",
        message: `Maximum exposure exceeded: ${(exposurePct * 100).toFixed(1)}%`,
        details: { exposureUsdt: exposure, totalEquity: equity.value, exposurePct: exposurePct * 100 },
      });
    }
    return ok(withinLimit);
  }

  /**
   * False when the limit order would cross the book and pay taker fees.
   */
  async checkOrderAsMaker(side: Side, price: number): Promise<Result<boolean, RiskControllerError>> {
    const ticker = await this.gateway.getTicker(this.symbol);
    if (ticker.isErr()) return err(gatewayError("getTicker", ticker.error));

    const safe = isMakerPrice(side, price, ticker.value);
    if (!safe) {
      logger.warn("Order would cross the spread", {
        side,
        price,
        bestBid: ticker.value.bestBid,
        bestAsk: ticker.value.bestAsk,
      });
    }
    return ok(safe);
  }

  /**
   * Reject orders whose notional exceeds maxPositionSizePct of equity.
   */
  async validateOrderSize(quantity: number, price: number): Promise<Result<boolean, RiskControllerError>> {
    if (this.state.totalEquity <= 0) {
      const equity = await this.fetchEquity();
      if (equity.isErr()) return err(equity.error);
      this.state = { ...this.state, totalEquity: equity.value };
    }

    const within = isOrderSizeWithinLimit(quantity, price, this.state.totalEquity, this.limits.maxPositionSizePct);
    if (!within) {
      logger.warn("Order size exceeds limit", {
        notional: quantity * price,
        equity: this.state.totalEquity,
        maxPositionSizePct: this.limits.maxPositionSizePct,
      });
    }
    return ok(within);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Reporting
  // ─────────────────────────────────────────────────────────────────────────

  getRiskMetrics(): RiskMetrics {
    return buildRiskMetrics(this.state, this.limits);
  }

  getSafetyStatus(): SafetyStatus {
    return {
      safeToTrade: !this.state.killSwitchActive,
      killSwitchActive: this.state.killSwitchActive,
      killSwitchReason: this.state.killSwitchReason,
      exposureOk: this.state.currentExposure <= this.state.totalEquity * this.limits.maxExposurePct,
      lastCheckAt: this.state.lastEquityCheckMs === null ? null : new Date(this.state.lastEquityCheckMs),
    };
  }

  /**
   * Estimated daily funding cost of the open positions
   */
  async calculateFundingImpact(): Promise<Result<number, RiskControllerError>> {
    const positions = await this.gateway.getPositions(this.symbol);
    if (positions.isErr()) return err(gatewayError("getPositions", positions.error));
    return ok(calculateFundingImpact(toExposure(positions.value)));
  }
}
