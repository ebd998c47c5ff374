/**
 * Grid Engine - Owns the live ladder for one symbol
 *
 * - Center price, levels, orders we placed, last recenter time, price history
 * - Setup: fresh price → levels → cancel → settle → place post-only → persist
 * - Recenter computes the replacement ladder before touching resting orders
 * - `canPlace` is consulted before every placement; once it turns false the
 *   ladder stops and whatever it already placed is cancelled
 *
 * The pure math lives in @grid-bot/core; this class sequences the I/O around it.
 */

import { err, ok, type Result } from "neverthrow";
import type { ExchangeGateway, GatewayError } from "@grid-bot/adapters";
import {
  calculateGridLevels,
  calculateGridSpacing,
  calculateVolatility,
  evaluateRecenter,
  formatPrice,
  formatQuantity,
  PriceHistory,
  type GridCalculationError,
  type GridLevel,
  type GridLevels,
  type GridProfile,
  type InstrumentSpec,
  type Ms,
  type RecenterDecision,
} from "@grid-bot/core";
import type { StateStore } from "@grid-bot/repositories";
import { logger, sleep as defaultSleep, type Sleep } from "@grid-bot/utils";

import { toRecenterConfig, toSpacingConfig, type GridBotConfig } from "../config";
import { recordEvent } from "./bot-events";
import { systemClock, type Clock } from "./clock";
import type { InstrumentSpecResolver } from "./instrument-spec-resolver";

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type GridEngineStore = Pick<StateStore, "saveOrder" | "saveGridHistory" | "getLatestGrid" | "logEvent">;

export type GridEngineError =
  | GridCalculationError
  | { type: "GATEWAY_ERROR"; operation: string; message: string; cause: GatewayError }
  | { type: "NOT_INITIALIZED"; message: string }
  | { type: "RECENTER_IN_PROGRESS"; message: string }
  | { type: "NO_ORDERS_PLACED"; message: string }
  | { type: "PLACEMENT_HALTED"; message: string };

export interface GridEngineDeps {
  gateway: ExchangeGateway;
  store: GridEngineStore;
  instruments: InstrumentSpecResolver;
  config: GridBotConfig;
  now?: Clock;
  sleep?: Sleep;
  /** Placement gate, e.g. "kill switch not active". Defaults to always open. */
  canPlace?: () => boolean;
}

export interface GridSetupSummary {
  centerPrice: number;
  placedBuys: number;
  placedSells: number;
  spacing: number;
}

export interface GridStats {
  centerPrice: number | null;
  numBuyLevels: number;
  numSellLevels: number;
  lowestBuy: number | null;
  highestSell: number | null;
  totalActiveOrders: number;
  lastRecenterAt: Date | null;
}

const gatewayError = (operation: string, cause: GatewayError): GridEngineError => ({
  type: "GATEWAY_ERROR",
  operation,
  message: `${operation} failed: ${cause.message}`,
  cause,
});

// ─────────────────────────────────────────────────────────────────────────────
// Engine
// ─────────────────────────────────────────────────────────────────────────────

export class GridEngine {
  private readonly gateway: ExchangeGateway;
  private readonly store: GridEngineStore;
  private readonly instruments: InstrumentSpecResolver;
  private readonly config: GridBotConfig;
  private readonly now: Clock;
  private readonly sleep: Sleep;
  private readonly canPlace: () => boolean;
  private readonly symbol: string;

  private instrument: InstrumentSpec | null = null;
  private centerPrice: number | null = null;
  private levels: GridLevels | null = null;
  private readonly activeOrders = new Map<string, GridLevel>();
  private lastRecenterMs: Ms | null = null;
  private readonly history: PriceHistory;
  private recenterRun: Promise<unknown> | null = null;
  private orderSeq = 0;

  constructor(deps: GridEngineDeps) {
    this.gateway = deps.gateway;
    this.store = deps.store;
    this.instruments = deps.instruments;
    this.config = deps.config;
    this.now = deps.now ?? systemClock;
    this.sleep = deps.sleep ?? defaultSleep;
    this.canPlace = deps.canPlace ?? (() => true);
    this.symbol = deps.config.trading.symbol;
    this.history = new PriceHistory(deps.config.grid.maxHistoryPoints);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Load a fresh instrument spec and restore the last known center.
   * The increments are fixed until the next initialize.
   */
  async initialize(): Promise<Result<InstrumentSpec, GridEngineError>> {
    const spec = await this.instruments.refresh(this.symbol);
    if (spec.isErr()) return err(gatewayError("getInstrumentInfo", spec.error));
    this.instrument = spec.value;

    const latest = await this.store.getLatestGrid(this.symbol);
    if (latest.isErr()) {
      logger.warn("Could not load previous grid", { error: latest.error.message });
    } else if (latest.value) {
      this.centerPrice = latest.value.centerPrice;
      logger.info("Restored grid center", {
        centerPrice: latest.value.centerPrice,
        savedAt: latest.value.ts.toISOString(),
      });
    }

    return ok(spec.value);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Market data
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Mark price (last trade when the venue sends none). Positive prices feed the history.
   */
  async getCurrentPrice(): Promise<Result<number, GridEngineError>> {
    const ticker = await this.gateway.getTicker(this.symbol);
    if (ticker.isErr()) return err(gatewayError("getTicker", ticker.error));

    const price = ticker.value.markPrice > 0 ? ticker.value.markPrice : ticker.value.lastPrice;
    if (price > 0) this.history.push(price, this.now());
    return ok(price);
  }

  getGridSpacing(profile: GridProfile): number {
    const reference = this.centerPrice ?? this.history.latest()?.price ?? 0;
    return calculateGridSpacing(profile, this.history.toArray(), reference, toSpacingConfig(this.config));
  }

  calculateVolatility(period: number = this.config.grid.volatilityPeriod): number {
    return calculateVolatility(this.history.toArray(), period);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Ladder
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Configured capital; a smaller wallet balance is reported but not applied.
   */
  private async resolveCapital(): Promise<number> {
    const capital = this.config.trading.initialCapital;
    const balance = await this.gateway.getWalletBalance(this.config.trading.settleCoin);
    if (balance.isErr()) {
      logger.warn("Wallet balance unavailable, using configured capital", { capital, error: balance.error.message });
    } else if (balance.value.availableBalance < capital) {
      logger.warn("Available balance below configured capital", {
        available: balance.value.availableBalance,
        capital,
      });
    }
    return capital;
  }

  private async computeLadder(
    profile: GridProfile,
  ): Promise<Result<{ centerPrice: number; levels: GridLevels }, GridEngineError>> {
    const instrument = this.instrument;
    if (!instrument) return err({ type: "NOT_INITIALIZED", message: "Instrument spec not loaded" });

    const price = await this.getCurrentPrice();
    if (price.isErr()) return err(price.error);

    const capital = await this.resolveCapital();
    return calculateGridLevels({
      centerPrice: price.value,
      profile,
      availableCapital: capital,
      instrument,
      history: this.history.toArray(),
      spacingConfig: toSpacingConfig(this.config),
      minNotionalBuffer: this.config.grid.minNotionalBuffer,
    }).map(levels => ({ centerPrice: price.value, levels }));
  }

  private nextOrderLinkId(level: GridLevel): string {
    this.orderSeq += 1;
    const side = level.side === "buy" ? "b" : "s";
    return `grid-${side}${Math.abs(level.levelIndex)}-${this.now().toString(36)}-${this.orderSeq}`;
  }

  private async placeLevel(instrument: InstrumentSpec, level: GridLevel): Promise<boolean> {
    const placed = await this.gateway.placePostOnlyOrder({
      symbol: this.symbol,
      side: level.side,
      price: formatPrice(level.price, instrument.tickSize),
      qty: formatQuantity(level.quantity, instrument.qtyStep),
      orderLinkId: this.nextOrderLinkId(level),
    });
    if (placed.isErr()) {
      logger.error("Grid order rejected", { level: level.levelIndex, price: level.price, error: placed.error.message });
      return false;
    }

    this.activeOrders.set(placed.value.orderId, level);
    logger.info("Grid order placed", {
      side: level.side,
      level: level.levelIndex,
      price: level.price,
      qty: level.quantity,
    });

    const saved = await this.store.saveOrder({
      orderId: placed.value.orderId,
      orderLinkId: placed.value.orderLinkId,
      symbol: this.symbol,
      side: level.side,
      price: level.price,
      qty: level.quantity,
      orderType: "grid",
      status: "New",
      gridLevel: level.levelIndex,
      createdAt: new Date(this.now()),
    });
    if (saved.isErr()) {
      logger.warn("Failed to persist grid order", { orderId: placed.value.orderId, error: saved.error.message });
    }
    return true;
  }

  private async placeLadder(
    centerPrice: number,
    levels: GridLevels,
    reason: string,
  ): Promise<Result<GridSetupSummary, GridEngineError>> {
    const instrument = this.instrument;
    if (!instrument) return err({ type: "NOT_INITIALIZED", message: "Instrument spec not loaded" });

    let placedBuys = 0;
    let placedSells = 0;
    const all = [...levels.buyLevels, ...levels.sellLevels];
    for (const [i, level] of all.entries()) {
      if (i > 0) await this.sleep(this.config.grid.orderPlacementDelayMs);
      if (!this.canPlace()) return this.haltPlacement(placedBuys + placedSells, reason);
      if (await this.placeLevel(instrument, level)) {
        if (level.side === "buy") placedBuys += 1;
        else placedSells += 1;
      }
    }

    this.centerPrice = centerPrice;
    this.levels = levels;

    logger.info("Grid setup complete", { centerPrice, placedBuys, placedSells, reason });

    const lowestBuy = levels.buyLevels.at(-1)?.price ?? null;
    const highestSell = levels.sellLevels.at(-1)?.price ?? null;
    const saved = await this.store.saveGridHistory({
      ts: new Date(this.now()),
      symbol: this.symbol,
      centerPrice,
      lowestBuy,
      highestSell,
      numBuyLevels: levels.buyLevels.length,
      numSellLevels: levels.sellLevels.length,
      gridSpacing: levels.spacing,
      reason,
    });
    if (saved.isErr()) {
      logger.warn("Failed to persist grid history", { error: saved.error.message });
    }

    if (placedBuys + placedSells === 0) {
      await recordEvent(this.store, this.now, {
        eventType: "error",
        severity: "ERROR",
        message: "Grid setup placed no orders",
        details: { centerPrice, reason },
      });
      return err({ type: "NO_ORDERS_PLACED", message: "Every grid order was rejected" });
    }

    await recordEvent(this.store, this.now, {
      eventType: "grid_setup",
      severity: "INFO",
      message: `Grid initialized with ${placedBuys} BUY + ${placedSells} SELL levels`,
      details: { centerPrice, spacing: levels.spacing, reason },
    });

    this.lastRecenterMs = this.now();
    return ok({ centerPrice, placedBuys, placedSells, spacing: levels.spacing });
  }

  /**
   * Placement gate closed mid-ladder: pull what this run placed and report it.
   * The kill switch's own cancel may have raced an order still in flight.
   */
  private async haltPlacement(placed: number, reason: string): Promise<Result<GridSetupSummary, GridEngineError>> {
    logger.warn("Order placement halted", { placed, reason });
    if (placed > 0) {
      const cancelled = await this.cancelAll();
      if (cancelled.isErr()) {
        logger.error("Failed to cancel partial ladder", { error: cancelled.error.message });
      }
    }
    return err({ type: "PLACEMENT_HALTED", message: `Order placement halted after ${placed} order(s)` });
  }

  /**
   * Build a fresh ladder around the current price.
   *
   * Existing orders are cancelled only once the new ladder is computed.
   * Succeeds when at least one order rests.
   */
  async setupGrid(profile: GridProfile, reason: string): Promise<Result<GridSetupSummary, GridEngineError>> {
    if (!this.canPlace()) return this.haltPlacement(0, reason);

    const ladder = await this.computeLadder(profile);
    if (ladder.isErr()) {
      logger.error("Grid calculation failed, keeping existing orders", {
        type: ladder.error.type,
        error: ladder.error.message,
      });
      return err(ladder.error);
    }

    const cancelled = await this.cancelAll();
    if (cancelled.isErr()) return err(cancelled.error);
    await this.sleep(this.config.grid.settleDelayMs);

    return this.placeLadder(ladder.value.centerPrice, ladder.value.levels, reason);
  }

  /**
   * Cancel every resting order on the symbol and forget the ones we tracked.
   */
  async cancelAll(): Promise<Result<number, GridEngineError>> {
    const cancelled = await this.gateway.cancelAllOrders(this.symbol);
    if (cancelled.isErr()) return err(gatewayError("cancelAllOrders", cancelled.error));
    this.activeOrders.clear();
    return ok(cancelled.value);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Recenter
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Decide from live open orders (not the tracked map) whether to rebuild.
   */
  async shouldRecenter(): Promise<Result<RecenterDecision, GridEngineError>> {
    const price = await this.getCurrentPrice();
    if (price.isErr()) return err(price.error);

    const openOrders = await this.gateway.getOpenOrders(this.symbol);
    if (openOrders.isErr()) return err(gatewayError("getOpenOrders", openOrders.error));

    return ok(
      evaluateRecenter({
        nowMs: this.now(),
        currentPrice: price.value,
        centerPrice: this.centerPrice,
        activeOrders: openOrders.value.map(o => ({ side: o.side, price: o.price })),
        lastRecenterMs: this.lastRecenterMs,
        history: this.history.toArray(),
        config: toRecenterConfig(this.config),
      }),
    );
  }

  /**
   * Refused while another recenter is in flight.
   */
  async recenterGrid(reason: string, profile: GridProfile): Promise<Result<GridSetupSummary, GridEngineError>> {
    if (this.recenterRun) {
      return err({ type: "RECENTER_IN_PROGRESS", message: "A recenter is already running" });
    }
    const run = this.runRecenter(reason, profile);
    this.recenterRun = run;
    try {
      return await run;
    } finally {
      this.recenterRun = null;
    }
  }

  private async runRecenter(reason: string, profile: GridProfile): Promise<Result<GridSetupSummary, GridEngineError>> {
    logger.info("Recentering grid", { reason });
    await recordEvent(this.store, this.now, {
      eventType: "recenter",
      severity: "INFO",
      message: `Grid recenter triggered: ${reason}`,
      details: { oldCenter: this.centerPrice },
    });

    const result = await this.setupGrid(profile, reason);
    if (result.isErr()) {
      await recordEvent(this.store, this.now, {
        eventType: "recenter_failed",
        severity: "ERROR",
        message: `Grid recenter failed: ${result.error.message}`,
        details: { reason, errorType: result.error.type },
      });
      return result;
    }

    logger.info("Grid recentered", { centerPrice: result.value.centerPrice });
    return result;
  }

  /**
   * Resolves once no recenter is in flight.
   */
  async waitForRecenter(): Promise<void> {
    if (this.recenterRun) await this.recenterRun;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Fills / stats
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Drop a filled order from tracking. Returns its level when it was ours.
   */
  onOrderFilled(orderId: string): GridLevel | undefined {
    const level = this.activeOrders.get(orderId);
    this.activeOrders.delete(orderId);
    return level;
  }

  getTrackedLevel(orderId: string): GridLevel | undefined {
    return this.activeOrders.get(orderId);
  }

  getInstrument(): InstrumentSpec | null {
    return this.instrument;
  }

  getGridStats(): GridStats {
    return {
      centerPrice: this.centerPrice,
      numBuyLevels: this.levels?.buyLevels.length ?? 0,
      numSellLevels: this.levels?.sellLevels.length ?? 0,
      lowestBuy: this.levels?.buyLevels.at(-1)?.price ?? null,
      highestSell: this.levels?.sellLevels.at(-1)?.price ?? null,
      totalActiveOrders: this.activeOrders.size,
      lastRecenterAt: this.lastRecenterMs === null ? null : new Date(this.lastRecenterMs),
    };
  }
}
