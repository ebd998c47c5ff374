/**
 * Fill Monitor - One polling iteration over recent executions
 *
 * - Each execution is handled once: in-memory execId window + unique exec_id in the store
 * - Persists the trade, marks the order Filled, drops it from the engine's tracking
 * - Optionally places a post-only take-profit on the opposite side
 */

import type { Execution, ExchangeGateway } from "@grid-bot/adapters";
import { calculateTakeProfit, formatPrice, formatQuantity, makerFallbackPrice, type GridProfile } from "@grid-bot/core";
import type { StateStore } from "@grid-bot/repositories";
import { logger, type IterationOutcome } from "@grid-bot/utils";

import type { GridBotConfig } from "../config";
import type { Clock } from "../services/clock";
import type { GridEngine } from "../services/grid-engine";
import type { RiskController } from "../services/risk-controller";

/**
 * Insertion-ordered set of execIds; the oldest ids fall out past `capacity`.
 */
export class SeenExecutions {
  private readonly ids = new Set<string>();

  constructor(private readonly capacity: number) {}

  has(execId: string): boolean {
    return this.ids.has(execId);
  }

  add(execId: string): void {
    this.ids.add(execId);
    if (this.ids.size <= this.capacity) return;
    const oldest = this.ids.values().next();
    if (!oldest.done) this.ids.delete(oldest.value);
  }

  get size(): number {
    return this.ids.size;
  }
}

export interface FillMonitorDeps {
  gateway: ExchangeGateway;
  store: Pick<StateStore, "saveTrade" | "updateOrderStatus" | "saveOrder">;
  engine: GridEngine;
  risk: RiskController;
  config: GridBotConfig;
  seen: SeenExecutions;
  activeProfile: () => GridProfile;
  now: Clock;
}

// ─────────────────────────────────────────────────────────────────────────────
// Take profit
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Opposite-side post-only order `profitTarget` away from the fill.
 * Pulled just behind the touch when it would cross; skipped when it fails the
 * size gate, falls under the minimum notional or the kill switch is active.
 */
export async function placeTakeProfit(deps: FillMonitorDeps, fill: Execution): Promise<boolean> {
  const { engine, risk, gateway, store, config, now } = deps;
  const instrument = engine.getInstrument();
  if (!instrument) {
    logger.warn("Take profit skipped: instrument spec not loaded");
    return false;
  }

  const target = calculateTakeProfit(fill.side, fill.price, deps.activeProfile().profitTarget);
  const qty = formatQuantity(fill.qty, instrument.qtyStep);
  let price = Number(formatPrice(target.price, instrument.tickSize));

  const notional = Number(qty) * price;
  if (notional < instrument.minNotional) {
    logger.warn("Take profit skipped: notional below minimum", { notional, minNotional: instrument.minNotional });
    return false;
  }

  const maker = await risk.checkOrderAsMaker(target.side, price);
  if (maker.isErr()) {
    logger.warn("Maker check unavailable, relying on post-only", { error: maker.error.message });
  } else if (!maker.value) {
    const ticker = await gateway.getTicker(instrument.symbol);
    if (ticker.isErr()) {
      logger.warn("Take profit skipped: no quotes to re-price", { error: ticker.error.message });
      return false;
    }
    price = Number(formatPrice(makerFallbackPrice(target.side, ticker.value), instrument.tickSize));
    logger.info("Adjusted take profit price", { side: target.side, price });
  }

  const sized = await risk.validateOrderSize(Number(qty), price);
  if (sized.isErr() || !sized.value) {
    logger.warn("Take profit skipped: order size check failed", { qty, price });
    return false;
  }

  // The checks above await the venue; the risk loop may have tripped meanwhile.
  if (risk.killSwitchActive) {
    logger.warn("Take profit skipped: kill switch active");
    return false;
  }

  const placed = await gateway.placePostOnlyOrder({
    symbol: instrument.symbol,
    side: target.side,
    price: formatPrice(price, instrument.tickSize),
    qty,
    orderLinkId: `tp-${fill.execId.slice(0, 12)}-${now().toString(36)}`,
  });
  if (placed.isErr()) {
    logger.error("Failed to place take profit", { error: placed.error.message });
    return false;
  }

  logger.info("Take profit placed", { side: target.side, qty, price });
  const saved = await store.saveOrder({
    orderId: placed.value.orderId,
    orderLinkId: placed.value.orderLinkId,
    symbol: instrument.symbol,
    side: target.side,
    price,
    qty: Number(qty),
    orderType: "take_profit",
    status: "New",
    gridLevel: null,
    createdAt: new Date(now()),
  });
  if (saved.isErr()) {
    logger.warn("Failed to persist take profit order", { error: saved.error.message });
  }
  return true;
}

// ─────────────────────────────────────────────────────────────────────────────
// Iteration
// ─────────────────────────────────────────────────────────────────────────────

async function handleExecution(deps: FillMonitorDeps, execution: Execution): Promise<void> {
  const { store, engine, config, seen } = deps;

  const level = engine.getTrackedLevel(execution.orderId);
  const saved = await store.saveTrade({
    execId: execution.execId,
    orderId: execution.orderId,
    symbol: execution.symbol,
    side: execution.side,
    price: execution.price,
    qty: execution.qty,
    fee: execution.fee,
    feeCurrency: config.trading.settleCoin,
    isMaker: execution.isMaker,
    gridLevel: level?.levelIndex ?? null,
    executedAt: execution.execTime,
  });
  if (saved.isErr()) {
    // Not marked seen: the next poll retries it.
    logger.error("Failed to persist trade", { execId: execution.execId, error: saved.error.message });
    return;
  }
  seen.add(execution.execId);
  if (!saved.value.inserted) return;

  logger.info("Order filled", { side: execution.side, qty: execution.qty, price: execution.price });

  const updated = await store.updateOrderStatus(execution.orderId, "Filled", execution.execTime);
  if (updated.isErr()) {
    logger.warn("Failed to mark order filled", { orderId: execution.orderId, error: updated.error.message });
  }
  engine.onOrderFilled(execution.orderId);

  if (config.takeProfit.enabled) {
    await placeTakeProfit(deps, execution);
  }
}

export async function runFillMonitorIteration(deps: FillMonitorDeps): Promise<IterationOutcome> {
  const { monitoring, trading } = deps.config;
  if (deps.risk.killSwitchActive) return { nextDelayMs: monitoring.killSwitchIdleMs };

  const executions = await deps.gateway.getRecentExecutions(trading.symbol, monitoring.executionFetchLimit);
  if (executions.isErr()) {
    logger.warn("Could not fetch executions", { error: executions.error.message });
    return { nextDelayMs: monitoring.fillErrorBackoffMs };
  }

  // Newest first from the venue; process in the order they happened.
  const fresh = executions.value.filter(e => !deps.seen.has(e.execId)).reverse();
  for (const execution of fresh) {
    await handleExecution(deps, execution);
  }

  return { nextDelayMs: monitoring.fillPollIntervalMs };
}
