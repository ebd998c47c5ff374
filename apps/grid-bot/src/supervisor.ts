/**
 * Grid Bot Supervisor
 *
 * Owns the bot lifecycle: the running flag, the active profile and the four
 * polling loops (fills, grid, risk, snapshots). All loops share the single
 * GridEngine and RiskController handed in here.
 */

import { err, ok, type Result } from "neverthrow";
import type { ExchangeGateway } from "@grid-bot/adapters";
import { resolveProfile, type GridProfile, type ProfileError, type RiskMetrics } from "@grid-bot/core";
import type { RepositoryError, StateStore } from "@grid-bot/repositories";
import { createInterruptibleSleep, logger, runPollingLoop, type RunningFlag, type Sleep } from "@grid-bot/utils";

import type { GridBotConfig } from "./config";
import { systemClock, type Clock } from "./services/clock";
import type { GridEngine, GridEngineError, GridStats } from "./services/grid-engine";
import type { RiskController, RiskControllerError } from "./services/risk-controller";
import {
  runFillMonitorIteration,
  runGridMonitorIteration,
  runRiskMonitorIteration,
  runSnapshotIteration,
  SeenExecutions,
} from "./usecases";

/**
 * execIds remembered in memory; older ones are caught by the store's unique key
 */
const SEEN_EXECUTIONS_CAPACITY = 1_000;

const DAY_MS = 86_400_000;

export type SupervisorError =
  | GridEngineError
  | ProfileError
  | RiskControllerError
  | RepositoryError
  | { type: "ALREADY_RUNNING"; message: string }
  | { type: "KILL_SWITCH_ACTIVE"; message: string };

export interface SupervisorDeps {
  gateway: ExchangeGateway;
  store: StateStore;
  engine: GridEngine;
  risk: RiskController;
  config: GridBotConfig;
  now?: Clock;
  sleep?: Sleep;
}

export interface BotStatus {
  running: boolean;
  profile: string;
  symbol: string;
  balance: { available: number; equity: number };
  openPositions: number;
  grid: GridStats;
  risk: RiskMetrics;
  trades24h: number;
  timestamp: Date;
}

export class GridBotSupervisor implements RunningFlag {
  private readonly gateway: ExchangeGateway;
  private readonly store: StateStore;
  private readonly engine: GridEngine;
  private readonly risk: RiskController;
  private readonly config: GridBotConfig;
  private readonly now: Clock;
  private readonly sleep: Sleep;
  private readonly wakeLoops: () => void;
  private readonly seen = new SeenExecutions(SEEN_EXECUTIONS_CAPACITY);

  private running = false;
  private profileName: string;
  private profile: GridProfile;
  private loops: Promise<void> | null = null;

  constructor(deps: SupervisorDeps) {
    this.gateway = deps.gateway;
    this.store = deps.store;
    this.engine = deps.engine;
    this.risk = deps.risk;
    this.config = deps.config;
    this.now = deps.now ?? systemClock;
    const interruptible = createInterruptibleSleep();
    this.sleep = deps.sleep ?? interruptible.sleep;
    this.wakeLoops = interruptible.wakeAll;
    this.profileName = deps.config.grid.defaultProfile;
    this.profile = deps.config.grid.profiles[deps.config.grid.defaultProfile];
  }

  isRunning(): boolean {
    return this.running;
  }

  get activeProfileName(): string {
    return this.profileName;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Load the instrument spec, then restore the stored profile or persist the default.
   * Fails when the store cannot be read.
   */
  async initialize(): Promise<Result<void, SupervisorError>> {
    const engineReady = await this.engine.initialize();
    if (engineReady.isErr()) return err(engineReady.error);

    const stored = await this.store.getActiveConfig();
    if (stored.isErr()) return err(stored.error);

    if (stored.value === null) {
      await this.saveCurrentConfig();
      return ok(undefined);
    }

    const restored = resolveProfile(this.config.grid.profiles, stored.value.profileName);
    if (restored.isErr()) {
      logger.warn("Stored profile no longer configured, using default", { profile: stored.value.profileName });
      return ok(undefined);
    }
    this.profileName = stored.value.profileName;
    this.profile = restored.value;
    logger.info("Loaded active profile", { profile: this.profileName });
    return ok(undefined);
  }

  private async saveCurrentConfig(): Promise<void> {
    const saved = await this.store.saveConfig({
      profileName: this.profileName,
      symbol: this.config.trading.symbol,
      gridSpacing: this.profile.gridSpacing,
      targetLevels: this.profile.targetLevels,
      profitTarget: this.profile.profitTarget,
      maxExposurePct: this.config.risk.maxExposurePct,
      leverage: this.config.trading.leverage,
    });
    if (saved.isErr()) {
      logger.warn("Failed to persist active config", { error: saved.error.message });
    }
  }

  /**
   * Place the initial ladder and launch the loops. Resolves once they are running;
   * use waitForLoops() to block until they exit.
   */
  async start(): Promise<Result<void, SupervisorError>> {
    if (this.running) return err({ type: "ALREADY_RUNNING", message: "Bot is already running" });
    if (this.risk.killSwitchActive) {
      return err({ type: "KILL_SWITCH_ACTIVE", message: "Cannot start: kill switch is active" });
    }

    logger.info("Setting up grid", { profile: this.profileName });
    const setup = await this.engine.setupGrid(this.profile, `Initial setup with ${this.profileName} profile`);
    if (setup.isErr()) return err(setup.error);

    this.running = true;
    logger.info("Trading started");
    this.loops = this.runLoops();
    return ok(undefined);
  }

  private async runLoops(): Promise<void> {
    const { monitoring } = this.config;
    const activeProfile = (): GridProfile => this.profile;

    await Promise.all([
      runPollingLoop({
        name: "fill monitor",
        running: this,
        errorBackoffMs: monitoring.fillErrorBackoffMs,
        sleep: this.sleep,
        runOnce: () =>
          runFillMonitorIteration({
            gateway: this.gateway,
            store: this.store,
            engine: this.engine,
            risk: this.risk,
            config: this.config,
            seen: this.seen,
            activeProfile,
            now: this.now,
          }),
      }),
      runPollingLoop({
        name: "grid monitor",
        running: this,
        errorBackoffMs: monitoring.gridErrorBackoffMs,
        sleep: this.sleep,
        runOnce: () =>
          runGridMonitorIteration({
            engine: this.engine,
            risk: this.risk,
            config: this.config,
            running: this,
            activeProfile,
          }),
      }),
      runPollingLoop({
        name: "risk monitor",
        running: this,
        errorBackoffMs: monitoring.riskErrorBackoffMs,
        sleep: this.sleep,
        runOnce: () =>
          runRiskMonitorIteration({
            risk: this.risk,
            config: this.config,
            running: this,
            stopTrading: () => this.stop(),
          }),
      }),
      runPollingLoop({
        name: "snapshot loop",
        running: this,
        errorBackoffMs: monitoring.snapshotErrorBackoffMs,
        sleep: this.sleep,
        runOnce: () =>
          runSnapshotIteration({ gateway: this.gateway, store: this.store, config: this.config, now: this.now }),
      }),
    ]);
  }

  /**
   * Resolves when every loop has exited (immediately when never started).
   */
  async waitForLoops(): Promise<void> {
    if (this.loops) await this.loops;
  }

  /**
   * Clear the running flag and cancel every resting order once any recenter
   * in flight has finished. Loops finish their current iteration and exit.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    logger.info("Stopping trading");
    this.running = false;
    this.wakeLoops();

    // A recenter in flight would place orders after our cancel.
    await this.engine.waitForRecenter();
    const cancelled = await this.engine.cancelAll();
    if (cancelled.isErr()) {
      logger.error("Failed to cancel orders on stop", { error: cancelled.error.message });
      return;
    }
    logger.info("Trading stopped", { cancelledOrders: cancelled.value });
  }

  async shutdown(): Promise<void> {
    logger.info("Shutting down");
    await this.stop();
    await this.waitForLoops();
    await this.store.close();
    logger.info("Shutdown complete");
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Operator actions
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Unknown names are rejected before anything changes.
   */
  async changeProfile(name: string): Promise<Result<GridProfile, SupervisorError>> {
    const resolved = resolveProfile(this.config.grid.profiles, name);
    if (resolved.isErr()) return err(resolved.error);

    logger.info("Changing profile", { from: this.profileName, to: name });
    this.profileName = name;
    this.profile = resolved.value;
    await this.saveCurrentConfig();

    if (this.running) {
      const recentered = await this.engine.recenterGrid(`Profile changed to ${name}`, resolved.value);
      if (recentered.isErr()) return err(recentered.error);
    }
    return ok(resolved.value);
  }

  deactivateKillSwitch(): Promise<Result<boolean, RiskControllerError>> {
    return this.risk.deactivateKillSwitch();
  }

  async getStatus(): Promise<Result<BotStatus, SupervisorError>> {
    const { trading } = this.config;

    const wallet = await this.gateway.getWalletBalance(trading.settleCoin);
    if (wallet.isErr()) {
      return err({
        type: "GATEWAY_ERROR",
        operation: "getWalletBalance",
        message: wallet.error.message,
        cause: wallet.error,
      });
    }

    const positions = await this.gateway.getPositions(trading.symbol);
    if (positions.isErr()) {
      return err({ type: "GATEWAY_ERROR", operation: "getPositions", message: positions.error.message, cause: positions.error });
    }

    const trades = await this.store.getTradesSince(new Date(this.now() - DAY_MS));
    if (trades.isErr()) return err(trades.error);

    return ok({
      running: this.running,
      profile: this.profileName,
      symbol: trading.symbol,
      balance: { available: wallet.value.availableBalance, equity: wallet.value.totalEquity },
      openPositions: positions.value.filter(p => p.size > 0).length,
      grid: this.engine.getGridStats(),
      risk: this.risk.getRiskMetrics(),
      trades24h: trades.value.length,
      timestamp: new Date(this.now()),
    });
  }
}
