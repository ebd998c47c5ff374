/**
 * Grid Bot Strategy Configuration
 *
 * - Every recognised option with its default, validated once at load time
 * - Loaded from the JSON file named by GRID_CONFIG_PATH; a missing path means all defaults
 */

import { readFileSync } from "node:fs";

import { err, ok, Result } from "neverthrow";
import { z } from "zod";
import type { RecenterConfig, RiskLimits, SpacingConfig } from "@grid-bot/core";

// ─────────────────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────────────────

export const GridProfileSchema = z.object({
  gridSpacing: z.number().positive(),
  targetLevels: z.number().int().min(1),
  profitTarget: z.number().positive(),
});

const DEFAULT_PROFILES = {
  Conservative: { gridSpacing: 0.01, targetLevels: 3, profitTarget: 0.008 },
  Normal: { gridSpacing: 0.007, targetLevels: 5, profitTarget: 0.005 },
  Aggressive: { gridSpacing: 0.005, targetLevels: 7, profitTarget: 0.004 },
};

const TradingSchema = z.object({
  symbol: z.string().min(1).default("XRPUSDT"),
  category: z.enum(["linear", "inverse"]).default("linear"),
  initialCapital: z.number().positive().default(100),
  leverage: z.number().positive().default(1),
  settleCoin: z.string().min(1).default("USDT"),
});

const GridSchema = z.object({
  profiles: z.record(z.string(), GridProfileSchema).default(DEFAULT_PROFILES),
  defaultProfile: z.string().default("Normal"),
  gridSpacingMax: z.number().positive().default(0.02),
  volatilityPeriod: z.number().int().min(1).default(14),
  volatilityThreshold: z.number().positive().default(0.005),
  volatilityMultiplier: z.number().positive().default(1.2),
  minNotionalBuffer: z.number().min(1).default(1.1),
  maxHistoryPoints: z.number().int().min(1).default(720),
  settleDelayMs: z.number().int().nonnegative().default(2_000),
  orderPlacementDelayMs: z.number().int().nonnegative().default(100),
});

const RecenterSchema = z.object({
  priceDeviationPct: z.number().positive().default(0.02),
  timeBasedHours: z.number().positive().default(48),
  oneSideHours: z.number().positive().default(24),
  pumpDumpPct: z.number().positive().default(0.05),
  minHistorySamples: z.number().int().min(1).default(60),
  oneSideUpperFraction: z.number().min(0).max(1).default(0.8),
  oneSideLowerFraction: z.number().min(0).max(1).default(0.2),
  pumpDumpWindowHours: z.number().positive().default(1),
});

const RiskSchema = z.object({
  maxExposurePct: z.number().positive().default(0.5),
  killSwitchDrawdownPct: z.number().positive().max(1).default(0.1),
  maxPositionSizePct: z.number().positive().default(0.3),
});

const MonitoringSchema = z.object({
  fillPollIntervalMs: z.number().int().positive().default(5_000),
  gridPollIntervalMs: z.number().int().positive().default(60_000),
  riskPollIntervalMs: z.number().int().positive().default(30_000),
  snapshotIntervalMs: z.number().int().positive().default(300_000),
  /** Grid monitor wait while the kill switch is active */
  killSwitchIdleMs: z.number().int().positive().default(10_000),
  fillErrorBackoffMs: z.number().int().positive().default(10_000),
  gridErrorBackoffMs: z.number().int().positive().default(60_000),
  riskErrorBackoffMs: z.number().int().positive().default(60_000),
  snapshotErrorBackoffMs: z.number().int().positive().default(300_000),
  executionFetchLimit: z.number().int().min(1).max(100).default(20),
});

const TakeProfitSchema = z.object({
  enabled: z.boolean().default(false),
});

export const GridBotConfigSchema = z
  .object({
    trading: TradingSchema.prefault({}),
    grid: GridSchema.prefault({}),
    recenter: RecenterSchema.prefault({}),
    risk: RiskSchema.prefault({}),
    monitoring: MonitoringSchema.prefault({}),
    takeProfit: TakeProfitSchema.prefault({}),
  })
  .refine(c => Object.hasOwn(c.grid.profiles, c.grid.defaultProfile), {
    message: "grid.defaultProfile must name one of grid.profiles",
    path: ["grid", "defaultProfile"],
  })
  .refine(c => c.recenter.oneSideLowerFraction < c.recenter.oneSideUpperFraction, {
    message: "recenter.oneSideLowerFraction must be below recenter.oneSideUpperFraction",
    path: ["recenter", "oneSideLowerFraction"],
  });

export type GridBotConfig = z.output<typeof GridBotConfigSchema>;
export type GridBotConfigInput = z.input<typeof GridBotConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Views consumed by the core
// ─────────────────────────────────────────────────────────────────────────────

export const toSpacingConfig = (config: GridBotConfig): SpacingConfig => ({
  gridSpacingMax: config.grid.gridSpacingMax,
  volatilityPeriod: config.grid.volatilityPeriod,
  volatilityThreshold: config.grid.volatilityThreshold,
  volatilityMultiplier: config.grid.volatilityMultiplier,
});

export const toRecenterConfig = (config: GridBotConfig): RecenterConfig => ({ ...config.recenter });

export const toRiskLimits = (config: GridBotConfig): RiskLimits => ({ ...config.risk });

// ─────────────────────────────────────────────────────────────────────────────
// Loading
// ─────────────────────────────────────────────────────────────────────────────

export type ConfigError =
  | { type: "CONFIG_READ_ERROR"; message: string; path: string }
  | { type: "CONFIG_INVALID"; message: string };

export function parseConfig(raw: unknown): Result<GridBotConfig, ConfigError> {
  const parsed = GridBotConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const message = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    return err({ type: "CONFIG_INVALID", message });
  }
  return ok(parsed.data);
}

const readJson = (path: string): Result<unknown, ConfigError> =>
  Result.fromThrowable(
    (): unknown => JSON.parse(readFileSync(path, "utf8")),
    (e): ConfigError => ({
      type: "CONFIG_READ_ERROR",
      path,
      message: e instanceof Error ? e.message : String(e),
    }),
  )();

/**
 * Load the strategy configuration; without a path every default applies.
 */
export function loadConfig(path: string | undefined): Result<GridBotConfig, ConfigError> {
  if (path === undefined) return parseConfig({});
  return readJson(path).andThen(parseConfig);
}
