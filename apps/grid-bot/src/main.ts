/**
 * Grid Bot Main Entry Point
 *
 * - Composition root: env → config → store → gateway → engine / risk → supervisor
 * - Startup failures exit with code 1
 * - SIGINT / SIGTERM: stop trading, cancel orders, close the store
 */

import "dotenv/config";

import { BybitConfigSchema, BybitGateway } from "@grid-bot/adapters";
import { getDb } from "@grid-bot/db";
import { createPostgresStateStore } from "@grid-bot/repositories";
import { logger } from "@grid-bot/utils";

import { loadConfig } from "./config";
import { env } from "./env";
import { GridEngine } from "./services/grid-engine";
import { InstrumentSpecResolver } from "./services/instrument-spec-resolver";
import { RiskController } from "./services/risk-controller";
import { GridBotSupervisor } from "./supervisor";

async function main(): Promise<void> {
  const configResult = loadConfig(env.GRID_CONFIG_PATH);
  if (configResult.isErr()) {
    throw new Error(`Invalid grid config: ${configResult.error.message}`);
  }
  const config = configResult.value;

  logger.info("Starting grid bot", {
    appEnv: env.APP_ENV,
    symbol: config.trading.symbol,
    category: config.trading.category,
    initialCapital: config.trading.initialCapital,
    profile: config.grid.defaultProfile,
    testnet: env.BYBIT_TESTNET,
  });

  // Database
  const db = getDb(env.DATABASE_URL);
  const store = createPostgresStateStore(db);

  // Exchange
  const gateway = new BybitGateway(
    BybitConfigSchema.parse({
      apiKey: env.BYBIT_API_KEY,
      apiSecret: env.BYBIT_API_SECRET,
      testnet: env.BYBIT_TESTNET,
      category: config.trading.category,
    }),
  );

  const leverage = await gateway.setLeverage(config.trading.symbol, config.trading.leverage);
  if (leverage.isErr()) {
    logger.warn("Failed to set leverage", { leverage: config.trading.leverage, error: leverage.error.message });
  }

  // Engines
  const instruments = new InstrumentSpecResolver(gateway);
  const risk = new RiskController({ gateway, store, config });
  const engine = new GridEngine({ gateway, store, instruments, config, canPlace: () => !risk.killSwitchActive });
  const supervisor = new GridBotSupervisor({ gateway, store, engine, risk, config });

  const initialized = await supervisor.initialize();
  if (initialized.isErr()) {
    await store.close();
    throw new Error(`Initialization failed: ${initialized.error.message}`);
  }

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (reason: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutdown requested", { reason });
    await supervisor.shutdown();
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((error: unknown) => {
      logger.error("Shutdown failed", error);
      process.exitCode = 1;
    });
  };
  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));

  const started = await supervisor.start();
  if (started.isErr()) {
    logger.error("Failed to start trading", { type: started.error.type, error: started.error.message });
    await shutdown("start failed");
    process.exitCode = 1;
    return;
  }

  logger.info("Grid bot running", { profile: supervisor.activeProfileName });
  await supervisor.waitForLoops();

  // Loops also exit when the kill switch stops trading.
  await shutdown("trading loops exited");
}

// Run
main().catch((error: unknown) => {
  logger.error("Fatal error", error);
  process.exitCode = 1;
});
