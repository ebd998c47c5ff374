/**
 * Postgres State Store
 */

import { closeDb, type Db } from "@grid-bot/db";

import type { StateStore } from "../interfaces/state-store";
import { createPostgresBotEventRepository } from "./bot-event-repository";
import { createPostgresConfigRepository } from "./config-repository";
import { createPostgresEquitySnapshotRepository } from "./equity-snapshot-repository";
import { createPostgresGridHistoryRepository } from "./grid-history-repository";
import { createPostgresOrderRepository } from "./order-repository";
import { createPostgresPnlSummaryRepository } from "./pnl-summary-repository";
import { createPostgresTradeRepository } from "./trade-repository";

/**
 * Create the Postgres-backed state store. `close()` ends the pool.
 */
export function createPostgresStateStore(db: Db): StateStore {
  return {
    ...createPostgresOrderRepository(db),
    ...createPostgresTradeRepository(db),
    ...createPostgresGridHistoryRepository(db),
    ...createPostgresEquitySnapshotRepository(db),
    ...createPostgresPnlSummaryRepository(db),
    ...createPostgresBotEventRepository(db),
    ...createPostgresConfigRepository(db),
    close: () => closeDb(db),
  };
}
