/**
 * State Store
 *
 * Every repository the bot writes to, behind one handle that owns the connection.
 */

import type { BotEventRepository } from "./bot-event-repository";
import type { ConfigRepository } from "./config-repository";
import type { EquitySnapshotRepository } from "./equity-snapshot-repository";
import type { GridHistoryRepository } from "./grid-history-repository";
import type { OrderRepository } from "./order-repository";
import type { PnlSummaryRepository } from "./pnl-summary-repository";
import type { TradeRepository } from "./trade-repository";

export interface StateStore
  extends OrderRepository,
    TradeRepository,
    GridHistoryRepository,
    EquitySnapshotRepository,
    PnlSummaryRepository,
    BotEventRepository,
    ConfigRepository {
  /**
   * Release the connection
   */
  close(): Promise<void>;
}
