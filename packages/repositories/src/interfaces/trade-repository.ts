/**
 * Trade Repository Interface
 *
 * - Executions, deduplicated by execId
 */

import type { ResultAsync } from "neverthrow";

import type { RepositoryError, TradeSide } from "../types";

export interface TradeRecord {
  execId: string;
  orderId: string;
  symbol: string;
  side: TradeSide;
  price: number;
  qty: number;
  fee: number;
  feeCurrency: string;
  isMaker: boolean;
  gridLevel: number | null;
  executedAt: Date;
}

export interface TradeRepository {
  /**
   * Resolves `inserted: false` when the execId was already stored.
   */
  saveTrade(trade: TradeRecord): ResultAsync<{ inserted: boolean }, RepositoryError>;

  getTradesSince(since: Date): ResultAsync<TradeRecord[], RepositoryError>;
}
