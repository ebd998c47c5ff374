/**
 * Grid History Repository Interface
 */

import type { ResultAsync } from "neverthrow";

import type { RepositoryError } from "../types";

export interface GridSnapshotRecord {
  ts: Date;
  symbol: string;
  centerPrice: number;
  lowestBuy: number | null;
  highestSell: number | null;
  numBuyLevels: number;
  numSellLevels: number;
  gridSpacing: number;
  reason: string;
}

export interface GridHistoryRepository {
  saveGridHistory(snapshot: GridSnapshotRecord): ResultAsync<void, RepositoryError>;

  /**
   * Most recent snapshot for the symbol, null when none
   */
  getLatestGrid(symbol: string): ResultAsync<GridSnapshotRecord | null, RepositoryError>;
}
