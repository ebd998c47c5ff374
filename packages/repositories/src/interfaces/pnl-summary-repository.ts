/**
 * PnL Summary Repository Interface
 */

import type { ResultAsync } from "neverthrow";

import type { RepositoryError } from "../types";

export interface PnlSummaryRecord {
  calculatedAt: Date;
  period: string;
  symbol: string;
  totalTrades: number;
  buyTrades: number;
  sellTrades: number;
  makerTrades: number;
  volume: number;
  totalFees: number;
  equityChange: number | null;
  maxDrawdown: number;
}

export interface PnlSummaryRepository {
  savePnlSummary(summary: PnlSummaryRecord): ResultAsync<void, RepositoryError>;
}
