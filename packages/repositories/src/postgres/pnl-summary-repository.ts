/**
 * Postgres PnL Summary Repository
 */

import { ResultAsync } from "neverthrow";
import { pnlSummary, type Db } from "@grid-bot/db";

import type { PnlSummaryRecord, PnlSummaryRepository } from "../interfaces/pnl-summary-repository";
import { toDbError, type RepositoryError } from "../types";

/**
 * Create a Postgres PnL summary repository
 */
export function createPostgresPnlSummaryRepository(db: Db): PnlSummaryRepository {
  return {
    savePnlSummary(summary: PnlSummaryRecord): ResultAsync<void, RepositoryError> {
      return ResultAsync.fromPromise(
        db.insert(pnlSummary).values({
          calculatedAt: summary.calculatedAt,
          period: summary.period,
          symbol: summary.symbol,
          totalTrades: summary.totalTrades,
          buyTrades: summary.buyTrades,
          sellTrades: summary.sellTrades,
          makerTrades: summary.makerTrades,
          volume: String(summary.volume),
          totalFees: String(summary.totalFees),
          equityChange: summary.equityChange === null ? null : String(summary.equityChange),
          maxDrawdown: String(summary.maxDrawdown),
        }),
        toDbError,
      ).map(() => undefined);
    },
  };
}
