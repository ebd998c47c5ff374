/**
 * Postgres Trade Repository
 *
 * - exec_id unique constraint makes saveTrade idempotent
 */

import { desc, gte } from "drizzle-orm";
import { ResultAsync } from "neverthrow";
import { gridTrade, type Db, type GridTrade } from "@grid-bot/db";

import type { TradeRecord, TradeRepository } from "../interfaces/trade-repository";
import { toDbError, type RepositoryError } from "../types";

function toTradeRecord(row: GridTrade): TradeRecord {
  return {
    execId: row.execId,
    orderId: row.orderId,
    symbol: row.symbol,
    side: row.side === "sell" ? "sell" : "buy",
    price: Number(row.price),
    qty: Number(row.qty),
    fee: Number(row.fee),
    feeCurrency: row.feeCurrency,
    isMaker: row.isMaker,
    gridLevel: row.gridLevel,
    executedAt: row.executedAt,
  };
}

/**
 * Create a Postgres trade repository
 */
export function createPostgresTradeRepository(db: Db): TradeRepository {
  return {
    saveTrade(trade: TradeRecord): ResultAsync<{ inserted: boolean }, RepositoryError> {
      return ResultAsync.fromPromise(
        db
          .insert(gridTrade)
          .values({
            execId: trade.execId,
            orderId: trade.orderId,
            symbol: trade.symbol,
            side: trade.side,
            price: String(trade.price),
            qty: String(trade.qty),
            fee: String(trade.fee),
            feeCurrency: trade.feeCurrency,
            isMaker: trade.isMaker,
            gridLevel: trade.gridLevel,
            executedAt: trade.executedAt,
          })
          .onConflictDoNothing({ target: gridTrade.execId })
          .returning({ id: gridTrade.id }),
        toDbError,
      ).map(rows => ({ inserted: rows.length > 0 }));
    },

    getTradesSince(since: Date): ResultAsync<TradeRecord[], RepositoryError> {
      return ResultAsync.fromPromise(
        db.select().from(gridTrade).where(gte(gridTrade.executedAt, since)).orderBy(desc(gridTrade.executedAt)),
        toDbError,
      ).map(rows => rows.map(toTradeRecord));
    },
  };
}
