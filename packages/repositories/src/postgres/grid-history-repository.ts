/**
 * Postgres Grid History Repository
 */

import { desc, eq } from "drizzle-orm";
import { ResultAsync } from "neverthrow";
import { gridHistory, type Db, type GridHistory } from "@grid-bot/db";

import type { GridHistoryRepository, GridSnapshotRecord } from "../interfaces/grid-history-repository";
import { toDbError, type RepositoryError } from "../types";

const toNullableNumber = (v: string | null): number | null => (v === null ? null : Number(v));

function toSnapshotRecord(row: GridHistory): GridSnapshotRecord {
  return {
    ts: row.ts,
    symbol: row.symbol,
    centerPrice: Number(row.centerPrice),
    lowestBuy: toNullableNumber(row.lowestBuy),
    highestSell: toNullableNumber(row.highestSell),
    numBuyLevels: row.numBuyLevels,
    numSellLevels: row.numSellLevels,
    gridSpacing: Number(row.gridSpacing),
    reason: row.reason ?? "",
  };
}

/**
 * Create a Postgres grid history repository
 */
export function createPostgresGridHistoryRepository(db: Db): GridHistoryRepository {
  return {
    saveGridHistory(snapshot: GridSnapshotRecord): ResultAsync<void, RepositoryError> {
      return ResultAsync.fromPromise(
        db.insert(gridHistory).values({
          ts: snapshot.ts,
          symbol: snapshot.symbol,
          centerPrice: String(snapshot.centerPrice),
          lowestBuy: snapshot.lowestBuy === null ? null : String(snapshot.lowestBuy),
          highestSell: snapshot.highestSell === null ? null : String(snapshot.highestSell),
          numBuyLevels: snapshot.numBuyLevels,
          numSellLevels: snapshot.numSellLevels,
          gridSpacing: String(snapshot.gridSpacing),
          reason: snapshot.reason,
        }),
        toDbError,
      ).map(() => undefined);
    },

    getLatestGrid(symbol: string): ResultAsync<GridSnapshotRecord | null, RepositoryError> {
      return ResultAsync.fromPromise(
        db.select().from(gridHistory).where(eq(gridHistory.symbol, symbol)).orderBy(desc(gridHistory.ts)).limit(1),
        toDbError,
      ).map(rows => (rows.length > 0 ? toSnapshotRecord(rows[0]) : null));
    },
  };
}
