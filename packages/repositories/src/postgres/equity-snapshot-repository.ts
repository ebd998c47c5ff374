/**
 * Postgres Equity Snapshot Repository
 */

import { asc, gte } from "drizzle-orm";
import { ResultAsync } from "neverthrow";
import { equitySnapshot, type Db } from "@grid-bot/db";

import type { EquitySnapshotRecord, EquitySnapshotRepository } from "../interfaces/equity-snapshot-repository";
import { toDbError, type RepositoryError } from "../types";

/**
 * Create a Postgres equity snapshot repository
 */
export function createPostgresEquitySnapshotRepository(db: Db): EquitySnapshotRepository {
  return {
    saveEquitySnapshot(snapshot: EquitySnapshotRecord): ResultAsync<void, RepositoryError> {
      return ResultAsync.fromPromise(
        db.insert(equitySnapshot).values({
          ts: snapshot.ts,
          totalEquity: String(snapshot.totalEquity),
          availableBalance: String(snapshot.availableBalance),
          unrealizedPnl: String(snapshot.unrealizedPnl),
          totalPositionsValue: String(snapshot.totalPositionsValue),
        }),
        toDbError,
      ).map(() => undefined);
    },

    getEquitySnapshotsSince(since: Date): ResultAsync<EquitySnapshotRecord[], RepositoryError> {
      return ResultAsync.fromPromise(
        db.select().from(equitySnapshot).where(gte(equitySnapshot.ts, since)).orderBy(asc(equitySnapshot.ts)),
        toDbError,
      ).map(rows =>
        rows.map(row => ({
          ts: row.ts,
          totalEquity: Number(row.totalEquity),
          availableBalance: Number(row.availableBalance),
          unrealizedPnl: Number(row.unrealizedPnl),
          totalPositionsValue: Number(row.totalPositionsValue),
        })),
      );
    },
  };
}
