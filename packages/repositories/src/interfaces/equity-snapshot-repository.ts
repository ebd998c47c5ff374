/**
 * Equity Snapshot Repository Interface
 */

import type { ResultAsync } from "neverthrow";

import type { RepositoryError } from "../types";

export interface EquitySnapshotRecord {
  ts: Date;
  totalEquity: number;
  availableBalance: number;
  unrealizedPnl: number;
  totalPositionsValue: number;
}

export interface EquitySnapshotRepository {
  saveEquitySnapshot(snapshot: EquitySnapshotRecord): ResultAsync<void, RepositoryError>;

  getEquitySnapshotsSince(since: Date): ResultAsync<EquitySnapshotRecord[], RepositoryError>;
}
