/**
 * Config Repository Interface
 *
 * - Remembers the active grid profile across restarts
 */

import type { ResultAsync } from "neverthrow";

import type { RepositoryError } from "../types";

export interface ActiveConfigRecord {
  profileName: string;
  symbol: string;
  gridSpacing: number;
  targetLevels: number;
  profitTarget: number;
  maxExposurePct: number;
  leverage: number;
}

export interface ConfigRepository {
  /**
   * Store `config` as the only active row
   */
  saveConfig(config: ActiveConfigRecord): ResultAsync<void, RepositoryError>;

  getActiveConfig(): ResultAsync<ActiveConfigRecord | null, RepositoryError>;
}
