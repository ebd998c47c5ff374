/**
 * Postgres Config Repository
 *
 * - Exactly one row has is_active = true after saveConfig
 */

import { desc, eq } from "drizzle-orm";
import { ResultAsync } from "neverthrow";
import { botConfig, type Db } from "@grid-bot/db";

import type { ActiveConfigRecord, ConfigRepository } from "../interfaces/config-repository";
import { toDbError, type RepositoryError } from "../types";

/**
 * Create a Postgres config repository
 */
export function createPostgresConfigRepository(db: Db): ConfigRepository {
  return {
    saveConfig(config: ActiveConfigRecord): ResultAsync<void, RepositoryError> {
      const now = new Date();
      return ResultAsync.fromPromise(
        db.transaction(async tx => {
          await tx.update(botConfig).set({ isActive: false, updatedAt: now }).where(eq(botConfig.isActive, true));
          await tx.insert(botConfig).values({
            profileName: config.profileName,
            symbol: config.symbol,
            gridSpacing: String(config.gridSpacing),
            targetLevels: config.targetLevels,
            profitTarget: String(config.profitTarget),
            maxExposurePct: String(config.maxExposurePct),
            leverage: config.leverage,
            isActive: true,
            createdAt: now,
            updatedAt: now,
          });
        }),
        toDbError,
      );
    },

    getActiveConfig(): ResultAsync<ActiveConfigRecord | null, RepositoryError> {
      return ResultAsync.fromPromise(
        db.select().from(botConfig).where(eq(botConfig.isActive, true)).orderBy(desc(botConfig.updatedAt)).limit(1),
        toDbError,
      ).map(rows => {
        if (rows.length === 0) return null;
        const row = rows[0];
        return {
          profileName: row.profileName,
          symbol: row.symbol,
          gridSpacing: Number(row.gridSpacing),
          targetLevels: row.targetLevels,
          profitTarget: Number(row.profitTarget),
          maxExposurePct: Number(row.maxExposurePct),
          leverage: row.leverage,
        };
      });
    },
  };
}
