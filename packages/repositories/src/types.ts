/**
 * Repository Types
 *
 * Types shared across repositories
 */

/**
 * Repository error types
 */
export type RepositoryError = { type: "DB_ERROR"; message: string };

export const toDbError = (e: unknown): RepositoryError => ({
  type: "DB_ERROR",
  message: e instanceof Error ? e.message : "Unknown error",
});

export type TradeSide = "buy" | "sell";
