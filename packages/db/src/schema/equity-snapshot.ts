/**
 * equity_snapshot - Periodic account snapshots for reporting
 */

import { index, numeric, pgTable, timestamp, uuid } from "drizzle-orm/pg-core";

export const equitySnapshot = pgTable(
  "equity_snapshot",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull(),
    totalEquity: numeric("total_equity").notNull(),
    availableBalance: numeric("available_balance").notNull(),
    unrealizedPnl: numeric("unrealized_pnl").notNull(),
    totalPositionsValue: numeric("total_positions_value").notNull(),
  },
  table => [index("equity_snapshot_ts_idx").on(table.ts.desc())],
);

export type EquitySnapshot = typeof equitySnapshot.$inferSelect;
export type NewEquitySnapshot = typeof equitySnapshot.$inferInsert;
