/**
 * grid_history - Ladder snapshots
 *
 * - Written on every setup/recenter
 * - Latest row restores the center price at startup
 */

import { index, integer, numeric, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export const gridHistory = pgTable(
  "grid_history",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull(),
    symbol: text("symbol").notNull(),
    centerPrice: numeric("center_price").notNull(),
    lowestBuy: numeric("lowest_buy"), // null when the buy side is empty
    highestSell: numeric("highest_sell"), // null when the sell side is empty
    numBuyLevels: integer("num_buy_levels").notNull(),
    numSellLevels: integer("num_sell_levels").notNull(),
    gridSpacing: numeric("grid_spacing").notNull(),
    reason: text("reason"),
  },
  table => [index("grid_history_symbol_ts_idx").on(table.symbol, table.ts.desc())],
);

export type GridHistory = typeof gridHistory.$inferSelect;
export type NewGridHistory = typeof gridHistory.$inferInsert;
