/**
 * pnl_summary - Rolling period summaries written by the snapshot loop
 */

import { index, integer, numeric, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export const pnlSummary = pgTable(
  "pnl_summary",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    calculatedAt: timestamp("calculated_at", { withTimezone: true, mode: "date" }).notNull(),
    period: text("period").notNull(), // "24h"
    symbol: text("symbol").notNull(),
    totalTrades: integer("total_trades").notNull(),
    buyTrades: integer("buy_trades").notNull(),
    sellTrades: integer("sell_trades").notNull(),
    makerTrades: integer("maker_trades").notNull(),
    volume: numeric("volume").notNull(),
    totalFees: numeric("total_fees").notNull(),
    equityChange: numeric("equity_change"), // null before the first equity snapshot
    maxDrawdown: numeric("max_drawdown").notNull(),
  },
  table => [index("pnl_summary_period_calculated_at_idx").on(table.period, table.calculatedAt.desc())],
);

export type PnlSummary = typeof pnlSummary.$inferSelect;
export type NewPnlSummary = typeof pnlSummary.$inferInsert;
