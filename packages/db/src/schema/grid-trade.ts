/**
 * grid_trade - Executions
 *
 * exec_id is unique: a replayed execution is ignored.
 */

import { boolean, index, integer, numeric, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export const gridTrade = pgTable(
  "grid_trade",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    execId: text("exec_id").notNull().unique(),
    orderId: text("order_id").notNull(),
    symbol: text("symbol").notNull(),
    side: text("side").notNull(),
    price: numeric("price").notNull(),
    qty: numeric("qty").notNull(),
    fee: numeric("fee").notNull(),
    feeCurrency: text("fee_currency").notNull(),
    isMaker: boolean("is_maker").notNull(),
    gridLevel: integer("grid_level"),
    executedAt: timestamp("executed_at", { withTimezone: true, mode: "date" }).notNull(),
  },
  table => [index("grid_trade_symbol_executed_at_idx").on(table.symbol, table.executedAt.desc())],
);

export type GridTrade = typeof gridTrade.$inferSelect;
export type NewGridTrade = typeof gridTrade.$inferInsert;
