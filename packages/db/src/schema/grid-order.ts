/**
 * grid_order - Orders placed by the bot
 */

import { index, integer, numeric, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export const gridOrder = pgTable(
  "grid_order",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    orderId: text("order_id").notNull().unique(),
    orderLinkId: text("order_link_id").notNull(),
    symbol: text("symbol").notNull(),
    side: text("side").notNull(), // buy/sell
    price: numeric("price").notNull(),
    qty: numeric("qty").notNull(),
    orderType: text("order_type").notNull(), // grid/take_profit
    status: text("status").notNull(), // New/Filled/Cancelled
    gridLevel: integer("grid_level"),
    createdAt: timestamp("created_at", { withTimezone: true, mode: "date" }).notNull(),
    filledAt: timestamp("filled_at", { withTimezone: true, mode: "date" }),
    canceledAt: timestamp("canceled_at", { withTimezone: true, mode: "date" }),
  },
  table => [index("grid_order_symbol_status_idx").on(table.symbol, table.status)],
);

export type GridOrder = typeof gridOrder.$inferSelect;
export type NewGridOrder = typeof gridOrder.$inferInsert;
