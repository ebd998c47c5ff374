/**
 * bot_event - Operational events (grid setup, recenter, kill-switch, errors)
 */

import { index, jsonb, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export const botEvent = pgTable(
  "bot_event",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull(),
    eventType: text("event_type").notNull(),
    severity: text("severity").notNull(), // INFO/WARNING/ERROR/CRITICAL
    message: text("message").notNull(),
    details: jsonb("details"),
  },
  table => [index("bot_event_ts_idx").on(table.ts.desc())],
);

export type BotEvent = typeof botEvent.$inferSelect;
export type NewBotEvent = typeof botEvent.$inferInsert;
