/**
 * bot_config - Active grid profile
 *
 * - One row per saved profile selection
 * - is_active = true for the profile the bot restores at startup
 */

import { boolean, integer, numeric, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export const botConfig = pgTable("bot_config", {
  id: uuid("id").primaryKey().defaultRandom(),
  profileName: text("profile_name").notNull(),
  symbol: text("symbol").notNull(),
  gridSpacing: numeric("grid_spacing").notNull(),
  targetLevels: integer("target_levels").notNull(),
  profitTarget: numeric("profit_target").notNull(),
  maxExposurePct: numeric("max_exposure_pct").notNull(),
  leverage: integer("leverage").notNull(),
  isActive: boolean("is_active").notNull().default(false),
  createdAt: timestamp("created_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
});

export type BotConfig = typeof botConfig.$inferSelect;
export type NewBotConfig = typeof botConfig.$inferInsert;
