import { sqliteTable, text, integer } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ---------------------------------------------------------------------------
// games
// ---------------------------------------------------------------------------
export const games = sqliteTable("games", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  profileId: text("profile_id").notNull(),
  edition: text("edition").notNull(),
  gamePath: text("game_path").notNull(),
  winePrefix: text("wine_prefix").notNull(),
  // null = no runner selected
  runner: text("runner"),
  // JSON array string: '["en-us","ja-jp"]'
  voices: text("voices", { mode: "json" })
    .$type<string[]>()
    .notNull()
    .$defaultFn(() => []),
  // JSON object string: '{"xlua":true}'
  toggles: text("toggles", { mode: "json" })
    .$type<Record<string, boolean>>()
    .notNull()
    .$defaultFn(() => ({})),
  telemetryIgnored: integer("telemetry_ignored", { mode: "boolean" }).notNull().default(false),
  createdAt: integer("created_at")
    .notNull()
    .default(sql`(unixepoch() * 1000)`),
});

export type GameRow = typeof games.$inferSelect;
export type NewGameRow = typeof games.$inferInsert;
