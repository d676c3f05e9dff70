import { pgTable, text, timestamp, jsonb, integer, serial, index } from "drizzle-orm/pg-core";

export const runs = pgTable("runs", {
  id: serial("id").primaryKey(),
  startedAt: timestamp("started_at", { withTimezone: true }).defaultNow().notNull(),
  finishedAt: timestamp("finished_at", { withTimezone: true }),
  topic: text("topic"),
  status: text("status").default("running").notNull(), // running | success | error
  error: text("error")
});

export const trends = pgTable(
  "trends",
  {
    id: serial("id").primaryKey(),
    runId: integer("run_id")
      .notNull()
      .references(() => runs.id),
    source: text("source").notNull(),
    title: text("title").notNull(),
    url: text("url"),
    score: integer("score"),
    extra: jsonb("extra")
  },
  (table) => ({
    trendsRunIdx: index("trends_run_idx").on(table.runId)
  })
);
