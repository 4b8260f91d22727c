import {
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import type {
  SchedulerConfig,
  TimeframeReadings,
  TimeframeStats,
} from "../../core/entities/rsi";

export const runsTable = pgTable(
  "rsi_runs",
  {
    id: text("id").primaryKey(),
    runDate: text("run_date").notNull(),
    capturedAt: timestamp("captured_at", { withTimezone: true }).notNull(),
    timeframes: jsonb("timeframes").$type<string[]>().notNull(),
    totalSymbols: integer("total_symbols").notNull(),
    successfulFetches: integer("successful_fetches").notNull(),
    failedFetches: integer("failed_fetches").notNull(),
    timeframeStats: jsonb("timeframe_stats")
      .$type<Record<string, TimeframeStats>>()
      .notNull(),
    schedulerConfig: jsonb("scheduler_config")
      .$type<SchedulerConfig>()
      .notNull(),
    failedSymbols: jsonb("failed_symbols").$type<string[]>().notNull(),
  },
  (table) => ({
    capturedAtIdx: index("rsi_runs_captured_at_idx").on(table.capturedAt),
  }),
);

export const outcomesTable = pgTable(
  "rsi_outcomes",
  {
    id: text("id").primaryKey(),
    runId: text("run_id")
      .notNull()
      .references(() => runsTable.id, { onDelete: "cascade" }),
    position: integer("position").notNull(),
    symbol: text("symbol").notNull(),
    readings: jsonb("readings").$type<TimeframeReadings>().notNull(),
    status: text("status").notNull(),
    successfulTimeframes: integer("successful_timeframes").notNull(),
    attempts: integer("attempts").notNull(),
    error: text("error"),
    capturedAt: timestamp("captured_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    runPositionIdx: uniqueIndex("rsi_outcomes_run_position_uidx").on(
      table.runId,
      table.position,
    ),
    symbolIdx: index("rsi_outcomes_symbol_idx").on(table.symbol),
  }),
);

export type RunRow = typeof runsTable.$inferSelect;
export type OutcomeRow = typeof outcomesTable.$inferSelect;
