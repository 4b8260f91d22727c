import { z } from "zod";
import type {
  ItemOutcome,
  RunSnapshot,
  TimeframeStats,
} from "../../core/entities/rsi";
import { sanitizeReadings } from "../../application/services/readings";

export const DOCUMENT_VERSION = "2.0";

const count = z.number().int().nonnegative();

const timestamp = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), "Invalid timestamp");

const entrySchema = z.object({
  rsi_data: z.record(z.string(), z.number().nullable()),
  status: z.enum(["success", "failed"]),
  successful_timeframes: count,
  timestamp,
  attempts: count,
  error: z.string().optional(),
});

const metadataSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  timestamp,
  timeframes: z.array(z.string()).min(1),
  total_symbols: count,
  successful_fetches: count,
  failed_fetches: count,
  success_rate: z.number(),
  timeframe_stats: z.record(
    z.string(),
    z.object({
      successful: count,
      total: count,
      success_rate: z.number(),
    }),
  ),
  scraper_config: z.object({
    max_workers: z.number().int().positive(),
    batch_size: z.number().int().positive(),
    // Seconds, like the command-line flag.
    rate_limit_delay: z.number().nonnegative(),
    retry_count: z.number().int().positive(),
    inter_batch_delay: z.number().nonnegative().optional(),
    retry_delay: z.number().nonnegative().optional(),
  }),
  version: z.string(),
});

export const snapshotDocumentSchema = z.object({
  metadata: metadataSchema,
  data: z.record(z.string(), entrySchema),
  failed_symbols: z.array(z.string()).default([]),
});

export const latestDocumentSchema = z.object({
  metadata: metadataSchema,
  data: z.record(z.string(), entrySchema),
});

export type SnapshotEntry = z.infer<typeof entrySchema>;
export type SnapshotMetadata = z.infer<typeof metadataSchema>;
export type SnapshotDocument = z.infer<typeof snapshotDocumentSchema>;
export type LatestDocument = z.infer<typeof latestDocumentSchema>;

const percent = (numerator: number, denominator: number): number =>
  denominator === 0 ? 0 : (numerator / denominator) * 100;

const ratio = (numerator: number, denominator: number): number =>
  denominator === 0 ? 0 : numerator / denominator;

const toEntry = (outcome: ItemOutcome): SnapshotEntry => {
  const entry: SnapshotEntry = {
    rsi_data: { ...outcome.readings },
    status: outcome.status,
    successful_timeframes: outcome.successfulTimeframes,
    timestamp: outcome.capturedAt.toISOString(),
    attempts: outcome.attempts,
  };
  if (outcome.error !== undefined) {
    entry.error = outcome.error;
  }
  return entry;
};

const toMetadata = (snapshot: RunSnapshot): SnapshotMetadata => {
  const { totals, config } = snapshot;

  return {
    date: snapshot.runDate,
    timestamp: snapshot.capturedAt.toISOString(),
    timeframes: [...snapshot.timeframes],
    total_symbols: totals.total,
    successful_fetches: totals.success,
    failed_fetches: totals.failed,
    success_rate: percent(totals.success, totals.total),
    timeframe_stats: Object.fromEntries(
      snapshot.timeframes.map((timeframe) => {
        const stats = snapshot.timeframeStats[timeframe] ?? {
          successful: 0,
          total: totals.success,
          successRate: 0,
        };
        return [
          timeframe,
          {
            successful: stats.successful,
            total: stats.total,
            success_rate: percent(stats.successful, stats.total),
          },
        ];
      }),
    ),
    scraper_config: {
      max_workers: config.maxWorkers,
      batch_size: config.batchSize,
      rate_limit_delay: config.perItemDelayMs / 1000,
      retry_count: config.maxAttempts,
      inter_batch_delay: config.interBatchDelayMs / 1000,
      retry_delay: config.retryDelayMs / 1000,
    },
    version: DOCUMENT_VERSION,
  };
};

/**
 * The dated document keeps every outcome; rates are stored as percentages.
 */
export const toSnapshotDocument = (snapshot: RunSnapshot): SnapshotDocument => ({
  metadata: toMetadata(snapshot),
  data: Object.fromEntries(
    snapshot.outcomes.map((outcome) => [outcome.symbol, toEntry(outcome)]),
  ),
  failed_symbols: [...snapshot.failedSymbols],
});

/**
 * The `latest` document feeds pages and API readers, so it carries successful entries only.
 */
export const toLatestDocument = (snapshot: RunSnapshot): LatestDocument => ({
  metadata: toMetadata(snapshot),
  data: Object.fromEntries(
    snapshot.outcomes
      .filter((outcome) => outcome.status === "success")
      .map((outcome) => [outcome.symbol, toEntry(outcome)]),
  ),
});

/**
 * Rebuilds a snapshot from either document shape. Totals always come from the metadata; a `latest`
 * document only yields its successful outcomes.
 */
export const fromDocument = (
  document: SnapshotDocument | LatestDocument,
): RunSnapshot => {
  const { metadata } = document;
  const timeframes = metadata.timeframes;
  const seconds = (value: number): number => Math.round(value * 1000);
  const perItemDelayMs = seconds(metadata.scraper_config.rate_limit_delay);

  const outcomes = Object.entries(document.data).map(
    ([symbol, entry]): ItemOutcome => {
      const readings = Object.freeze(sanitizeReadings(entry.rsi_data, timeframes));
      const outcome: ItemOutcome = {
        symbol,
        readings,
        status: entry.status,
        successfulTimeframes: entry.successful_timeframes,
        attempts: entry.attempts,
        capturedAt: new Date(entry.timestamp),
      };
      if (entry.error !== undefined) {
        outcome.error = entry.error;
      }
      return Object.freeze(outcome);
    },
  );

  const timeframeStats: Record<string, TimeframeStats> = {};
  for (const [timeframe, stats] of Object.entries(metadata.timeframe_stats)) {
    timeframeStats[timeframe] = {
      successful: stats.successful,
      total: stats.total,
      successRate: ratio(stats.successful, stats.total),
    };
  }

  const failedSymbols =
    "failed_symbols" in document
      ? document.failed_symbols
      : outcomes
          .filter((outcome) => outcome.status === "failed")
          .map((outcome) => outcome.symbol);

  const snapshot: RunSnapshot = {
    runDate: metadata.date,
    capturedAt: new Date(metadata.timestamp),
    timeframes: Object.freeze([...timeframes]),
    totals: {
      total: metadata.total_symbols,
      success: metadata.successful_fetches,
      failed: metadata.failed_fetches,
      successRate: ratio(metadata.successful_fetches, metadata.total_symbols),
    },
    timeframeStats: Object.freeze(timeframeStats),
    outcomes: Object.freeze(outcomes),
    failedSymbols: Object.freeze([...failedSymbols]),
    config: {
      maxWorkers: metadata.scraper_config.max_workers,
      batchSize: metadata.scraper_config.batch_size,
      perItemDelayMs,
      interBatchDelayMs:
        metadata.scraper_config.inter_batch_delay === undefined
          ? perItemDelayMs * 3
          : seconds(metadata.scraper_config.inter_batch_delay),
      maxAttempts: metadata.scraper_config.retry_count,
      retryDelayMs:
        metadata.scraper_config.retry_delay === undefined
          ? 3_000
          : seconds(metadata.scraper_config.retry_delay),
    },
  };
  return Object.freeze(snapshot);
};

export const datedFileName = (runDate: string): string =>
  `rsi_data_${runDate.replaceAll("-", "_")}.json`;
