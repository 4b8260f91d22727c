/**
 * Timeframe ids are provider labels such as "1D", "1W" or "1M"; the set is fixed for one run.
 */
export type Timeframe = string;

/**
 * A present reading is finite and within [0, 100]; `null` marks an absent reading, never zero.
 */
export type IndicatorReading = number | null;

export type TimeframeReadings = Record<Timeframe, IndicatorReading>;

export type ItemStatus = "success" | "failed";

export type ItemOutcome = {
  symbol: string;
  readings: TimeframeReadings;
  status: ItemStatus;
  successfulTimeframes: number;
  attempts: number;
  error?: string;
  capturedAt: Date;
};

export type SchedulerConfig = {
  batchSize: number;
  maxWorkers: number;
  perItemDelayMs: number;
  interBatchDelayMs: number;
  maxAttempts: number;
  retryDelayMs: number;
};

export type TimeframeStats = {
  successful: number;
  total: number;
  successRate: number;
};

export type RunTotals = {
  total: number;
  success: number;
  failed: number;
  successRate: number;
};

/**
 * Produced once per run after every batch completes; consumers receive it frozen.
 */
export type RunSnapshot = {
  runDate: string;
  capturedAt: Date;
  timeframes: readonly Timeframe[];
  totals: RunTotals;
  timeframeStats: Readonly<Record<Timeframe, TimeframeStats>>;
  outcomes: readonly ItemOutcome[];
  failedSymbols: readonly string[];
  config: SchedulerConfig;
};
