import type {
  ItemOutcome,
  RunSnapshot,
  SchedulerConfig,
  Timeframe,
  TimeframeStats,
} from "../../core/entities/rsi";
import { isValidReading } from "./readings";

export type AggregationContext = {
  runDate: string;
  capturedAt: Date;
  config: SchedulerConfig;
};

const ratio = (numerator: number, denominator: number): number =>
  denominator === 0 ? 0 : numerator / denominator;

/**
 * Folds ordered outcomes into one frozen snapshot. Per-timeframe rates are measured against successful
 * symbols only, so a timeframe reads 100% when every symbol that produced anything produced it.
 */
export const aggregateOutcomes = (
  outcomes: readonly ItemOutcome[],
  timeframes: readonly Timeframe[],
  context: AggregationContext,
): RunSnapshot => {
  const successful = outcomes.filter((outcome) => outcome.status === "success");
  const total = outcomes.length;
  const success = successful.length;

  const timeframeStats: Record<Timeframe, TimeframeStats> = {};
  for (const timeframe of timeframes) {
    const withReading = successful.filter((outcome) =>
      isValidReading(outcome.readings[timeframe]),
    ).length;
    timeframeStats[timeframe] = Object.freeze({
      successful: withReading,
      total: success,
      successRate: ratio(withReading, success),
    });
  }

  const snapshot: RunSnapshot = {
    runDate: context.runDate,
    capturedAt: context.capturedAt,
    timeframes: Object.freeze([...timeframes]),
    totals: Object.freeze({
      total,
      success,
      failed: total - success,
      successRate: ratio(success, total),
    }),
    timeframeStats: Object.freeze(timeframeStats),
    outcomes: Object.freeze([...outcomes]),
    failedSymbols: Object.freeze(
      outcomes
        .filter((outcome) => outcome.status === "failed")
        .map((outcome) => outcome.symbol),
    ),
    config: Object.freeze({ ...context.config }),
  };
  return Object.freeze(snapshot);
};
