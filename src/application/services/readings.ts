import type {
  IndicatorReading,
  Timeframe,
  TimeframeReadings,
} from "../../core/entities/rsi";

export const RSI_MIN = 0;
export const RSI_MAX = 100;

export const isValidReading = (value: unknown): value is number =>
  typeof value === "number" &&
  Number.isFinite(value) &&
  value >= RSI_MIN &&
  value <= RSI_MAX;

export const emptyReadings = (timeframes: readonly Timeframe[]): TimeframeReadings =>
  Object.fromEntries(timeframes.map((timeframe) => [timeframe, null]));

/**
 * Projects provider output onto the run's timeframes: unknown keys are dropped, missing keys and
 * out-of-range values become absent.
 */
export const sanitizeReadings = (
  readings: Partial<Record<Timeframe, unknown>>,
  timeframes: readonly Timeframe[],
): TimeframeReadings =>
  Object.fromEntries(
    timeframes.map((timeframe): [Timeframe, IndicatorReading] => {
      const value = readings[timeframe];
      return [timeframe, isValidReading(value) ? value : null];
    }),
  );

export const countPresentReadings = (
  readings: TimeframeReadings,
  timeframes: readonly Timeframe[],
): number =>
  timeframes.filter((timeframe) => isValidReading(readings[timeframe])).length;
