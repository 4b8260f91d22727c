import type { Universe } from "../../core/entities/instrument";
import type {
  IndicatorReading,
  RunSnapshot,
  Timeframe,
} from "../../core/entities/rsi";
import { formatDateTime } from "../../shared/time/date";
import { displaySymbol } from "../universe/fileUniverseProvider";

export const OVERSOLD_BELOW = 30;
export const OVERBOUGHT_ABOVE = 70;

export type RsiZone = "oversold" | "overbought" | "neutral";

/** Neutral is the closed band [30, 70]. */
export const classifyReading = (value: number): RsiZone => {
  if (value < OVERSOLD_BELOW) {
    return "oversold";
  }
  if (value > OVERBOUGHT_ABOVE) {
    return "overbought";
  }
  return "neutral";
};

export type ReportRow = {
  symbol: string;
  company: string;
  /** Aligned with `ReportModel.timeframes`. */
  readings: IndicatorReading[];
};

export type ZoneCounts = Record<RsiZone, number> & { total: number };

export type ReportModel = {
  exchange: string;
  lastUpdate: string;
  timeZone: string;
  timeframes: Timeframe[];
  rows: ReportRow[];
  universeSize: number;
  totals: RunSnapshot["totals"];
};

const UNITS: Record<string, string> = {
  m: "Minute",
  h: "Hour",
  D: "Day",
  W: "Week",
  M: "Month",
};

export const timeframeLabel = (timeframe: Timeframe): string => {
  const match = /^(\d+)([mhDWM])$/.exec(timeframe);
  const amount = match?.[1];
  const unit = match?.[2] ? UNITS[match[2]] : undefined;
  if (!amount || !unit) {
    return timeframe;
  }
  return `${amount} ${unit}${amount === "1" ? "" : "s"}`;
};

export const countZones = (
  rows: readonly ReportRow[],
  timeframeIndex: number,
): ZoneCounts => {
  const counts: ZoneCounts = { oversold: 0, overbought: 0, neutral: 0, total: 0 };
  for (const row of rows) {
    const value = row.readings[timeframeIndex];
    if (value === null || value === undefined) {
      continue;
    }
    counts.total += 1;
    counts[classifyReading(value)] += 1;
  }
  return counts;
};

/**
 * Stable sort on one timeframe's readings; absent readings always sink to the bottom.
 */
export const sortRowsByReading = (
  rows: readonly ReportRow[],
  timeframeIndex: number,
  direction: "asc" | "desc" = "asc",
): ReportRow[] =>
  [...rows].sort((a, b) => {
    const left = a.readings[timeframeIndex] ?? null;
    const right = b.readings[timeframeIndex] ?? null;
    if (left === null || right === null) {
      return left === right ? 0 : left === null ? 1 : -1;
    }
    return direction === "asc" ? left - right : right - left;
  });

/**
 * Projects a snapshot onto the rows the page lists: successful symbols only, in run order.
 */
export const buildReportModel = (
  snapshot: RunSnapshot,
  universe: Universe,
  timeZone: string,
): ReportModel => {
  const companies = new Map(
    universe.instruments.map((instrument) => [
      instrument.symbol,
      instrument.company,
    ]),
  );

  const rows = snapshot.outcomes
    .filter((outcome) => outcome.status === "success")
    .map((outcome) => ({
      symbol: displaySymbol(outcome.symbol, universe.displayPrefix),
      company: companies.get(outcome.symbol) || "Unknown Company",
      readings: snapshot.timeframes.map(
        (timeframe) => outcome.readings[timeframe] ?? null,
      ),
    }));

  return {
    exchange: universe.name,
    lastUpdate: formatDateTime(snapshot.capturedAt, timeZone),
    timeZone,
    timeframes: [...snapshot.timeframes],
    rows,
    universeSize: universe.instruments.length,
    totals: snapshot.totals,
  };
};
