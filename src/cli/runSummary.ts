import type { Result } from "neverthrow";
import type { RunSnapshot } from "../core/entities/rsi";
import type {
  RunFailure,
  RunReport,
  RunSeverity,
} from "../application/services/rsiRunService";
import { classifyReading, timeframeLabel } from "../infra/report/reportModel";
import { displaySymbol } from "../infra/universe/fileUniverseProvider";

const FAILED_LIST_FULL_LIMIT = 20;
const FAILED_LIST_PREVIEW = 15;

const percent = (part: number, total: number): string =>
  total === 0 ? "0.0%" : `${((part / total) * 100).toFixed(1)}%`;

export const formatFailedSymbols = (
  failed: readonly string[],
  displayPrefix = "",
): string => {
  const shown = failed.map((symbol) => displaySymbol(symbol, displayPrefix));
  if (shown.length <= FAILED_LIST_FULL_LIMIT) {
    return shown.join(", ");
  }
  const rest = shown.length - FAILED_LIST_PREVIEW;
  return `${shown.slice(0, FAILED_LIST_PREVIEW).join(", ")}, … (+${rest} more)`;
};

export const severityMessage = (severity: RunSeverity): string | undefined => {
  switch (severity) {
    case "critical":
      return "CRITICAL: Success rate below 30%";
    case "warning":
      return "WARNING: Success rate below 60%";
    default:
      return undefined;
  }
};

/**
 * End-of-run console summary; `elapsedMs` covers the whole run including pauses.
 */
export const formatRunSummary = (
  snapshot: RunSnapshot,
  elapsedMs: number,
  displayPrefix = "",
): string => {
  const { total, success, failed } = snapshot.totals;
  const lines = [
    `Run ${snapshot.runDate} finished`,
    `Success: ${success}/${total} (${percent(success, total)})`,
    `Failed: ${failed}/${total} (${percent(failed, total)})`,
    `Total time: ${(elapsedMs / 60_000).toFixed(1)} minutes`,
  ];
  if (total > 0) {
    lines.push(
      `Average: ${(elapsedMs / 1000 / total).toFixed(1)} seconds per symbol`,
    );
  }

  lines.push("Timeframes:");
  for (const timeframe of snapshot.timeframes) {
    const stats = snapshot.timeframeStats[timeframe];
    if (stats) {
      lines.push(
        `- ${timeframeLabel(timeframe)}: ${stats.successful}/${stats.total} (${percent(stats.successful, stats.total)})`,
      );
    }
  }

  if (snapshot.failedSymbols.length > 0) {
    lines.push(
      `Failed symbols (${snapshot.failedSymbols.length}): ${formatFailedSymbols(snapshot.failedSymbols, displayPrefix)}`,
    );
  }
  return lines.join("\n");
};

/**
 * Terminal view of a stored snapshot, listing the extreme readings of each timeframe.
 */
export const formatSnapshotReport = (
  snapshot: RunSnapshot,
  displayPrefix = "",
): string => {
  const { total, success } = snapshot.totals;
  const lines = [
    `Snapshot for ${snapshot.runDate}`,
    `Captured: ${snapshot.capturedAt.toISOString()}`,
    `Fetched: ${success}/${total} (${percent(success, total)})`,
  ];

  for (const timeframe of snapshot.timeframes) {
    const oversold: string[] = [];
    const overbought: string[] = [];
    for (const outcome of snapshot.outcomes) {
      const value = outcome.readings[timeframe];
      if (outcome.status !== "success" || value === null || value === undefined) {
        continue;
      }
      const zone = classifyReading(value);
      const label = `${displaySymbol(outcome.symbol, displayPrefix)} ${value.toFixed(1)}`;
      if (zone === "oversold") {
        oversold.push(label);
      } else if (zone === "overbought") {
        overbought.push(label);
      }
    }

    lines.push("");
    lines.push(`${timeframeLabel(timeframe)}:`);
    lines.push(`- oversold: ${oversold.length > 0 ? oversold.join(", ") : "none"}`);
    lines.push(
      `- overbought: ${overbought.length > 0 ? overbought.join(", ") : "none"}`,
    );
  }

  if (snapshot.failedSymbols.length > 0) {
    lines.push("");
    lines.push(
      `Failed: ${formatFailedSymbols(snapshot.failedSymbols, displayPrefix)}`,
    );
  }
  return lines.join("\n");
};

/**
 * Non-zero when nothing usable came back; a warning run still exits cleanly.
 */
export const exitCodeFor = (
  result: Result<RunReport, RunFailure>,
): number => {
  if (result.isErr()) {
    return 1;
  }
  return result.value.severity === "critical" ? 1 : 0;
};
