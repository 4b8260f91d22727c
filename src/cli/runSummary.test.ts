import { describe, expect, it } from "vitest";
import { err, ok } from "neverthrow";
import type { ItemOutcome } from "../core/entities/rsi";
import { aggregateOutcomes } from "../application/services/resultAggregator";
import type {
  RunFailure,
  RunReport,
  RunSeverity,
} from "../application/services/rsiRunService";
import {
  exitCodeFor,
  formatFailedSymbols,
  formatRunSummary,
  formatSnapshotReport,
  severityMessage,
} from "./runSummary";

const capturedAt = new Date("2026-03-10T11:30:00.000Z");

const outcome = (
  symbol: string,
  readings: ItemOutcome["readings"],
  status: ItemOutcome["status"] = "success",
): ItemOutcome => ({
  symbol,
  readings,
  status,
  successfulTimeframes: Object.values(readings).filter((v) => v !== null)
    .length,
  attempts: 1,
  capturedAt,
});

const snapshot = aggregateOutcomes(
  [
    outcome("CSELK-AAA", { "1D": 25.04, "1W": 55 }),
    outcome("CSELK-BBB", { "1D": 75, "1W": null }),
    outcome("CSELK-CCC", { "1D": null, "1W": null }, "failed"),
  ],
  ["1D", "1W"],
  {
    runDate: "2026-03-10",
    capturedAt,
    config: {
      batchSize: 50,
      maxWorkers: 1,
      perItemDelayMs: 2_000,
      interBatchDelayMs: 6_000,
      maxAttempts: 3,
      retryDelayMs: 3_000,
    },
  },
);

describe("formatFailedSymbols", () => {
  it("lists every symbol up to twenty", () => {
    const symbols = Array.from({ length: 20 }, (_, i) => `S${i + 1}`);

    expect(formatFailedSymbols(symbols).split(", ")).toHaveLength(20);
  });

  it("previews fifteen symbols above twenty", () => {
    const symbols = Array.from({ length: 23 }, (_, i) => `S${i + 1}`);

    expect(formatFailedSymbols(symbols)).toBe(
      "S1, S2, S3, S4, S5, S6, S7, S8, S9, S10, S11, S12, S13, S14, S15, … (+8 more)",
    );
  });

  it("strips the display prefix", () => {
    expect(formatFailedSymbols(["CSELK-AAA", "BBB"], "CSELK-")).toBe(
      "AAA, BBB",
    );
  });
});

describe("severityMessage", () => {
  it("describes degraded runs only", () => {
    expect(severityMessage("critical")).toBe(
      "CRITICAL: Success rate below 30%",
    );
    expect(severityMessage("warning")).toBe("WARNING: Success rate below 60%");
    expect(severityMessage("ok")).toBeUndefined();
  });
});

describe("formatRunSummary", () => {
  it("prints counts, timing and failed symbols", () => {
    expect(formatRunSummary(snapshot, 90_000, "CSELK-")).toBe(
      [
        "Run 2026-03-10 finished",
        "Success: 2/3 (66.7%)",
        "Failed: 1/3 (33.3%)",
        "Total time: 1.5 minutes",
        "Average: 30.0 seconds per symbol",
        "Timeframes:",
        "- 1 Day: 2/2 (100.0%)",
        "- 1 Week: 1/2 (50.0%)",
        "Failed symbols (1): CCC",
      ].join("\n"),
    );
  });
});

describe("formatSnapshotReport", () => {
  it("lists readings outside the neutral band per timeframe", () => {
    expect(formatSnapshotReport(snapshot, "CSELK-")).toBe(
      [
        "Snapshot for 2026-03-10",
        "Captured: 2026-03-10T11:30:00.000Z",
        "Fetched: 2/3 (66.7%)",
        "",
        "1 Day:",
        "- oversold: AAA 25.0",
        "- overbought: BBB 75.0",
        "",
        "1 Week:",
        "- oversold: none",
        "- overbought: none",
        "",
        "Failed: CCC",
      ].join("\n"),
    );
  });
});

describe("exitCodeFor", () => {
  const universe = { name: "Test", displayPrefix: "", instruments: [] };
  const report = (severity: RunSeverity): RunReport => ({
    snapshot,
    severity,
    artifacts: [],
    universe,
  });

  it("fails critical runs and run-level failures", () => {
    expect(exitCodeFor(ok(report("critical")))).toBe(1);
    const noData: RunFailure = { code: "no_data", snapshot };
    const emptyUniverse: RunFailure = {
      code: "empty_universe",
      universeSize: 3,
      resumeFrom: 3,
    };

    expect(exitCodeFor(err(noData))).toBe(1);
    expect(exitCodeFor(err(emptyUniverse))).toBe(1);
    const cancelled: RunFailure = { code: "cancelled", snapshot };
    expect(exitCodeFor(err(cancelled))).toBe(1);
  });

  it("exits cleanly on warning and ok", () => {
    expect(exitCodeFor(ok(report("warning")))).toBe(0);
    expect(exitCodeFor(ok(report("ok")))).toBe(0);
  });
});
