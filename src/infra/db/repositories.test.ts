import { describe, expect, it } from "vitest";
import type { ItemOutcome } from "../../core/entities/rsi";
import { aggregateOutcomes } from "../../application/services/resultAggregator";
import { fromRows, toOutcomeRows, toRunRow } from "./repositories";

const capturedAt = new Date("2026-03-02T11:30:00.000Z");

const outcomes: ItemOutcome[] = [
  {
    symbol: "CSELK-HNB.N0000",
    readings: { "1D": 71.4, "1W": 66 },
    status: "success",
    successfulTimeframes: 2,
    attempts: 1,
    capturedAt,
  },
  {
    symbol: "CSELK-JKH.N0000",
    readings: { "1D": null, "1W": null },
    status: "failed",
    successfulTimeframes: 0,
    attempts: 3,
    error: "HTTP request timed out.",
    capturedAt,
  },
];

const snapshot = aggregateOutcomes(outcomes, ["1D", "1W"], {
  runDate: "2026-03-02",
  capturedAt,
  config: {
    batchSize: 50,
    maxWorkers: 1,
    perItemDelayMs: 2_000,
    interBatchDelayMs: 6_000,
    maxAttempts: 3,
    retryDelayMs: 3_000,
  },
});

describe("snapshot row mapping", () => {
  it("assigns positions and nulls absent errors", () => {
    const rows = toOutcomeRows("run-1", snapshot);

    expect(rows.map((row) => [row.id, row.position, row.error])).toEqual([
      ["run-1-0", 0, null],
      ["run-1-1", 1, "HTTP request timed out."],
    ]);
  });

  it("round-trips through run and outcome rows", () => {
    const run = toRunRow("run-1", snapshot);
    const rows = toOutcomeRows("run-1", snapshot);

    expect(run.failedSymbols).toEqual(["CSELK-JKH.N0000"]);
    expect(fromRows(run, rows)).toEqual(snapshot);
  });

  it("reads unknown statuses as failures", () => {
    const run = toRunRow("run-1", snapshot);
    const [first] = toOutcomeRows("run-1", snapshot);
    if (!first) {
      throw new Error("expected an outcome row");
    }

    const restored = fromRows(run, [{ ...first, status: "pending" }]);

    expect(restored.outcomes[0]?.status).toBe("failed");
  });
});
