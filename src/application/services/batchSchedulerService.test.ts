import { describe, expect, it } from "vitest";
import type { ItemOutcome } from "../../core/entities/rsi";
import type { ClockPort, SleepPort } from "../../core/ports/outboundPorts";
import {
  BatchSchedulerService,
  CANCELLED_REASON,
  partitionIntoBatches,
  type ItemFetcher,
} from "./batchSchedulerService";

const capturedAt = new Date("2026-03-02T11:30:00.000Z");
const clock: ClockPort = { now: () => capturedAt };

const outcomeFor = (
  symbol: string,
  status: ItemOutcome["status"],
): ItemOutcome => ({
  symbol,
  readings: { "1D": status === "success" ? 42 : null },
  status,
  successfulTimeframes: status === "success" ? 1 : 0,
  attempts: status === "success" ? 1 : 3,
  ...(status === "failed" ? { error: "no timeframes successful" } : {}),
  capturedAt,
});

/**
 * Records item calls and sleeps on one timeline so pacing order can be asserted.
 */
const timeline = (failing: Set<string> = new Set()) => {
  const events: string[] = [];
  const fetcher: ItemFetcher = {
    fetchWithRetry: async (symbol, maxAttempts) => {
      events.push(`fetch:${symbol}:${maxAttempts}`);
      return outcomeFor(symbol, failing.has(symbol) ? "failed" : "success");
    },
  };
  const sleeper: SleepPort = {
    sleep: async (ms) => {
      events.push(`sleep:${ms}`);
    },
  };
  return { events, fetcher, sleeper };
};

describe("partitionIntoBatches", () => {
  it("splits five symbols into batches of two", () => {
    expect(partitionIntoBatches(["A", "B", "C", "D", "E"], 2)).toEqual([
      ["A", "B"],
      ["C", "D"],
      ["E"],
    ]);
  });

  it("yields ceil(n / size) bounded batches whose concatenation is the input", () => {
    const items = Array.from({ length: 23 }, (_, i) => `S${i}`);

    for (const size of [1, 4, 7, 23, 40]) {
      const batches = partitionIntoBatches(items, size);
      expect(batches).toHaveLength(Math.ceil(items.length / size));
      expect(batches.every((batch) => batch.length <= size)).toBe(true);
      expect(batches.flat()).toEqual(items);
    }
  });

  it("returns no batches for an empty list", () => {
    expect(partitionIntoBatches([], 3)).toEqual([]);
  });

  it("rejects batch sizes below one", () => {
    expect(() => partitionIntoBatches(["A"], 0)).toThrow(
      "batchSize must be a positive integer, got 0",
    );
  });
});

describe("BatchSchedulerService", () => {
  it("paces items within batches and pauses between batches only", async () => {
    const { events, fetcher, sleeper } = timeline();
    const scheduler = new BatchSchedulerService(
      fetcher,
      ["1D"],
      sleeper,
      { next: () => 0 },
      clock,
    );

    const outcomes = await scheduler.runAll(["A", "B", "C", "D", "E"], {
      batchSize: 2,
      perItemDelayMs: 100,
      interBatchDelayMs: 600,
      maxAttempts: 3,
    });

    expect(outcomes.map((o) => o.symbol)).toEqual(["A", "B", "C", "D", "E"]);
    expect(events).toEqual([
      "fetch:A:3",
      "sleep:80",
      "fetch:B:3",
      "sleep:600",
      "fetch:C:3",
      "sleep:80",
      "fetch:D:3",
      "sleep:600",
      "fetch:E:3",
    ]);
  });

  it("keeps processing after failures and accounts for every symbol", async () => {
    const { fetcher, sleeper } = timeline(new Set(["B", "D"]));
    const scheduler = new BatchSchedulerService(
      fetcher,
      ["1D"],
      sleeper,
      { next: () => 0.5 },
      clock,
    );
    const batchSummaries: string[] = [];

    const outcomes = await scheduler.runAll(["A", "B", "C", "D"], {
      batchSize: 3,
      perItemDelayMs: 0,
      interBatchDelayMs: 0,
      maxAttempts: 3,
      observer: {
        onBatchCompleted: (event) =>
          batchSummaries.push(
            `${event.batchIndex + 1}/${event.batchCount}:${event.successCount}/${event.size}`,
          ),
      },
    });

    const success = outcomes.filter((o) => o.status === "success").length;
    const failed = outcomes.filter((o) => o.status === "failed").length;
    expect(success + failed).toBe(4);
    expect(outcomes.map((o) => `${o.symbol}:${o.status}`)).toEqual([
      "A:success",
      "B:failed",
      "C:success",
      "D:failed",
    ]);
    expect(batchSummaries).toEqual(["1/2:2/3", "2/2:0/1"]);
  });

  it("reports item positions within each batch", async () => {
    const { fetcher, sleeper } = timeline();
    const scheduler = new BatchSchedulerService(
      fetcher,
      ["1D"],
      sleeper,
      { next: () => 0 },
      clock,
    );
    const positions: string[] = [];

    await scheduler.runAll(["A", "B", "C"], {
      batchSize: 2,
      perItemDelayMs: 0,
      interBatchDelayMs: 0,
      maxAttempts: 1,
      observer: {
        onItemCompleted: ({ outcome, position, batchSize }) =>
          positions.push(`${outcome.symbol}@${position}/${batchSize}`),
      },
    });

    expect(positions).toEqual(["A@1/2", "B@2/2", "C@1/1"]);
  });

  it("records symbols after cancellation as cancelled failures", async () => {
    const controller = new AbortController();
    const events: string[] = [];
    const fetcher: ItemFetcher = {
      fetchWithRetry: async (symbol) => {
        events.push(`fetch:${symbol}`);
        if (symbol === "B") {
          controller.abort();
        }
        return outcomeFor(symbol, "success");
      },
    };
    const sleeper: SleepPort = {
      sleep: async (ms) => {
        events.push(`sleep:${ms}`);
      },
    };
    const scheduler = new BatchSchedulerService(
      fetcher,
      ["1D", "1W"],
      sleeper,
      { next: () => 0 },
      clock,
    );

    const outcomes = await scheduler.runAll(["A", "B", "C", "D"], {
      batchSize: 3,
      perItemDelayMs: 10,
      interBatchDelayMs: 50,
      maxAttempts: 2,
      signal: controller.signal,
    });

    expect(events).toEqual(["fetch:A", "sleep:8", "fetch:B"]);
    expect(outcomes).toHaveLength(4);
    expect(outcomes[2]).toEqual({
      symbol: "C",
      readings: { "1D": null, "1W": null },
      status: "failed",
      successfulTimeframes: 0,
      attempts: 0,
      error: CANCELLED_REASON,
      capturedAt,
    });
    expect(outcomes[3]?.error).toBe(CANCELLED_REASON);
  });

  it("keeps input order with several items in flight", async () => {
    const delays: Record<string, number> = { A: 15, B: 1, C: 8, D: 1 };
    const fetcher: ItemFetcher = {
      fetchWithRetry: async (symbol) => {
        await new Promise((resolve) => setTimeout(resolve, delays[symbol]));
        return outcomeFor(symbol, "success");
      },
    };
    const scheduler = new BatchSchedulerService(
      fetcher,
      ["1D"],
      { sleep: async () => {} },
      { next: () => 0 },
      clock,
    );

    const outcomes = await scheduler.runAll(["A", "B", "C", "D"], {
      batchSize: 4,
      perItemDelayMs: 0,
      interBatchDelayMs: 0,
      maxAttempts: 1,
      concurrency: 2,
    });

    expect(outcomes.map((o) => o.symbol)).toEqual(["A", "B", "C", "D"]);
  });

  it("returns nothing for an empty symbol list", async () => {
    const { events, fetcher, sleeper } = timeline();
    const scheduler = new BatchSchedulerService(
      fetcher,
      ["1D"],
      sleeper,
      { next: () => 0 },
      clock,
    );

    await expect(
      scheduler.runAll([], {
        batchSize: 5,
        perItemDelayMs: 10,
        interBatchDelayMs: 10,
        maxAttempts: 1,
      }),
    ).resolves.toEqual([]);
    expect(events).toEqual([]);
  });
});
