import type { ItemOutcome, Timeframe } from "../../core/entities/rsi";
import type {
  ClockPort,
  RandomPort,
  SleepPort,
} from "../../core/ports/outboundPorts";
import { mapWithConcurrency } from "../../shared/concurrency/mapWithConcurrency";
import type { ItemFetchObserver } from "./itemFetchService";
import { jitteredDelay } from "./pacing";
import { emptyReadings } from "./readings";

export const CANCELLED_REASON = "run cancelled";

export interface ItemFetcher {
  fetchWithRetry(
    symbol: string,
    maxAttempts: number,
    observer?: ItemFetchObserver,
  ): Promise<ItemOutcome>;
}

export type BatchObserver = ItemFetchObserver & {
  onBatchStarted?(event: {
    batchIndex: number;
    batchCount: number;
    size: number;
  }): void;
  onItemCompleted?(event: {
    outcome: ItemOutcome;
    position: number;
    batchSize: number;
  }): void;
  onBatchCompleted?(event: {
    batchIndex: number;
    batchCount: number;
    successCount: number;
    size: number;
    durationMs: number;
  }): void;
  onBatchPause?(event: { delayMs: number }): void;
};

export type BatchRunOptions = {
  batchSize: number;
  perItemDelayMs: number;
  interBatchDelayMs: number;
  maxAttempts: number;
  concurrency?: number;
  signal?: AbortSignal;
  observer?: BatchObserver;
};

export const partitionIntoBatches = <T>(
  items: readonly T[],
  batchSize: number,
): T[][] => {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new Error(`batchSize must be a positive integer, got ${batchSize}`);
  }

  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += batchSize) {
    batches.push(items.slice(start, start + batchSize));
  }
  return batches;
};

/**
 * Paces symbol work in fixed-size bursts so the upstream page sees polite, predictable traffic.
 */
export class BatchSchedulerService {
  constructor(
    private readonly itemFetcher: ItemFetcher,
    private readonly timeframes: readonly Timeframe[],
    private readonly sleeper: SleepPort,
    private readonly random: RandomPort,
    private readonly clock: ClockPort,
  ) {}

  /**
   * Returns exactly one outcome per input symbol, in input order. Exhausted retries stay local to their symbol;
   * once the signal aborts, symbols not yet started are recorded as cancelled failures.
   */
  async runAll(
    symbols: readonly string[],
    options: BatchRunOptions,
  ): Promise<ItemOutcome[]> {
    const batches = partitionIntoBatches(symbols, options.batchSize);
    const observer = options.observer ?? {};
    const concurrency = options.concurrency ?? 1;
    const outcomes: ItemOutcome[] = [];

    for (const [batchIndex, batch] of batches.entries()) {
      observer.onBatchStarted?.({
        batchIndex,
        batchCount: batches.length,
        size: batch.length,
      });
      const startedAt = this.clock.now().getTime();

      const batchOutcomes = await mapWithConcurrency(
        batch,
        concurrency,
        async (symbol, position) => {
          if (options.signal?.aborted) {
            return this.cancelledOutcome(symbol);
          }

          const outcome = await this.itemFetcher.fetchWithRetry(
            symbol,
            options.maxAttempts,
            observer,
          );
          observer.onItemCompleted?.({
            outcome,
            position: position + 1,
            batchSize: batch.length,
          });

          if (position < batch.length - 1 && !options.signal?.aborted) {
            await this.sleeper.sleep(
              jitteredDelay(options.perItemDelayMs, this.random),
            );
          }
          return outcome;
        },
      );

      outcomes.push(...batchOutcomes);
      observer.onBatchCompleted?.({
        batchIndex,
        batchCount: batches.length,
        successCount: batchOutcomes.filter((o) => o.status === "success")
          .length,
        size: batch.length,
        durationMs: this.clock.now().getTime() - startedAt,
      });

      const isLastBatch = batchIndex === batches.length - 1;
      if (!isLastBatch && !options.signal?.aborted) {
        observer.onBatchPause?.({ delayMs: options.interBatchDelayMs });
        await this.sleeper.sleep(options.interBatchDelayMs);
      }
    }

    return outcomes;
  }

  private cancelledOutcome(symbol: string): ItemOutcome {
    const outcome: ItemOutcome = {
      symbol,
      readings: Object.freeze(emptyReadings(this.timeframes)),
      status: "failed",
      successfulTimeframes: 0,
      attempts: 0,
      error: CANCELLED_REASON,
      capturedAt: this.clock.now(),
    };
    return Object.freeze(outcome);
  }
}
