import { err, type Result } from "neverthrow";
import type {
  ItemOutcome,
  ItemStatus,
  Timeframe,
  TimeframeReadings,
} from "../../core/entities/rsi";
import type { RsiProviderPort } from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  RandomPort,
  SleepPort,
} from "../../core/ports/outboundPorts";
import { jitteredDelay } from "./pacing";
import {
  countPresentReadings,
  emptyReadings,
  sanitizeReadings,
} from "./readings";

export const NO_TIMEFRAMES_REASON = "no timeframes successful";

const ERROR_TEXT_LIMIT = 100;

export type RetryEvent = {
  symbol: string;
  attempt: number;
  maxAttempts: number;
  reason: string;
  delayMs: number;
};

export type ItemFetchObserver = {
  onRetry?(event: RetryEvent): void;
};

/**
 * Runs the bounded retry loop for one symbol and folds every provider failure into a typed outcome.
 */
export class ItemFetchService {
  constructor(
    private readonly provider: RsiProviderPort,
    private readonly timeframes: readonly Timeframe[],
    private readonly retryDelayMs: number,
    private readonly sleeper: SleepPort,
    private readonly random: RandomPort,
    private readonly clock: ClockPort,
  ) {
    if (timeframes.length === 0) {
      throw new Error("ItemFetchService requires at least one timeframe.");
    }
  }

  /**
   * Stops at the first attempt with any present reading. Provider errors, thrown or returned, only cost an
   * attempt; the outcome keeps the reason of the last failed attempt.
   */
  async fetchWithRetry(
    symbol: string,
    maxAttempts: number,
    observer: ItemFetchObserver = {},
  ): Promise<ItemOutcome> {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new Error(
        `maxAttempts must be a positive integer, got ${maxAttempts}`,
      );
    }

    let lastReason: string | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const result = await this.attempt(symbol);

      if (result.isOk()) {
        if (countPresentReadings(result.value, this.timeframes) > 0) {
          return this.buildOutcome(symbol, "success", result.value, attempt);
        }
        lastReason = NO_TIMEFRAMES_REASON;
      } else {
        lastReason = result.error;
      }

      if (attempt < maxAttempts) {
        const delayMs = jitteredDelay(this.retryDelayMs, this.random);
        observer.onRetry?.({
          symbol,
          attempt,
          maxAttempts,
          reason: lastReason,
          delayMs,
        });
        await this.sleeper.sleep(delayMs);
      }
    }

    return this.buildOutcome(
      symbol,
      "failed",
      emptyReadings(this.timeframes),
      maxAttempts,
      lastReason ?? NO_TIMEFRAMES_REASON,
    );
  }

  private async attempt(
    symbol: string,
  ): Promise<Result<TimeframeReadings, string>> {
    try {
      const response = await this.provider.fetchAllTimeframes({
        symbol,
        timeframes: this.timeframes,
      });

      return response
        .map((readings) => sanitizeReadings(readings, this.timeframes))
        .mapErr((error) => error.message);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err(message.slice(0, ERROR_TEXT_LIMIT));
    }
  }

  private buildOutcome(
    symbol: string,
    status: ItemStatus,
    readings: TimeframeReadings,
    attempts: number,
    error?: string,
  ): ItemOutcome {
    const outcome: ItemOutcome = {
      symbol,
      readings: Object.freeze(readings),
      status,
      successfulTimeframes: countPresentReadings(readings, this.timeframes),
      attempts,
      capturedAt: this.clock.now(),
    };

    if (error !== undefined) {
      outcome.error = error;
    }

    return Object.freeze(outcome);
  }
}
