import type { Logger } from "pino";
import type { BatchObserver } from "../application/services/batchSchedulerService";

/**
 * Logs batch progress with one line per symbol; failed symbols are logged at warn.
 */
export const createProgressLogger = (log: Logger): BatchObserver => ({
  onBatchStarted: ({ batchIndex, batchCount, size }) => {
    log.info(
      { batch: batchIndex + 1, batchCount, size },
      "Batch started",
    );
  },
  onItemCompleted: ({ outcome, position, batchSize }) => {
    const level = outcome.status === "success" ? "info" : "warn";
    log[level](
      {
        symbol: outcome.symbol,
        status: outcome.status,
        position,
        batchSize,
        successfulTimeframes: outcome.successfulTimeframes,
        attempts: outcome.attempts,
        error: outcome.error,
      },
      "Symbol processed",
    );
  },
  onRetry: ({ symbol, attempt, maxAttempts, reason, delayMs }) => {
    log.warn(
      { symbol, attempt, maxAttempts, reason, delayMs },
      "Retrying symbol",
    );
  },
  onBatchCompleted: ({ batchIndex, batchCount, successCount, size, durationMs }) => {
    log.info(
      { batch: batchIndex + 1, batchCount, successCount, size, durationMs },
      "Batch completed",
    );
  },
  onBatchPause: ({ delayMs }) => {
    log.info({ delayMs }, "Pausing between batches");
  },
});
