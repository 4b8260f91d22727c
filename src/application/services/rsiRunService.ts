import { err, ok, type Result } from "neverthrow";
import type { Instrument, Universe } from "../../core/entities/instrument";
import type {
  RunSnapshot,
  SchedulerConfig,
  Timeframe,
} from "../../core/entities/rsi";
import type {
  RsiProviderPort,
  UniverseProviderPort,
} from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  RandomPort,
  ReportPublisherPort,
  SleepPort,
  SnapshotRepositoryPort,
} from "../../core/ports/outboundPorts";
import { formatDateYYYYMMDD } from "../../shared/time/date";
import {
  BatchSchedulerService,
  type BatchObserver,
} from "./batchSchedulerService";
import { ItemFetchService } from "./itemFetchService";
import { aggregateOutcomes } from "./resultAggregator";

export type RunSeverity = "ok" | "warning" | "critical";

export const CRITICAL_SUCCESS_RATE = 0.3;
export const WARNING_SUCCESS_RATE = 0.6;

export const classifySeverity = (successRate: number): RunSeverity => {
  if (successRate < CRITICAL_SUCCESS_RATE) {
    return "critical";
  }
  if (successRate < WARNING_SUCCESS_RATE) {
    return "warning";
  }
  return "ok";
};

/**
 * Applies the resume offset first and the cap second, so `--resume-from 100 --max-stocks 10` covers items 100..109.
 */
export const selectInstruments = (
  instruments: readonly Instrument[],
  resumeFrom = 0,
  maxSymbols?: number,
): Instrument[] => {
  if (!Number.isInteger(resumeFrom) || resumeFrom < 0) {
    throw new Error(
      `resumeFrom must be a non-negative integer, got ${resumeFrom}`,
    );
  }
  if (
    maxSymbols !== undefined &&
    (!Number.isInteger(maxSymbols) || maxSymbols < 1)
  ) {
    throw new Error(`maxSymbols must be a positive integer, got ${maxSymbols}`);
  }

  const resumed = instruments.slice(resumeFrom);
  return maxSymbols === undefined ? resumed : resumed.slice(0, maxSymbols);
};

export type RunRequest = {
  resumeFrom?: number;
  maxSymbols?: number;
  scheduler: SchedulerConfig;
  signal?: AbortSignal;
  observer?: BatchObserver;
};

export type RunReport = {
  snapshot: RunSnapshot;
  severity: RunSeverity;
  artifacts: string[];
  universe: Universe;
};

export type RunFailure =
  | { code: "empty_universe"; universeSize: number; resumeFrom: number }
  | { code: "no_data"; snapshot: RunSnapshot }
  | { code: "cancelled"; snapshot: RunSnapshot };

/**
 * Composes one end-to-end run. Per-symbol failures never surface here; only a run that selected nothing,
 * retrieved nothing or was cancelled is reported as a failure, and then previous artifacts are left untouched.
 */
export class RsiRunService {
  constructor(
    private readonly universeProvider: UniverseProviderPort,
    private readonly provider: RsiProviderPort,
    private readonly timeframes: readonly Timeframe[],
    private readonly snapshots: SnapshotRepositoryPort,
    private readonly reports: ReportPublisherPort,
    private readonly sleeper: SleepPort,
    private readonly random: RandomPort,
    private readonly clock: ClockPort,
    private readonly timeZone: string,
  ) {}

  async execute(request: RunRequest): Promise<Result<RunReport, RunFailure>> {
    const universe = await this.universeProvider.loadUniverse();
    const resumeFrom = request.resumeFrom ?? 0;
    const selected = selectInstruments(
      universe.instruments,
      resumeFrom,
      request.maxSymbols,
    );

    if (selected.length === 0) {
      return err({
        code: "empty_universe",
        universeSize: universe.instruments.length,
        resumeFrom,
      });
    }

    const config = request.scheduler;
    const itemFetcher = new ItemFetchService(
      this.provider,
      this.timeframes,
      config.retryDelayMs,
      this.sleeper,
      this.random,
      this.clock,
    );
    const scheduler = new BatchSchedulerService(
      itemFetcher,
      this.timeframes,
      this.sleeper,
      this.random,
      this.clock,
    );

    const outcomes = await scheduler.runAll(
      selected.map((instrument) => instrument.symbol),
      {
        batchSize: config.batchSize,
        perItemDelayMs: config.perItemDelayMs,
        interBatchDelayMs: config.interBatchDelayMs,
        maxAttempts: config.maxAttempts,
        concurrency: config.maxWorkers,
        signal: request.signal,
        observer: request.observer,
      },
    );

    const capturedAt = this.clock.now();
    const snapshot = aggregateOutcomes(outcomes, this.timeframes, {
      runDate: formatDateYYYYMMDD(capturedAt, this.timeZone),
      capturedAt,
      config,
    });

    if (request.signal?.aborted) {
      return err({ code: "cancelled", snapshot });
    }
    if (snapshot.totals.success === 0) {
      return err({ code: "no_data", snapshot });
    }

    const saved = await this.snapshots.save(snapshot);
    const reportLocation = await this.reports.publish(snapshot, universe);

    return ok({
      snapshot,
      severity: classifySeverity(snapshot.totals.successRate),
      artifacts: [...saved, reportLocation],
      universe,
    });
  }
}
