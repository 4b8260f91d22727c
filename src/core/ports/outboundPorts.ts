import type { Universe } from "../entities/instrument";
import type { RunSnapshot } from "../entities/rsi";

export interface SnapshotRepositoryPort {
  /**
   * Persists one run and resolves with the locations written.
   */
  save(snapshot: RunSnapshot): Promise<string[]>;
  latest(): Promise<RunSnapshot | null>;
  /**
   * Resolves the most recent run stored for a `YYYY-MM-DD` date.
   */
  byDate(runDate: string): Promise<RunSnapshot | null>;
}

/**
 * Writes the browseable report for one run and resolves with its location.
 */
export interface ReportPublisherPort {
  publish(snapshot: RunSnapshot, universe: Universe): Promise<string>;
}

export type RunJobPayload = {
  requestedAt: string;
  trigger: "schedule" | "manual";
};

export interface RunQueuePort {
  enqueueRun(payload: RunJobPayload): Promise<void>;
  schedule(pattern: string, timeZone: string): Promise<void>;
}

export interface ClockPort {
  now(): Date;
}

export interface IdGeneratorPort {
  next(): string;
}

export interface SleepPort {
  sleep(ms: number): Promise<void>;
}

/**
 * Yields uniformly distributed numbers in [0, 1).
 */
export interface RandomPort {
  next(): number;
}
