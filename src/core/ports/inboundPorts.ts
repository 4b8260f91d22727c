import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { Universe } from "../entities/instrument";
import type { Timeframe, TimeframeReadings } from "../entities/rsi";

export type RsiFetchRequest = {
  symbol: string;
  timeframes: readonly Timeframe[];
};

/**
 * Fetches one symbol's readings for every requested timeframe. Implementations hold no state between
 * calls and release any per-call resources before resolving.
 */
export interface RsiProviderPort {
  readonly name: string;
  fetchAllTimeframes(
    request: RsiFetchRequest,
  ): Promise<Result<TimeframeReadings, AppBoundaryError>>;
}

export interface UniverseProviderPort {
  loadUniverse(): Promise<Universe>;
}
