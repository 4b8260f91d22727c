import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { TimeframeReadings } from "../../../core/entities/rsi";
import type {
  RsiFetchRequest,
  RsiProviderPort,
} from "../../../core/ports/inboundPorts";

// 32-bit FNV-1a; stable across runs and platforms.
const hash = (input: string): number => {
  let value = 0x811c9dc5;
  for (let i = 0; i < input.length; i += 1) {
    value ^= input.charCodeAt(i);
    value = Math.imul(value, 0x01000193) >>> 0;
  }
  return value;
};

/**
 * Provides predictable readings so the full run can be exercised without network access. Roughly one
 * timeframe in seven comes back absent.
 */
export class MockRsiProvider implements RsiProviderPort {
  readonly name = "mock";

  async fetchAllTimeframes(
    request: RsiFetchRequest,
  ): Promise<Result<TimeframeReadings, AppBoundaryError>> {
    const readings: TimeframeReadings = {};

    for (const timeframe of request.timeframes) {
      const seed = hash(`${request.symbol}|${timeframe}`);
      readings[timeframe] = seed % 7 === 0 ? null : (seed % 10_001) / 100;
    }

    return ok(readings);
  }
}
