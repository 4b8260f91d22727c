import type {
  ClockPort,
  IdGeneratorPort,
  RandomPort,
  SleepPort,
} from "../../core/ports/outboundPorts";

/**
 * Adapts wall-clock access so time-sensitive logic remains deterministic in tests.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

export class UuidIdGenerator implements IdGeneratorPort {
  next(): string {
    return crypto.randomUUID();
  }
}

/**
 * Real timer-backed waits; every pacing and backoff delay in a run goes through here.
 */
export class TimerSleeper implements SleepPort {
  async sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return;
    }
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}

export class MathRandom implements RandomPort {
  next(): number {
    return Math.random();
  }
}
