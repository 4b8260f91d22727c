import type { RandomPort } from "../../core/ports/outboundPorts";

export const JITTER_MIN = 0.8;
export const JITTER_MAX = 1.3;

/**
 * Scales a base delay by a factor drawn uniformly from [0.8, 1.3) so request spacing never looks periodic.
 */
export const jitteredDelay = (baseMs: number, random: RandomPort): number =>
  Math.round(baseMs * (JITTER_MIN + random.next() * (JITTER_MAX - JITTER_MIN)));
