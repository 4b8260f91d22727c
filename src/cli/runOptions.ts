import { z } from "zod";
import type { SchedulerConfig } from "../core/entities/rsi";
import { interBatchDelayMs } from "../shared/config/env";

export type RunCommandOptions = {
  batchSize?: string;
  maxWorkers?: string;
  rateLimit?: string;
  retryCount?: string;
  maxStocks?: string;
  resumeFrom?: string;
  conservative?: boolean;
};

export type ResolvedRunOptions = {
  scheduler: SchedulerConfig;
  maxSymbols?: number;
  resumeFrom: number;
};

export const CONSERVATIVE_MAX_BATCH_SIZE = 15;
export const CONSERVATIVE_MIN_RATE_LIMIT_MS = 4_000;

const flag = (name: string, schema: z.ZodNumber) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) {
        return undefined;
      }
      const parsed = schema.safeParse(Number(value.trim() || Number.NaN));
      if (!parsed.success) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Invalid ${name} '${value}': ${parsed.error.issues[0]?.message ?? "invalid number"}`,
        });
        return z.NEVER;
      }
      return parsed.data;
    });

const optionsSchema = z.object({
  batchSize: flag("--batch-size", z.number().int().positive()),
  maxWorkers: flag("--max-workers", z.number().int().positive()),
  rateLimit: flag("--rate-limit", z.number().finite().nonnegative()),
  retryCount: flag("--retry-count", z.number().int().positive()),
  maxStocks: flag("--max-stocks", z.number().int().positive()),
  resumeFrom: flag("--resume-from", z.number().int().nonnegative()),
  conservative: z.boolean().optional(),
});

/**
 * Layers command-line flags over the configured scheduler settings. `--rate-limit` is in seconds. The
 * conservative profile is applied last, so it caps whatever the flags asked for.
 */
export const resolveRunOptions = (
  raw: RunCommandOptions,
  base: SchedulerConfig,
  configuredInterBatchMs: number,
): ResolvedRunOptions => {
  const parsed = optionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(parsed.error.issues.map((issue) => issue.message).join("; "));
  }
  const flags = parsed.data;

  let batchSize = flags.batchSize ?? base.batchSize;
  let maxWorkers = flags.maxWorkers ?? base.maxWorkers;
  let perItemDelayMs =
    flags.rateLimit === undefined
      ? base.perItemDelayMs
      : Math.round(flags.rateLimit * 1000);

  if (flags.conservative) {
    batchSize = Math.min(batchSize, CONSERVATIVE_MAX_BATCH_SIZE);
    maxWorkers = 1;
    perItemDelayMs = Math.max(perItemDelayMs, CONSERVATIVE_MIN_RATE_LIMIT_MS);
  }

  const resolved: ResolvedRunOptions = {
    scheduler: {
      batchSize,
      maxWorkers,
      perItemDelayMs,
      interBatchDelayMs:
        perItemDelayMs === base.perItemDelayMs
          ? base.interBatchDelayMs
          : interBatchDelayMs(perItemDelayMs, configuredInterBatchMs),
      maxAttempts: flags.retryCount ?? base.maxAttempts,
      retryDelayMs: base.retryDelayMs,
    },
    resumeFrom: flags.resumeFrom ?? 0,
  };
  if (flags.maxStocks !== undefined) {
    resolved.maxSymbols = flags.maxStocks;
  }
  return resolved;
};
