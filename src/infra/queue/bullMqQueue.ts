import { Queue, type WorkerOptions, Worker } from "bullmq";
import type { RedisOptions } from "ioredis";
import type {
  RunJobPayload,
  RunQueuePort,
} from "../../core/ports/outboundPorts";
import { RUN_JOB_NAME, RUN_QUEUE_NAME, RUN_SCHEDULER_ID } from "./queues";

export type QueueCounts = {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: number;
};

const QUEUE_RETRIES = 1;

export const defaultJobOptions = {
  attempts: QUEUE_RETRIES + 1,
  removeOnComplete: 100,
  removeOnFail: 500,
  backoff: {
    type: "exponential",
    delay: 60_000,
  },
} as const;

/**
 * Wraps BullMQ so application code depends on queue intent rather than queue vendor details.
 */
export class BullMqRunQueue implements RunQueuePort {
  private readonly queue: Queue<RunJobPayload>;

  constructor(connection: RedisOptions) {
    this.queue = new Queue<RunJobPayload>(RUN_QUEUE_NAME, {
      connection,
      defaultJobOptions,
    });
  }

  async enqueueRun(payload: RunJobPayload): Promise<void> {
    await this.queue.add(RUN_JOB_NAME, payload);
  }

  /**
   * Upserts the single repeatable run, so re-registering with a new pattern replaces the old one.
   */
  async schedule(pattern: string, timeZone: string): Promise<void> {
    await this.queue.upsertJobScheduler(
      RUN_SCHEDULER_ID,
      { pattern, tz: timeZone },
      {
        name: RUN_JOB_NAME,
        data: { requestedAt: new Date().toISOString(), trigger: "schedule" },
      },
    );
  }

  async unschedule(): Promise<boolean> {
    return this.queue.removeJobScheduler(RUN_SCHEDULER_ID);
  }

  async getQueueCounts(): Promise<QueueCounts> {
    const counts = await this.queue.getJobCounts(
      "waiting",
      "active",
      "completed",
      "failed",
      "delayed",
      "paused",
    );

    return {
      waiting: counts.waiting ?? 0,
      active: counts.active ?? 0,
      completed: counts.completed ?? 0,
      failed: counts.failed ?? 0,
      delayed: counts.delayed ?? 0,
      paused: counts.paused ?? 0,
    };
  }

  /**
   * Provides explicit shutdown control to reduce dangling Redis connections during process teardown.
   */
  async close(): Promise<void> {
    await this.queue.close();
  }
}

/**
 * Runs are long and rate-limited, so one worker handles one run at a time.
 */
export const createRunWorker = (
  connection: RedisOptions,
  processor: (payload: RunJobPayload) => Promise<void>,
) => {
  const options: WorkerOptions = {
    connection,
    concurrency: 1,
  };

  return new Worker<RunJobPayload>(
    RUN_QUEUE_NAME,
    async (job) => {
      await processor(job.data);
    },
    options,
  );
};
