import { beforeEach, describe, expect, it, vi } from "vitest";
import { BullMqRunQueue, defaultJobOptions } from "./bullMqQueue";

const calls = vi.hoisted(() => {
  const constructed: Array<{ name: string; options: unknown }> = [];
  const added: Array<{ name: string; data: unknown }> = [];
  const schedulers: Array<{ id: string; repeat: unknown; template: unknown }> =
    [];
  return { constructed, added, schedulers };
});

vi.mock("bullmq", () => {
  class Queue {
    constructor(name: string, options: unknown) {
      calls.constructed.push({ name, options });
    }

    async add(name: string, data: unknown) {
      calls.added.push({ name, data });
    }

    async upsertJobScheduler(id: string, repeat: unknown, template: unknown) {
      calls.schedulers.push({ id, repeat, template });
    }

    async removeJobScheduler() {
      return true;
    }

    async getJobCounts() {
      return { waiting: 2, failed: 1 };
    }

    async close() {}
  }

  class Worker {}

  return { Queue, Worker };
});

describe("BullMqRunQueue", () => {
  beforeEach(() => {
    calls.constructed.length = 0;
    calls.added.length = 0;
    calls.schedulers.length = 0;
  });

  it("creates the run queue with default job options", () => {
    new BullMqRunQueue({ host: "localhost", port: 6379 });

    expect(calls.constructed).toEqual([
      {
        name: "rsi-run",
        options: {
          connection: { host: "localhost", port: 6379 },
          defaultJobOptions,
        },
      },
    ]);
  });

  it("enqueues manual runs", async () => {
    const queue = new BullMqRunQueue({ host: "localhost", port: 6379 });

    await queue.enqueueRun({
      requestedAt: "2026-03-02T11:30:00.000Z",
      trigger: "manual",
    });

    expect(calls.added).toEqual([
      {
        name: "rsi-run",
        data: { requestedAt: "2026-03-02T11:30:00.000Z", trigger: "manual" },
      },
    ]);
  });

  it("upserts one cron scheduler in the report time zone", async () => {
    const queue = new BullMqRunQueue({ host: "localhost", port: 6379 });

    await queue.schedule("0 17 * * 1-5", "Asia/Colombo");

    expect(calls.schedulers).toHaveLength(1);
    expect(calls.schedulers[0]?.id).toBe("rsi-daily-run");
    expect(calls.schedulers[0]?.repeat).toEqual({
      pattern: "0 17 * * 1-5",
      tz: "Asia/Colombo",
    });
    expect(calls.schedulers[0]?.template).toMatchObject({
      name: "rsi-run",
      data: { trigger: "schedule" },
    });
  });

  it("fills missing counters with zero", async () => {
    const queue = new BullMqRunQueue({ host: "localhost", port: 6379 });

    await expect(queue.getQueueCounts()).resolves.toEqual({
      waiting: 2,
      active: 0,
      completed: 0,
      failed: 1,
      delayed: 0,
      paused: 0,
    });
  });
});
