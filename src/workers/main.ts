import { createRuntime } from "../application/bootstrap/runtimeFactory";
import { createProgressLogger } from "../cli/progress";
import { createRunWorker } from "../infra/queue/bullMqQueue";
import { redisConfigFromUrl } from "../infra/queue/redisConfig";
import {
  env,
  rsiProvider,
  schedulerConfig,
  snapshotStore,
  timeframes,
} from "../shared/config/env";
import { toErrorDetails } from "../shared/errors/errorDetails";
import { logger } from "../shared/logger/logger";
import { severityMessage } from "../cli/runSummary";

const run = async (): Promise<void> => {
  const runtime = createRuntime();
  const redis = redisConfigFromUrl(env.REDIS_URL);
  const startedAtByJobId = new Map<string, number>();
  const shutdownController = new AbortController();

  logger.info(
    {
      provider: rsiProvider(),
      timeframes: timeframes(),
      scheduler: schedulerConfig(),
      snapshotStore: snapshotStore(),
      reportPath: env.REPORT_HTML_PATH,
      redisUrl: env.REDIS_URL,
    },
    "Worker runtime configuration",
  );

  const worker = createRunWorker(redis, async (payload) => {
    const result = await runtime.runService.execute({
      scheduler: schedulerConfig(),
      signal: shutdownController.signal,
      observer: createProgressLogger(
        logger.child({ trigger: payload.trigger }),
      ),
    });

    if (result.isErr()) {
      throw new Error(`Run produced no snapshot: ${result.error.code}`);
    }

    const { snapshot, severity, artifacts } = result.value;
    logger.info(
      {
        runDate: snapshot.runDate,
        totals: snapshot.totals,
        failedSymbols: snapshot.failedSymbols.length,
        artifacts,
      },
      "Run finished",
    );
    if (severity === "critical") {
      throw new Error(severityMessage(severity));
    }
    if (severity === "warning") {
      logger.warn(
        { successRate: snapshot.totals.successRate },
        severityMessage(severity),
      );
    }
  });

  worker.on("active", (job) => {
    if (!job.id) {
      return;
    }

    startedAtByJobId.set(job.id, Date.now());

    logger.info(
      {
        jobId: job.id,
        trigger: job.data.trigger,
        requestedAt: job.data.requestedAt,
      },
      "Worker job started",
    );
  });

  worker.on("failed", (job, error) => {
    const startedAt = job?.id ? startedAtByJobId.get(job.id) : undefined;
    const durationMs = startedAt ? Date.now() - startedAt : undefined;

    if (job?.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.error(
      {
        jobId: job?.id,
        trigger: job?.data.trigger,
        attemptsMade: job?.attemptsMade,
        durationMs,
        error: toErrorDetails(error),
      },
      "Worker job failed",
    );
  });

  worker.on("completed", (job) => {
    const startedAt = job.id ? startedAtByJobId.get(job.id) : undefined;
    const durationMs = startedAt ? Date.now() - startedAt : undefined;

    if (job.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.info(
      { jobId: job.id, trigger: job.data.trigger, durationMs },
      "Worker job completed",
    );
  });

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Worker shutting down");
    shutdownController.abort();
    await worker.close();
    await runtime.close();
    process.exit(0);
  };
  process.once("SIGINT", (signal) => {
    shutdown(signal).catch((error) => {
      logger.error({ error: toErrorDetails(error) }, "Worker shutdown failed");
      process.exit(1);
    });
  });
  process.once("SIGTERM", (signal) => {
    shutdown(signal).catch((error) => {
      logger.error({ error: toErrorDetails(error) }, "Worker shutdown failed");
      process.exit(1);
    });
  });

  logger.info("Worker online");
};

run().catch((error) => {
  logger.error({ error: toErrorDetails(error) }, "Worker bootstrap failed");
  process.exit(1);
});
