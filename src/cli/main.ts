import { Command } from "commander";
import {
  createRunQueue,
  createRuntime,
} from "../application/bootstrap/runtimeFactory";
import {
  env,
  rsiProvider,
  schedulerConfig,
  snapshotStore,
  timeframes,
} from "../shared/config/env";
import { displaySymbol } from "../infra/universe/fileUniverseProvider";
import { logger } from "../shared/logger/logger";
import { assertYYYYMMDD } from "../shared/time/date";
import { createProgressLogger } from "./progress";
import { resolveRunOptions, type RunCommandOptions } from "./runOptions";
import {
  exitCodeFor,
  formatRunSummary,
  formatSnapshotReport,
  severityMessage,
} from "./runSummary";

const runCommand = async (opts: RunCommandOptions): Promise<void> => {
  const options = resolveRunOptions(
    opts,
    schedulerConfig(),
    env.RSI_INTER_BATCH_DELAY_MS,
  );
  const runtime = createRuntime();
  const controller = new AbortController();
  const cancel = (signal: NodeJS.Signals) => {
    logger.warn({ signal }, "Cancelling run after in-flight symbols");
    controller.abort();
  };
  process.once("SIGINT", cancel);
  process.once("SIGTERM", cancel);

  const startedAt = Date.now();
  try {
    logger.info(
      {
        provider: runtime.provider.name,
        timeframes: timeframes(),
        scheduler: options.scheduler,
        resumeFrom: options.resumeFrom,
        maxSymbols: options.maxSymbols,
        conservative: Boolean(opts.conservative),
      },
      "Run started",
    );

    const result = await runtime.runService.execute({
      scheduler: options.scheduler,
      resumeFrom: options.resumeFrom,
      maxSymbols: options.maxSymbols,
      signal: controller.signal,
      observer: createProgressLogger(logger),
    });
    const elapsedMs = Date.now() - startedAt;

    if (result.isErr()) {
      const failure = result.error;
      if (failure.code === "empty_universe") {
        logger.error(
          {
            universeSize: failure.universeSize,
            resumeFrom: failure.resumeFrom,
          },
          "No symbols selected for this run",
        );
      } else {
        const universe = await runtime.universeProvider.loadUniverse();
        console.log(
          formatRunSummary(failure.snapshot, elapsedMs, universe.displayPrefix),
        );
        logger.error(
          {
            code: failure.code,
            total: failure.snapshot.totals.total,
            success: failure.snapshot.totals.success,
          },
          failure.code === "cancelled"
            ? "Run cancelled; previous snapshot and report left in place"
            : "No RSI data retrieved; previous snapshot and report left in place",
        );
      }
    } else {
      const { snapshot, severity, artifacts, universe } = result.value;
      console.log(formatRunSummary(snapshot, elapsedMs, universe.displayPrefix));
      logger.info({ artifacts }, "Run artifacts written");

      const message = severityMessage(severity);
      if (severity === "critical") {
        logger.error({ successRate: snapshot.totals.successRate }, message);
      } else if (severity === "warning") {
        logger.warn({ successRate: snapshot.totals.successRate }, message);
      }
    }

    process.exitCode = exitCodeFor(result);
  } finally {
    process.off("SIGINT", cancel);
    process.off("SIGTERM", cancel);
    await runtime.close();
  }
};

/**
 * Defines a single command surface so operational tasks use the same orchestration policies.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("rsi-monitor")
    .description("Multi-timeframe RSI collection for an equity universe");

  cli
    .command("run")
    .description("Fetch RSI readings for the universe and publish snapshot and report")
    .option("--batch-size <n>", "Symbols per batch")
    .option("--max-workers <n>", "Symbols in flight within a batch")
    .option("--rate-limit <seconds>", "Pause between symbols in a batch")
    .option("--retry-count <n>", "Attempts per symbol")
    .option("--max-stocks <n>", "Cap on symbols processed")
    .option("--resume-from <index>", "Zero-based universe index to start at")
    .option(
      "--conservative",
      "Small batches, one worker and at least 4s between symbols",
    )
    .action(runCommand);

  cli
    .command("snapshot")
    .description("Show the latest stored snapshot")
    .option("--date <date>", "Stored run date (YYYY-MM-DD)")
    .option("--prettify", "Render a human-friendly snapshot report")
    .action(async (opts: { date?: string; prettify?: boolean }) => {
      const runtime = createRuntime();
      try {
        if (opts.date) {
          assertYYYYMMDD(opts.date);
        }
        const snapshot = opts.date
          ? await runtime.snapshots.byDate(opts.date)
          : await runtime.snapshots.latest();
        if (!snapshot) {
          logger.info({ date: opts.date }, "No snapshot found");
          return;
        }

        if (opts.prettify) {
          const universe = await runtime.universeProvider.loadUniverse();
          console.log(formatSnapshotReport(snapshot, universe.displayPrefix));
        } else {
          logger.info({ snapshot }, "Latest snapshot");
        }
      } finally {
        await runtime.close();
      }
    });

  cli
    .command("symbols")
    .description("List the configured universe with resume indexes")
    .action(async () => {
      const runtime = createRuntime();
      try {
        const universe = await runtime.universeProvider.loadUniverse();
        universe.instruments.forEach((instrument, index) => {
          console.log(
            `${index}\t${displaySymbol(instrument.symbol, universe.displayPrefix)}\t${instrument.company}`,
          );
        });
        logger.info(
          { exchange: universe.name, count: universe.instruments.length },
          "Universe loaded",
        );
      } finally {
        await runtime.close();
      }
    });

  cli
    .command("enqueue")
    .description("Queue one run for the worker")
    .action(async () => {
      const queue = createRunQueue();
      try {
        await queue.enqueueRun({
          requestedAt: new Date().toISOString(),
          trigger: "manual",
        });
        logger.info("Enqueued run");
      } finally {
        await queue.close();
      }
    });

  cli
    .command("schedule")
    .description("Register the repeatable run with the worker queue")
    .option("--cron <pattern>", "Cron pattern in the report time zone")
    .option("--remove", "Remove the repeatable run instead")
    .action(async (opts: { cron?: string; remove?: boolean }) => {
      const queue = createRunQueue();
      try {
        if (opts.remove) {
          const removed = await queue.unschedule();
          logger.info({ removed }, "Removed scheduled run");
          return;
        }

        const pattern = opts.cron ?? env.RSI_SCHEDULE_CRON;
        await queue.schedule(pattern, env.REPORT_TIME_ZONE);
        logger.info(
          { pattern, timeZone: env.REPORT_TIME_ZONE },
          "Scheduled run registered",
        );
      } finally {
        await queue.close();
      }
    });

  cli
    .command("status")
    .description("Report effective configuration and queue counts")
    .action(async () => {
      const queue = createRunQueue();
      const queueCounts = await queue.getQueueCounts();
      await queue.close();

      logger.info(
        {
          provider: rsiProvider(),
          urlTemplate: env.RSI_PAGE_URL_TEMPLATE,
          timeframes: timeframes(),
          scheduler: schedulerConfig(),
          universePath: env.RSI_UNIVERSE_PATH,
          snapshotStore: snapshotStore(),
          snapshotDataDir: env.SNAPSHOT_DATA_DIR,
          latestPath: env.SNAPSHOT_LATEST_PATH,
          reportPath: env.REPORT_HTML_PATH,
          timeZone: env.REPORT_TIME_ZONE,
          scheduleCron: env.RSI_SCHEDULE_CRON,
          redis: env.REDIS_URL,
          postgres: env.POSTGRES_URL,
          queueCounts,
          startupWorkflow: [
            "npm run run:once -- --max-stocks 10",
            "start Redis at REDIS_URL",
            "npm run worker",
            "npm start -- schedule",
          ],
        },
        "Runtime status",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
