import { RsiRunService } from "../services/rsiRunService";
import {
  env,
  rsiProvider,
  snapshotStore,
  timeframes,
} from "../../shared/config/env";
import { createDb } from "../../infra/db/client";
import { PostgresSnapshotRepository } from "../../infra/db/repositories";
import { MockRsiProvider } from "../../infra/providers/mocks/mockRsiProvider";
import { TechnicalsPageRsiProvider } from "../../infra/providers/technicals/technicalsPageRsiProvider";
import { BullMqRunQueue } from "../../infra/queue/bullMqQueue";
import { redisConfigFromUrl } from "../../infra/queue/redisConfig";
import { FileReportPublisher } from "../../infra/report/fileReportPublisher";
import { FileSnapshotRepository } from "../../infra/storage/fileSnapshotRepository";
import {
  MathRandom,
  SystemClock,
  TimerSleeper,
  UuidIdGenerator,
} from "../../infra/system/systemPorts";
import { FileUniverseProvider } from "../../infra/universe/fileUniverseProvider";
import type { RsiProviderPort } from "../../core/ports/inboundPorts";
import type {
  RandomPort,
  SleepPort,
  SnapshotRepositoryPort,
} from "../../core/ports/outboundPorts";

/**
 * Resolves the configured page adapter while preserving a mock fallback for local development.
 */
const createRsiProvider = (
  sleeper: SleepPort,
  random: RandomPort,
): RsiProviderPort => {
  if (rsiProvider() === "technicals") {
    return new TechnicalsPageRsiProvider(
      {
        urlTemplate: env.RSI_PAGE_URL_TEMPLATE,
        userAgent: env.RSI_HTTP_USER_AGENT,
        timeoutMs: env.RSI_HTTP_TIMEOUT_MS,
        retries: env.RSI_HTTP_RETRIES,
        retryDelayMs: env.RSI_HTTP_RETRY_DELAY_MS,
        timeframeDelayMs: env.RSI_TIMEFRAME_DELAY_MS,
      },
      sleeper,
      random,
    );
  }

  return new MockRsiProvider();
};

const createSnapshotStore = (): {
  snapshots: SnapshotRepositoryPort;
  close: () => Promise<void>;
} => {
  if (snapshotStore() === "postgres") {
    const { db, sql } = createDb(env.POSTGRES_URL);
    return {
      snapshots: new PostgresSnapshotRepository(db, new UuidIdGenerator()),
      close: () => sql.end(),
    };
  }

  return {
    snapshots: new FileSnapshotRepository(
      env.SNAPSHOT_DATA_DIR,
      env.SNAPSHOT_LATEST_PATH,
    ),
    close: async () => {},
  };
};

/**
 * Centralizes runtime wiring so CLI and worker entry points share one composition root.
 */
export const createRuntime = () => {
  const clock = new SystemClock();
  const sleeper = new TimerSleeper();
  const random = new MathRandom();

  const universeProvider = new FileUniverseProvider(env.RSI_UNIVERSE_PATH);
  const provider = createRsiProvider(sleeper, random);
  const { snapshots, close } = createSnapshotStore();
  const reports = new FileReportPublisher(
    env.REPORT_HTML_PATH,
    env.REPORT_TIME_ZONE,
  );

  const runService = new RsiRunService(
    universeProvider,
    provider,
    timeframes(),
    snapshots,
    reports,
    sleeper,
    random,
    clock,
    env.REPORT_TIME_ZONE,
  );

  return {
    provider,
    universeProvider,
    snapshots,
    runService,
    close,
  };
};

export const createRunQueue = () =>
  new BullMqRunQueue(redisConfigFromUrl(env.REDIS_URL));
