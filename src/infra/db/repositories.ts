import { asc, desc, eq } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import type { ItemOutcome, RunSnapshot } from "../../core/entities/rsi";
import type {
  IdGeneratorPort,
  SnapshotRepositoryPort,
} from "../../core/ports/outboundPorts";
import { outcomesTable, runsTable, type OutcomeRow, type RunRow } from "./schema";

const ratio = (numerator: number, denominator: number): number =>
  denominator === 0 ? 0 : numerator / denominator;

export const toRunRow = (id: string, snapshot: RunSnapshot): RunRow => ({
  id,
  runDate: snapshot.runDate,
  capturedAt: snapshot.capturedAt,
  timeframes: [...snapshot.timeframes],
  totalSymbols: snapshot.totals.total,
  successfulFetches: snapshot.totals.success,
  failedFetches: snapshot.totals.failed,
  timeframeStats: { ...snapshot.timeframeStats },
  schedulerConfig: { ...snapshot.config },
  failedSymbols: [...snapshot.failedSymbols],
});

export const toOutcomeRows = (
  runId: string,
  snapshot: RunSnapshot,
): OutcomeRow[] =>
  snapshot.outcomes.map((outcome, position) => ({
    id: `${runId}-${position}`,
    runId,
    position,
    symbol: outcome.symbol,
    readings: { ...outcome.readings },
    status: outcome.status,
    successfulTimeframes: outcome.successfulTimeframes,
    attempts: outcome.attempts,
    error: outcome.error ?? null,
    capturedAt: outcome.capturedAt,
  }));

/**
 * Rebuilds a snapshot from one run row and its outcome rows ordered by position.
 */
export const fromRows = (run: RunRow, rows: OutcomeRow[]): RunSnapshot => {
  const outcomes = rows.map((row): ItemOutcome => {
    const outcome: ItemOutcome = {
      symbol: row.symbol,
      readings: Object.freeze({ ...row.readings }),
      status: row.status === "success" ? "success" : "failed",
      successfulTimeframes: row.successfulTimeframes,
      attempts: row.attempts,
      capturedAt: row.capturedAt,
    };
    if (row.error !== null) {
      outcome.error = row.error;
    }
    return Object.freeze(outcome);
  });

  const snapshot: RunSnapshot = {
    runDate: run.runDate,
    capturedAt: run.capturedAt,
    timeframes: Object.freeze([...run.timeframes]),
    totals: {
      total: run.totalSymbols,
      success: run.successfulFetches,
      failed: run.failedFetches,
      successRate: ratio(run.successfulFetches, run.totalSymbols),
    },
    timeframeStats: Object.freeze({ ...run.timeframeStats }),
    outcomes: Object.freeze(outcomes),
    failedSymbols: Object.freeze([...run.failedSymbols]),
    config: { ...run.schedulerConfig },
  };
  return Object.freeze(snapshot);
};

/**
 * Keeps every run as its own row set so history queries span runs; the file store keeps one per date.
 */
export class PostgresSnapshotRepository implements SnapshotRepositoryPort {
  constructor(
    private readonly db: PostgresJsDatabase<Record<string, never>>,
    private readonly ids: IdGeneratorPort,
  ) {}

  async save(snapshot: RunSnapshot): Promise<string[]> {
    const runId = this.ids.next();

    await this.db.transaction(async (tx) => {
      await tx.insert(runsTable).values(toRunRow(runId, snapshot));
      const rows = toOutcomeRows(runId, snapshot);
      if (rows.length > 0) {
        await tx.insert(outcomesTable).values(rows);
      }
    });

    return [`postgres:rsi_runs/${runId}`];
  }

  async latest(): Promise<RunSnapshot | null> {
    const [run] = await this.db
      .select()
      .from(runsTable)
      .orderBy(desc(runsTable.capturedAt))
      .limit(1);

    return run ? this.withOutcomes(run) : null;
  }

  async byDate(runDate: string): Promise<RunSnapshot | null> {
    const [run] = await this.db
      .select()
      .from(runsTable)
      .where(eq(runsTable.runDate, runDate))
      .orderBy(desc(runsTable.capturedAt))
      .limit(1);

    return run ? this.withOutcomes(run) : null;
  }

  private async withOutcomes(run: RunRow): Promise<RunSnapshot> {
    const rows = await this.db
      .select()
      .from(outcomesTable)
      .where(eq(outcomesTable.runId, run.id))
      .orderBy(asc(outcomesTable.position));

    return fromRows(run, rows);
  }
}
