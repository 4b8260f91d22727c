import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { ZodType, ZodTypeDef } from "zod";
import type { RunSnapshot } from "../../core/entities/rsi";
import type { SnapshotRepositoryPort } from "../../core/ports/outboundPorts";
import {
  datedFileName,
  fromDocument,
  latestDocumentSchema,
  snapshotDocumentSchema,
  toLatestDocument,
  toSnapshotDocument,
} from "./snapshotDocument";

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

// Readers never observe a half-written document.
const writeJsonAtomically = async (path: string, value: unknown): Promise<void> => {
  await mkdir(dirname(path), { recursive: true });
  const temporary = `${path}.tmp`;
  await writeFile(temporary, `${JSON.stringify(value, null, 2)}\n`, "utf8");
  await rename(temporary, path);
};

/**
 * Stores each run as `<dataDir>/rsi_data_YYYY_MM_DD.json` plus a `latest` file holding successful entries.
 * A second run on the same date replaces that date's file.
 */
export class FileSnapshotRepository implements SnapshotRepositoryPort {
  constructor(
    private readonly dataDir: string,
    private readonly latestPath: string,
  ) {}

  datedPath(runDate: string): string {
    return join(this.dataDir, datedFileName(runDate));
  }

  async save(snapshot: RunSnapshot): Promise<string[]> {
    const datedPath = this.datedPath(snapshot.runDate);

    await writeJsonAtomically(datedPath, toSnapshotDocument(snapshot));
    await writeJsonAtomically(this.latestPath, toLatestDocument(snapshot));

    return [datedPath, this.latestPath];
  }

  /**
   * Prefers the full dated document behind `latest` so failed outcomes are available too.
   */
  async latest(): Promise<RunSnapshot | null> {
    const latest = await this.readDocument(this.latestPath, latestDocumentSchema);
    if (!latest) {
      return null;
    }

    const full = await this.readDocument(
      this.datedPath(latest.metadata.date),
      snapshotDocumentSchema,
    );
    return fromDocument(full ?? latest);
  }

  async byDate(runDate: string): Promise<RunSnapshot | null> {
    const document = await this.readDocument(
      this.datedPath(runDate),
      snapshotDocumentSchema,
    );
    return document ? fromDocument(document) : null;
  }

  private async readDocument<T>(
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
  ): Promise<T | null> {
    let text: string;
    try {
      text = await readFile(path, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new Error(`Snapshot file ${path} is not valid JSON.`, {
        cause: error,
      });
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new Error(`Snapshot file ${path} is malformed: ${issues}`);
    }
    return parsed.data;
  }
}
