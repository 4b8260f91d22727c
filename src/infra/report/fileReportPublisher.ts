import { mkdir, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Universe } from "../../core/entities/instrument";
import type { RunSnapshot } from "../../core/entities/rsi";
import type { ReportPublisherPort } from "../../core/ports/outboundPorts";
import { renderReportHtml } from "./htmlReportRenderer";
import { buildReportModel } from "./reportModel";

export class FileReportPublisher implements ReportPublisherPort {
  constructor(
    private readonly path: string,
    private readonly timeZone: string,
  ) {}

  async publish(snapshot: RunSnapshot, universe: Universe): Promise<string> {
    const html = renderReportHtml(
      buildReportModel(snapshot, universe, this.timeZone),
    );

    await mkdir(dirname(this.path), { recursive: true });
    const temporary = `${this.path}.tmp`;
    await writeFile(temporary, html, "utf8");
    await rename(temporary, this.path);

    return this.path;
  }
}
