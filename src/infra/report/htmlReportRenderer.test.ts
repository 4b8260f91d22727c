import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import * as cheerio from "cheerio";
import { describe, expect, it } from "vitest";
import type { Universe } from "../../core/entities/instrument";
import type { ItemOutcome } from "../../core/entities/rsi";
import { aggregateOutcomes } from "../../application/services/resultAggregator";
import { FileReportPublisher } from "./fileReportPublisher";
import { embedJson, escapeHtml, renderReportHtml } from "./htmlReportRenderer";
import type { ReportModel } from "./reportModel";

const model: ReportModel = {
  exchange: "Colombo Stock Exchange",
  lastUpdate: "2026-03-09 17:00:05",
  timeZone: "Asia/Colombo",
  timeframes: ["1D", "1W"],
  rows: [
    { symbol: "HIGH", company: "High Flyers PLC", readings: [82.44, 50] },
    { symbol: "NONE", company: "No Data PLC", readings: [null, 40] },
    { symbol: "LOW", company: "Smith & <Sons> PLC", readings: [21.06, null] },
    { symbol: "MID", company: "Middle \"Road\" PLC", readings: [30, 61] },
  ],
  universeSize: 6,
  totals: { total: 6, success: 4, failed: 2, successRate: 4 / 6 },
};

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;",
    );
  });
});

describe("embedJson", () => {
  it("cannot close the surrounding script element", () => {
    expect(embedJson({ company: "</script><script>alert(1)</script>" })).toBe(
      '{"company":"\\u003c/script\\u003e\\u003cscript\\u003ealert(1)\\u003c/script\\u003e"}',
    );
  });
});

describe("renderReportHtml", () => {
  it("renders the first timeframe sorted by RSI with absent values last", () => {
    const $ = cheerio.load(renderReportHtml(model));

    const rows = $("#stockTableBody tr")
      .map((_, row) =>
        $(row)
          .find("td")
          .map((__, cell) => $(cell).text())
          .get()
          .join("|"),
      )
      .get();

    expect(rows).toEqual([
      "LOW|Smith & <Sons> PLC|21.1",
      "MID|Middle \"Road\" PLC|30.0",
      "HIGH|High Flyers PLC|82.4",
      "NONE|No Data PLC|--",
    ]);
  });

  it("colours cells with the same thresholds as the stat cards", () => {
    const $ = cheerio.load(renderReportHtml(model));

    expect(
      $("#stockTableBody td.rsi-cell")
        .map((_, cell) => $(cell).attr("class"))
        .get(),
    ).toEqual([
      "rsi-cell rsi-oversold",
      "rsi-cell rsi-neutral",
      "rsi-cell rsi-overbought",
      "rsi-cell no-data",
    ]);
    expect(
      $(".stat-card")
        .map((_, card) => `${$(card).attr("data-filter")}=${$(card).find(".stat-number").text()}`)
        .get(),
    ).toEqual(["oversold=1", "overbought=1", "neutral=1", "all=3"]);
  });

  it("escapes company names in the markup", () => {
    const html = renderReportHtml(model);

    expect(html).toContain(
      '<td class="company-cell">Smith &amp; &lt;Sons&gt; PLC</td>',
    );
  });

  it("shows the run status and a timeframe selector", () => {
    const $ = cheerio.load(renderReportHtml(model));

    expect($(".status-bar span").map((_, span) => $(span).text()).get()).toEqual([
      "Last update: 2026-03-09 17:00:05 (Asia/Colombo)",
      "Success rate: 66.7%",
      "Fetched: 4/6",
      "Failed: 2",
    ]);
    expect(
      $("#timeframeSelect option").map((_, option) => $(option).text()).get(),
    ).toEqual(["1 Day", "1 Week"]);
  });

  it("embeds rows the script can parse back", () => {
    const $ = cheerio.load(renderReportHtml(model));

    const payload: unknown = JSON.parse($("#report-data").text());

    expect(payload).toEqual({
      timeframes: ["1D", "1W"],
      oversoldBelow: 30,
      overboughtAbove: 70,
      rows: model.rows,
    });
  });
});

describe("FileReportPublisher", () => {
  it("writes the page and returns its path", async () => {
    const dir = await mkdtemp(join(tmpdir(), "report-"));
    try {
      const capturedAt = new Date("2026-03-09T11:30:05.000Z");
      const outcome: ItemOutcome = {
        symbol: "CSELK-ABAN.N0000",
        readings: { "1D": 25 },
        status: "success",
        successfulTimeframes: 1,
        attempts: 1,
        capturedAt,
      };
      const universe: Universe = {
        name: "Colombo Stock Exchange",
        displayPrefix: "CSELK-",
        instruments: [
          { symbol: "CSELK-ABAN.N0000", company: "ABANS ELECTRICALS PLC" },
        ],
      };
      const snapshot = aggregateOutcomes([outcome], ["1D"], {
        runDate: "2026-03-09",
        capturedAt,
        config: {
          batchSize: 50,
          maxWorkers: 1,
          perItemDelayMs: 2_000,
          interBatchDelayMs: 6_000,
          maxAttempts: 3,
          retryDelayMs: 3_000,
        },
      });
      const path = join(dir, "site", "index.html");

      const written = await new FileReportPublisher(path, "Asia/Colombo").publish(
        snapshot,
        universe,
      );

      expect(written).toBe(path);
      const $ = cheerio.load(await readFile(path, "utf8"));
      expect($("#stockTableBody .symbol-cell").text()).toBe("ABAN.N0000");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
