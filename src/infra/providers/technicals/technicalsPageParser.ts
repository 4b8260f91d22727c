import * as cheerio from "cheerio";
import type { IndicatorReading } from "../../../core/entities/rsi";
import { isValidReading } from "../../../application/services/readings";

const ROW_LABEL = "Relative Strength Index";
const ROW_ABBREVIATION = "RSI";

// Cell contents the page shows while the oscillator is still loading or unavailable.
const PLACEHOLDERS = new Set(["—", "", "N/A", "Loading...", "--"]);

/**
 * Reduces a cell to digits and decimal points before parsing; "45.2%" reads as 45.2, while "1.2.3" and
 * negative values read as absent.
 */
export const parseReadingText = (text: string): IndicatorReading => {
  const trimmed = text.trim();
  if (PLACEHOLDERS.has(trimmed)) {
    return null;
  }
  // Hyphen-minus or U+2212 minus sign.
  if (trimmed.startsWith("-") || trimmed.startsWith("\u2212")) {
    return null;
  }

  const cleaned = trimmed.replace(/[^\d.]/g, "");
  if (!cleaned || cleaned === ".") {
    return null;
  }

  const value = Number(cleaned);
  return isValidReading(value) ? value : null;
};

/**
 * Extracts the RSI value from a technicals page. Rows are matched by full label, then abbreviation, then
 * `data-field-key`; within a row the second cell is preferred and the last cell is the fallback.
 */
export const parseRsiFromPage = (html: string): IndicatorReading => {
  const $ = cheerio.load(html);
  const rows = $("tr");

  const byText = (needle: string) =>
    rows.filter((_, row) => $(row).text().includes(needle)).first();
  const byFieldKey = rows
    .filter((_, row) =>
      ($(row).attr("data-field-key") ?? "").includes(ROW_ABBREVIATION),
    )
    .first();

  for (const row of [byText(ROW_LABEL), byText(ROW_ABBREVIATION), byFieldKey]) {
    if (row.length === 0) {
      continue;
    }

    const cells = row.find("td");
    for (const cell of [cells.eq(1), cells.last()]) {
      const text = cell.text().trim();
      if (!PLACEHOLDERS.has(text)) {
        return parseReadingText(text);
      }
    }
  }

  return null;
};
