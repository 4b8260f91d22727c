import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { Universe } from "../../core/entities/instrument";
import type { UniverseProviderPort } from "../../core/ports/inboundPorts";

const universeSchema = z.object({
  name: z.string().default(""),
  displayPrefix: z.string().default(""),
  instruments: z
    .array(
      z.object({
        symbol: z.string().trim().min(1),
        company: z.string().trim().default(""),
      }),
    )
    .superRefine((instruments, ctx) => {
      const seen = new Set<string>();
      for (const [index, instrument] of instruments.entries()) {
        if (seen.has(instrument.symbol)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, "symbol"],
            message: `Duplicate symbol ${instrument.symbol}`,
          });
        }
        seen.add(instrument.symbol);
      }
    }),
});

export const parseUniverse = (raw: unknown, origin: string): Universe => {
  const parsed = universeSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid universe file ${origin}: ${issues}`);
  }
  return parsed.data;
};

/**
 * Loads the instrument list from a JSON file on every run so edits apply without a restart.
 */
export class FileUniverseProvider implements UniverseProviderPort {
  constructor(private readonly path: string) {}

  async loadUniverse(): Promise<Universe> {
    const text = await readFile(this.path, "utf8");

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new Error(`Universe file ${this.path} is not valid JSON.`, {
        cause: error,
      });
    }

    return parseUniverse(raw, this.path);
  }
}

export const displaySymbol = (symbol: string, prefix: string): string =>
  prefix && symbol.startsWith(prefix) ? symbol.slice(prefix.length) : symbol;
