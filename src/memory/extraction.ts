import { z } from "zod";
import { tryParseJson, stripCodeFence } from "../utils/json.js";

export interface Extraction {
  readonly journal: string[];
  readonly core: string[];
}

export const EMPTY_EXTRACTION: Extraction = { journal: [], core: [] };

const textList = z
  .array(z.unknown())
  .optional()
  .transform((items) =>
    (items ?? [])
      .filter((item): item is string | number => typeof item === "string" || typeof item === "number")
      .map((item) => String(item).trim())
      .filter((item) => item !== ""),
  );

const extractionSchema = z.object({ journal: textList, core: textList });

const reflectionSchema = z.object({ promote: z.array(z.unknown()) });

/** Journal and core entries from an extraction reply; null when it is not the expected JSON. */
export function parseExtraction(text: string): Extraction | null {
  const parsed = tryParseJson(stripCodeFence(text));
  if (!parsed.ok) return null;
  const result = extractionSchema.safeParse(parsed.value);
  return result.success ? result.data : null;
}

/**
 * Valid 1-based indices into a list of `count` entries, deduplicated in
 * reply order; null when the reply is not the expected JSON.
 */
function toIndex(value: unknown): number | null {
  if (typeof value === "number") return Number.isInteger(value) ? value : null;
  if (typeof value === "string" && /^\s*\d+\s*$/.test(value)) return Number.parseInt(value, 10);
  return null;
}

export function parsePromotions(text: string, count: number): number[] | null {
  const parsed = tryParseJson(stripCodeFence(text));
  if (!parsed.ok) return null;
  const result = reflectionSchema.safeParse(parsed.value);
  if (!result.success) return null;

  const indices = new Set<number>();
  for (const value of result.data.promote) {
    const index = toIndex(value);
    if (index === null || index < 1 || index > count) continue;
    indices.add(index);
  }
  return [...indices];
}
