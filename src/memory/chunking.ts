import { estimateTokens } from "../utils/text.js";

/**
 * Splits items into consecutive chunks whose token estimates stay within
 * `targetTokens`. An item larger than the target gets a chunk to itself.
 */
export function chunkByTokens<T>(items: readonly T[], text: (item: T) => string, targetTokens: number): T[][] {
  const chunks: T[][] = [];
  let current: T[] = [];
  let currentTokens = 0;

  for (const item of items) {
    const tokens = estimateTokens(text(item));
    if (current.length > 0 && currentTokens + tokens > targetTokens) {
      chunks.push(current);
      current = [];
      currentTokens = 0;
    }
    current.push(item);
    currentTokens += tokens;
  }

  if (current.length > 0) chunks.push(current);
  return chunks;
}
