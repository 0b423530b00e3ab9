import type { AgentMemory } from "../store/types.js";

export function formatDate(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}

/**
 * Prompt section describing what the agent remembers, or null when it
 * remembers nothing.
 */
export function buildMemoryContext(core: readonly AgentMemory[], journal: readonly AgentMemory[]): string | null {
  if (core.length === 0 && journal.length === 0) return null;

  const sections = ["## Your memories"];
  if (core.length > 0) {
    sections.push(["### Core memories", ...core.map((m) => `- ${m.content}`)].join("\n"));
  }
  if (journal.length > 0) {
    sections.push(
      ["### Recent journal", ...journal.map((m) => `- [${formatDate(m.createdAt)}] ${m.content}`)].join("\n"),
    );
  }
  return sections.join("\n\n");
}
