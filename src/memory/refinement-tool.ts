import { z } from "zod";
import type { AuditStore } from "../store/audit-store.js";
import type { AgentStore } from "../store/agent-store.js";
import type { MemoryStore } from "../store/memory-store.js";
import type { Agent, AgentMemory } from "../store/types.js";
import type { Logger } from "../logging/logger.js";
import type { AgentTool, ToolResult } from "../tools/types.js";
import { formatDate } from "./context.js";

export const REFINEMENT_ACTIONS = ["search", "consolidate", "update", "delete", "protect", "complete"] as const;

const argsSchema = z.object({
  action: z.enum(REFINEMENT_ACTIONS),
  query: z.string().optional(),
  ids: z.union([z.string(), z.array(z.string())]).optional(),
  id: z.string().optional(),
  content: z.string().optional(),
  summary: z.string().optional(),
});

type RefinementArgs = z.infer<typeof argsSchema>;

export interface RefinementStats {
  consolidated: number;
  updated: number;
  deleted: number;
  protected: number;
}

export interface RefinementToolDeps {
  readonly agent: Agent;
  readonly memories: MemoryStore;
  readonly agents: AgentStore;
  readonly audit: AuditStore;
  readonly operationCap: number;
  readonly logger: Logger;
}

function normalizeId(id: string): string {
  return id.trim().replace(/^#/, "");
}

function splitIds(ids: string | string[] | undefined): string[] {
  if (ids === undefined) return [];
  const list = Array.isArray(ids) ? ids : ids.split(",");
  return [...new Set(list.map(normalizeId).filter((id) => id !== ""))];
}

export function ledgerEntry(memory: AgentMemory): string {
  const flag = memory.constitutional ? " [CONSTITUTIONAL]" : "";
  return `- #${memory.id} (${formatDate(memory.createdAt)}, ~${memory.tokenEstimate} tokens)${flag}: ${memory.content}`;
}

function reply(payload: Record<string, unknown>): ToolResult {
  return { content: JSON.stringify(payload) };
}

function error(message: string): ToolResult {
  return reply({ type: "error", error: message });
}

/**
 * The `memory_refinement` tool an agent uses during a refinement session to
 * edit its own core memories.
 */
export class RefinementTool implements AgentTool {
  readonly name = "memory_refinement";
  readonly description =
    "Refine your core memories. Actions: search, consolidate, update, delete, protect, complete.";
  readonly parameters = {
    type: "object",
    properties: {
      action: { type: "string", enum: [...REFINEMENT_ACTIONS] },
      query: { type: "string", description: "Text to look for (search)" },
      ids: { type: "string", description: "Comma-separated memory ids (consolidate)" },
      id: { type: "string", description: "Memory id (update, delete, protect)" },
      content: { type: "string", description: "New content (consolidate, update)" },
      summary: { type: "string", description: "What the session changed (complete)" },
    },
    required: ["action"],
  };

  readonly stats: RefinementStats = { consolidated: 0, updated: 0, deleted: 0, protected: 0 };
  private operations = 0;
  private isComplete = false;

  constructor(private readonly deps: RefinementToolDeps) {}

  get completed(): boolean {
    return this.isComplete;
  }

  get operationCount(): number {
    return this.operations;
  }

  async execute(rawArgs: Record<string, unknown>): Promise<ToolResult> {
    const parsed = argsSchema.safeParse(rawArgs);
    if (!parsed.success) {
      return reply({ type: "error", error: "Invalid arguments", allowed_actions: REFINEMENT_ACTIONS });
    }
    const args = parsed.data;
    this.deps.logger.info({ agentId: this.deps.agent.id, action: args.action }, "Refinement action");

    if (args.action === "search") return this.search(args);
    if (args.action === "complete") return this.complete(args);

    if (this.operations >= this.deps.operationCap) {
      return error(`Operation limit of ${this.deps.operationCap} reached; call complete`);
    }
    if (args.action === "consolidate") return this.consolidate(args);
    if (args.action === "update") return this.update(args);
    if (args.action === "delete") return this.remove(args);
    return this.protect(args);
  }

  private search(args: RefinementArgs): ToolResult {
    const query = args.query?.trim();
    if (!query) return error("query is required for search");
    const results = this.deps.memories
      .search(this.deps.agent.id, query)
      .filter((m) => m.memoryType === "core")
      .map(ledgerEntry);
    return reply({ type: "search_results", query, count: results.length, results });
  }

  private consolidate(args: RefinementArgs): ToolResult {
    const ids = splitIds(args.ids);
    const content = args.content?.trim();
    if (ids.length === 0) return error("ids is required for consolidate");
    if (!content) return error("content is required for consolidate");
    if (ids.length < 2) return error("consolidate requires at least 2 memory ids");

    const sources = ids.flatMap((id) => {
      const memory = this.findCore(id);
      return memory ? [memory] : [];
    });
    if (sources.length < 2) return error("consolidate requires at least 2 existing core memories");

    const constitutional = sources.filter((m) => m.constitutional);
    if (constitutional.length > 0) {
      return error(`Cannot consolidate constitutional memories: ${constitutional.map((m) => m.id).join(", ")}`);
    }

    const merged = this.deps.memories.merge(this.deps.agent.id, sources, content);
    this.recordOperation("consolidate", merged.id, {
      merged: sources.map((m) => ({ id: m.id, content: m.content })),
      result: { id: merged.id, content: merged.content },
    });
    this.stats.consolidated += sources.length;
    return reply({ type: "consolidated", merged_count: sources.length, id: merged.id, new_content: merged.content });
  }

  private update(args: RefinementArgs): ToolResult {
    const content = args.content?.trim();
    if (!args.id) return error("id is required for update");
    if (!content) return error("content is required for update");
    const memory = this.findCore(args.id);
    if (!memory) return error(`Memory #${normalizeId(args.id)} not found`);

    this.deps.memories.updateContent(memory.id, content);
    this.recordOperation("update", memory.id, { before: memory.content, after: content });
    this.stats.updated++;
    return reply({ type: "updated", id: memory.id, content });
  }

  private remove(args: RefinementArgs): ToolResult {
    if (!args.id) return error("id is required for delete");
    const memory = this.findCore(args.id);
    if (!memory) return error(`Memory #${normalizeId(args.id)} not found`);
    if (memory.constitutional) return error(`Cannot delete constitutional memory #${memory.id}`);

    this.deps.memories.discard(memory.id);
    this.recordOperation("delete", memory.id, { before: memory.content, after: null });
    this.stats.deleted++;
    return reply({ type: "deleted", id: memory.id });
  }

  private protect(args: RefinementArgs): ToolResult {
    if (!args.id) return error("id is required for protect");
    const memory = this.findCore(args.id);
    if (!memory) return error(`Memory #${normalizeId(args.id)} not found`);

    this.deps.memories.protect(memory.id);
    this.recordOperation("protect", memory.id, {});
    this.stats.protected++;
    return reply({ type: "protected", id: memory.id, content: memory.content });
  }

  private complete(args: RefinementArgs): ToolResult {
    const summary = args.summary?.trim();
    if (!summary) return error("summary is required for complete");

    const { agent } = this.deps;
    this.deps.audit.record({
      action: "memory_refinement_complete",
      accountId: agent.accountId,
      agentId: agent.id,
      subjectType: "agent",
      subjectId: agent.id,
      data: { summary, stats: { ...this.stats } },
    });
    this.deps.memories.create({ agentId: agent.id, memoryType: "journal", content: `Refinement session: ${summary}` });
    this.deps.agents.markRefined(agent.id);
    this.isComplete = true;
    return reply({ type: "refinement_complete", summary, stats: { ...this.stats } });
  }

  private findCore(id: string): AgentMemory | null {
    const memory = this.deps.memories.findLive(this.deps.agent.id, normalizeId(id));
    return memory?.memoryType === "core" ? memory : null;
  }

  private recordOperation(operation: string, memoryId: string, data: Record<string, unknown>): void {
    this.operations++;
    this.deps.audit.record({
      action: `memory_refinement_${operation}`,
      accountId: this.deps.agent.accountId,
      agentId: this.deps.agent.id,
      subjectType: "agent_memory",
      subjectId: memoryId,
      data: { operation, ...data },
    });
  }
}
