import type { Logger } from "../logging/logger.js";
import type { ModelClient } from "../providers/types.js";
import type { AgentStore } from "../store/agent-store.js";
import type { MemoryStore } from "../store/memory-store.js";
import type { AgentMemory } from "../store/types.js";
import { formatDate } from "./context.js";
import { parsePromotions } from "./extraction.js";
import { fillTemplate, REFLECTION_PROMPT } from "./prompts.js";

export interface ReflectorDeps {
  readonly agents: AgentStore;
  readonly memories: MemoryStore;
  readonly models: ModelClient;
  readonly logger: Logger;
}

export function formatCoreList(core: readonly AgentMemory[]): string {
  if (core.length === 0) return "None yet. You are still forming your identity.";
  return core.map((m) => `- ${m.content}`).join("\n");
}

export function formatJournalList(journal: readonly AgentMemory[]): string {
  return journal.map((m, i) => `${i + 1}. [${formatDate(m.createdAt)}] ${m.content}`).join("\n");
}

/** Lets each agent promote journal entries it considers lasting to core memories. */
export class Reflector {
  private readonly logger: Logger;

  constructor(private readonly deps: ReflectorDeps) {
    this.logger = deps.logger.child({ component: "reflector" });
  }

  async sweep(): Promise<number> {
    const agentIds = this.deps.memories.agentIdsWithLiveJournal();
    this.logger.info({ agents: agentIds.length }, "Reflection sweep starting");
    let promoted = 0;
    for (const agentId of agentIds) {
      try {
        promoted += await this.reflect(agentId);
      } catch (err) {
        this.logger.error({ err, agentId }, "Reflection failed for agent");
      }
    }
    this.logger.info({ agents: agentIds.length, promoted }, "Reflection sweep finished");
    return promoted;
  }

  /** Returns how many journal entries became core. */
  async reflect(agentId: string): Promise<number> {
    const agent = this.deps.agents.getAgent(agentId);
    if (!agent) return 0;
    const journal = this.deps.memories.listLiveJournal(agent.id);
    if (journal.length === 0) return 0;

    const prompt = fillTemplate(REFLECTION_PROMPT, {
      core_memories: formatCoreList(this.deps.memories.listCore(agent.id)),
      journal_entries: formatJournalList(journal),
    });
    const reply = await this.deps.models.ask(agent.modelId, [{ role: "user", content: prompt }]);

    const indices = parsePromotions(reply, journal.length);
    if (indices === null) {
      this.logger.warn({ agentId }, "Unparseable reflection reply, promoting nothing");
      return 0;
    }

    const ids = indices.flatMap((i) => {
      const entry = journal[i - 1];
      return entry ? [entry.id] : [];
    });
    const promoted = ids.length > 0 ? this.deps.memories.promote(ids) : 0;
    if (promoted > 0) this.logger.info({ agentId, promoted }, "Journal entries promoted to core");
    return promoted;
  }
}
