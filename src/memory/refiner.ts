import type { MemoryConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { collectReply } from "../providers/model-client.js";
import type { ModelClient } from "../providers/types.js";
import type { AgentStore } from "../store/agent-store.js";
import type { AuditStore } from "../store/audit-store.js";
import type { MemoryStore } from "../store/memory-store.js";
import type { Agent } from "../store/types.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { isBlank, truncate } from "../utils/text.js";
import { buildMemoryContext } from "./context.js";
import {
  budgetLine,
  CONSENT_PROMPT,
  DEFAULT_REFINEMENT_GUIDANCE,
  fillTemplate,
  REFINEMENT_PROMPT,
} from "./prompts.js";
import { ledgerEntry, RefinementTool, type RefinementStats } from "./refinement-tool.js";

export interface RefinerDeps {
  readonly agents: AgentStore;
  readonly memories: MemoryStore;
  readonly audit: AuditStore;
  readonly models: ModelClient;
  readonly config: MemoryConfig;
  readonly logger: Logger;
  readonly clock?: Clock;
}

export type RefinementOutcome =
  | { readonly status: "no_core_memories" }
  | { readonly status: "declined"; readonly answer: string }
  | {
      readonly status: "refined";
      readonly completed: boolean;
      readonly operations: number;
      readonly stats: RefinementStats;
    };

/** Consent answers count as yes when their first word is YES, in any case. */
export function isConsent(answer: string): boolean {
  return /^yes\b/i.test(answer.trim());
}

/** Periodic, agent-consented cleanup of core memories. */
export class Refiner {
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(private readonly deps: RefinerDeps) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger.child({ component: "refiner" });
  }

  needsRefinement(agent: Agent): boolean {
    if (this.deps.memories.listCore(agent.id).length === 0) return false;
    if (this.deps.memories.coreTokenUsage(agent.id) > this.deps.config.coreTokenBudget) return true;
    if (agent.lastRefinementAt === null) return true;
    return this.clock() - agent.lastRefinementAt > this.deps.config.refinementIntervalMs;
  }

  async sweep(): Promise<number> {
    this.logger.info("Refinement sweep starting");
    let refined = 0;
    for (const agent of this.deps.agents.listActive()) {
      if (!this.needsRefinement(agent)) continue;
      try {
        const outcome = await this.refine(agent);
        if (outcome.status === "refined") refined++;
      } catch (err) {
        this.logger.error({ err, agentId: agent.id }, "Refinement failed for agent");
      }
    }
    this.logger.info({ refined }, "Refinement sweep finished");
    return refined;
  }

  async refineById(agentId: string): Promise<RefinementOutcome | null> {
    const agent = this.deps.agents.getAgent(agentId);
    if (!agent) {
      this.logger.warn({ agentId }, "Refinement skipped: agent not found");
      return null;
    }
    return this.refine(agent);
  }

  async refine(agent: Agent): Promise<RefinementOutcome> {
    const core = this.deps.memories.listCore(agent.id);
    if (core.length === 0) return { status: "no_core_memories" };

    const usage = this.deps.memories.coreTokenUsage(agent.id);
    const budget = this.deps.config.coreTokenBudget;
    const status = {
      system_prompt: agent.systemPrompt ?? "",
      count: String(core.length),
      usage: String(usage),
      budget: String(budget),
      budget_line: budgetLine(usage, budget),
    };

    const consentPrompt = fillTemplate(CONSENT_PROMPT, {
      ...status,
      memory_context: buildMemoryContext(core, this.deps.memories.listLiveJournal(agent.id)) ?? "",
    });
    const answer = (await this.deps.models.ask(agent.modelId, [{ role: "user", content: consentPrompt }])).trim();
    const consented = isConsent(answer);
    this.logger.info({ agentId: agent.id, consented, answer: truncate(answer, 200) }, "Refinement consent answer");
    if (!consented) return { status: "declined", answer };

    const tool = new RefinementTool({
      agent,
      memories: this.deps.memories,
      agents: this.deps.agents,
      audit: this.deps.audit,
      operationCap: this.deps.config.refinementOperationCap,
      logger: this.logger,
    });
    const prompt = fillTemplate(REFINEMENT_PROMPT, {
      ...status,
      refinement_guidance: isBlank(agent.refinementPrompt) ? DEFAULT_REFINEMENT_GUIDANCE : (agent.refinementPrompt ?? ""),
      ledger: core.map(ledgerEntry).join("\n"),
    });

    const session = this.deps.models
      .session(agent.modelId)
      .withTools([tool])
      .addMessage({ role: "user", content: prompt });
    await collectReply(session);

    if (!tool.completed) this.deps.agents.markRefined(agent.id);
    this.logger.info(
      { agentId: agent.id, completed: tool.completed, operations: tool.operationCount, stats: tool.stats },
      "Refinement session finished",
    );
    return { status: "refined", completed: tool.completed, operations: tool.operationCount, stats: { ...tool.stats } };
  }
}
