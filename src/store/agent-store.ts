import { randomUUID } from "node:crypto";
import type { ColloquyDB } from "./db.js";
import type { Agent } from "./types.js";
import { fromBool, parseStringList, toBool } from "./rows.js";
import { systemClock, type Clock } from "../utils/clock.js";

interface AgentRow {
  id: string;
  account_id: string;
  name: string;
  system_prompt: string | null;
  reflection_prompt: string | null;
  refinement_prompt: string | null;
  model_id: string;
  thinking_enabled: number;
  thinking_budget: number | null;
  enabled_tools: string;
  active: number;
  initiation_cap: number | null;
  last_refinement_at: number | null;
  created_at: number;
}

export interface CreateAgentParams {
  accountId: string;
  name: string;
  modelId: string;
  systemPrompt?: string | null;
  reflectionPrompt?: string | null;
  refinementPrompt?: string | null;
  thinkingEnabled?: boolean;
  thinkingBudget?: number | null;
  enabledTools?: string[];
  active?: boolean;
  initiationCap?: number | null;
}

export class AgentStore {
  private readonly db;

  constructor(
    colloquyDb: ColloquyDB,
    private readonly clock: Clock = systemClock,
  ) {
    this.db = colloquyDb.raw();
  }

  createAgent(params: CreateAgentParams): Agent {
    const id = randomUUID();
    this.db
      .prepare(
        `INSERT INTO agents (id, account_id, name, system_prompt, reflection_prompt, refinement_prompt,
           model_id, thinking_enabled, thinking_budget, enabled_tools, active, initiation_cap, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        params.accountId,
        params.name,
        params.systemPrompt ?? null,
        params.reflectionPrompt ?? null,
        params.refinementPrompt ?? null,
        params.modelId,
        fromBool(params.thinkingEnabled),
        params.thinkingBudget ?? null,
        JSON.stringify(params.enabledTools ?? []),
        fromBool(params.active ?? true),
        params.initiationCap ?? null,
        this.clock(),
      );
    const agent = this.getAgent(id);
    if (!agent) throw new Error(`Agent ${id} vanished after insert`);
    return agent;
  }

  getAgent(id: string): Agent | null {
    const row = this.db.prepare<[string], AgentRow>("SELECT * FROM agents WHERE id = ?").get(id);
    return row ? this.toAgent(row) : null;
  }

  findInAccount(id: string, accountId: string): Agent | null {
    const row = this.db
      .prepare<[string, string], AgentRow>("SELECT * FROM agents WHERE id = ? AND account_id = ?")
      .get(id, accountId);
    return row ? this.toAgent(row) : null;
  }

  listForChat(chatId: string): Agent[] {
    return this.db
      .prepare<[string], AgentRow>(
        `SELECT a.* FROM agents a
         JOIN chat_agents ca ON ca.agent_id = a.id
         WHERE ca.chat_id = ?
         ORDER BY ca.position, a.created_at`,
      )
      .all(chatId)
      .map((r) => this.toAgent(r));
  }

  listActive(): Agent[] {
    return this.db
      .prepare<[], AgentRow>("SELECT * FROM agents WHERE active = 1 ORDER BY created_at")
      .all()
      .map((r) => this.toAgent(r));
  }

  listInAccount(accountId: string): Agent[] {
    return this.db
      .prepare<[string], AgentRow>("SELECT * FROM agents WHERE account_id = ? ORDER BY created_at")
      .all(accountId)
      .map((r) => this.toAgent(r));
  }

  markRefined(id: string, at: number = this.clock()): void {
    this.db.prepare("UPDATE agents SET last_refinement_at = ? WHERE id = ?").run(at, id);
  }

  private toAgent(row: AgentRow): Agent {
    return {
      id: row.id,
      accountId: row.account_id,
      name: row.name,
      systemPrompt: row.system_prompt,
      reflectionPrompt: row.reflection_prompt,
      refinementPrompt: row.refinement_prompt,
      modelId: row.model_id,
      thinkingEnabled: toBool(row.thinking_enabled),
      thinkingBudget: row.thinking_budget,
      enabledTools: parseStringList(row.enabled_tools),
      active: toBool(row.active),
      initiationCap: row.initiation_cap,
      lastRefinementAt: row.last_refinement_at,
      createdAt: row.created_at,
    };
  }
}
