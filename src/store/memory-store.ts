import { randomUUID } from "node:crypto";
import type { ColloquyDB } from "./db.js";
import type { AgentMemory, MemoryType } from "./types.js";
import { fromBool, toBool } from "./rows.js";
import { estimateTokens } from "../utils/text.js";
import { systemClock, type Clock } from "../utils/clock.js";

interface MemoryRow {
  id: string;
  agent_id: string;
  memory_type: MemoryType;
  constitutional: number;
  content: string;
  token_estimate: number;
  discarded_at: number | null;
  created_at: number;
  updated_at: number;
}

export interface CreateMemoryParams {
  agentId: string;
  memoryType: MemoryType;
  content: string;
  constitutional?: boolean;
  createdAt?: number;
}

/** Live means not discarded, and for journal entries, not yet expired. */
const LIVE_SQL = `discarded_at IS NULL AND (memory_type = 'core' OR created_at >= ?)`;

/**
 * Agent memories. Journal entries expire after `journalWindowMs` and are
 * then invisible to every read here, though the rows stay. Memory types only
 * move journal to core and the constitutional flag is never cleared; the
 * schema triggers refuse anything else.
 */
export class MemoryStore {
  private readonly db;

  constructor(
    colloquyDb: ColloquyDB,
    private readonly journalWindowMs: number,
    private readonly clock: Clock = systemClock,
  ) {
    this.db = colloquyDb.raw();
  }

  create(params: CreateMemoryParams): AgentMemory {
    const id = randomUUID();
    const now = this.clock();
    this.db
      .prepare(
        `INSERT INTO agent_memories (id, agent_id, memory_type, constitutional, content, token_estimate, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        params.agentId,
        params.memoryType,
        fromBool(params.constitutional),
        params.content,
        estimateTokens(params.content),
        params.createdAt ?? now,
        now,
      );
    return this.require(id);
  }

  get(id: string): AgentMemory | null {
    const row = this.db
      .prepare<[string], MemoryRow>("SELECT * FROM agent_memories WHERE id = ?")
      .get(id);
    return row ? this.toMemory(row) : null;
  }

  /** A live memory belonging to `agentId`, or null. */
  findLive(agentId: string, id: string): AgentMemory | null {
    const row = this.db
      .prepare<[string, string, number], MemoryRow>(
        `SELECT * FROM agent_memories WHERE id = ? AND agent_id = ? AND ${LIVE_SQL}`,
      )
      .get(id, agentId, this.expiryCutoff());
    return row ? this.toMemory(row) : null;
  }

  listCore(agentId: string): AgentMemory[] {
    return this.db
      .prepare<[string], MemoryRow>(
        `SELECT * FROM agent_memories
         WHERE agent_id = ? AND memory_type = 'core' AND discarded_at IS NULL
         ORDER BY created_at, id`,
      )
      .all(agentId)
      .map((r) => this.toMemory(r));
  }

  listLiveJournal(agentId: string): AgentMemory[] {
    return this.db
      .prepare<[string, number], MemoryRow>(
        `SELECT * FROM agent_memories
         WHERE agent_id = ? AND memory_type = 'journal' AND discarded_at IS NULL AND created_at >= ?
         ORDER BY created_at, id`,
      )
      .all(agentId, this.expiryCutoff())
      .map((r) => this.toMemory(r));
  }

  search(agentId: string, query: string, limit = 20): AgentMemory[] {
    const pattern = `%${query.replace(/[%_\\]/g, (c) => `\\${c}`)}%`;
    return this.db
      .prepare<[string, number, string, number], MemoryRow>(
        `SELECT * FROM agent_memories
         WHERE agent_id = ? AND ${LIVE_SQL} AND content LIKE ? ESCAPE '\\'
         ORDER BY created_at, id
         LIMIT ?`,
      )
      .all(agentId, this.expiryCutoff(), pattern, limit)
      .map((r) => this.toMemory(r));
  }

  coreTokenUsage(agentId: string): number {
    const row = this.db
      .prepare<[string], { total: number | null }>(
        `SELECT SUM(token_estimate) AS total FROM agent_memories
         WHERE agent_id = ? AND memory_type = 'core' AND discarded_at IS NULL`,
      )
      .get(agentId);
    return row?.total ?? 0;
  }

  agentIdsWithLiveJournal(): string[] {
    return this.db
      .prepare<[number], { agent_id: string }>(
        `SELECT DISTINCT agent_id FROM agent_memories
         WHERE memory_type = 'journal' AND discarded_at IS NULL AND created_at >= ?`,
      )
      .all(this.expiryCutoff())
      .map((r) => r.agent_id);
  }

  /** Flips the given journal entries to core; returns how many changed. */
  promote(ids: string[]): number {
    const stmt = this.db.prepare(
      `UPDATE agent_memories SET memory_type = 'core', updated_at = ?
       WHERE id = ? AND memory_type = 'journal' AND discarded_at IS NULL`,
    );
    const now = this.clock();
    const run = this.db.transaction((list: string[]) =>
      list.reduce((count, id) => count + stmt.run(now, id).changes, 0),
    );
    return run(ids);
  }

  updateContent(id: string, content: string): void {
    this.db
      .prepare("UPDATE agent_memories SET content = ?, token_estimate = ?, updated_at = ? WHERE id = ?")
      .run(content, estimateTokens(content), this.clock(), id);
  }

  discard(id: string): void {
    this.db
      .prepare("UPDATE agent_memories SET discarded_at = ?, updated_at = ? WHERE id = ? AND discarded_at IS NULL")
      .run(this.clock(), this.clock(), id);
  }

  protect(id: string): void {
    this.db
      .prepare("UPDATE agent_memories SET constitutional = 1, updated_at = ? WHERE id = ?")
      .run(this.clock(), id);
  }

  /**
   * Replaces `sources` with one core memory dated at the earliest of them.
   */
  merge(agentId: string, sources: AgentMemory[], content: string): AgentMemory {
    const earliest = Math.min(...sources.map((m) => m.createdAt));
    const run = this.db.transaction(() => {
      const merged = this.create({ agentId, memoryType: "core", content, createdAt: earliest });
      for (const source of sources) this.discard(source.id);
      return merged;
    });
    return run();
  }

  private expiryCutoff(): number {
    return this.clock() - this.journalWindowMs;
  }

  private require(id: string): AgentMemory {
    const memory = this.get(id);
    if (!memory) throw new Error(`Memory ${id} not found`);
    return memory;
  }

  private toMemory(row: MemoryRow): AgentMemory {
    return {
      id: row.id,
      agentId: row.agent_id,
      memoryType: row.memory_type,
      constitutional: toBool(row.constitutional),
      content: row.content,
      tokenEstimate: row.token_estimate,
      discardedAt: row.discarded_at,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
