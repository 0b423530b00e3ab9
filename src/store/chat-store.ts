import { randomUUID } from "node:crypto";
import type { ColloquyDB } from "./db.js";
import type { AuthoredMessage, Chat, Message, MessageRole } from "./types.js";
import { fromBool, parseStringList, toBool, toOptionalBool } from "./rows.js";
import { systemClock, type Clock } from "../utils/clock.js";

interface ChatRow {
  id: string;
  account_id: string;
  title: string | null;
  model_id: string | null;
  manual_responses: number;
  agent_only: number;
  initiated_by_agent_id: string | null;
  initiation_reason: string | null;
  summary: string | null;
  archived_at: number | null;
  discarded_at: number | null;
  last_consolidated_at: number | null;
  last_consolidated_message_id: number | null;
  created_at: number;
  updated_at: number;
}

interface MessageRow {
  id: number;
  chat_id: string;
  role: MessageRole;
  agent_id: string | null;
  user_id: string | null;
  content: string;
  thinking: string | null;
  model_id: string | null;
  input_tokens: number | null;
  output_tokens: number | null;
  tools_used: string;
  streaming: number;
  moderation_flagged: number | null;
  created_at: number;
}

interface AuthoredMessageRow extends MessageRow {
  author_name: string;
}

export interface CreateChatParams {
  accountId: string;
  title?: string | null;
  modelId?: string | null;
  manualResponses?: boolean;
  agentOnly?: boolean;
  initiatedByAgentId?: string | null;
  initiationReason?: string | null;
  agentIds?: string[];
}

export interface CreateMessageParams {
  chatId: string;
  role: MessageRole;
  agentId?: string | null;
  userId?: string | null;
  content?: string;
  modelId?: string | null;
  streaming?: boolean;
}

export interface FinalizeMessageParams {
  content: string;
  thinking: string | null;
  modelId: string | null;
  inputTokens: number | null;
  outputTokens: number | null;
  toolsUsed: string[];
}

export interface InitiatedChatSummary {
  readonly chat: Chat;
  readonly initiatorName: string;
  readonly humanReplies: number;
}

const AUTHOR_NAME_SQL = `CASE WHEN m.role = 'system' THEN 'System'
  ELSE COALESCE(
    a.name,
    NULLIF(u.name, ''),
    CASE WHEN instr(u.email, '@') > 1 THEN substr(u.email, 1, instr(u.email, '@') - 1) ELSE u.email END,
    'User'
  ) END`;

/** Human-authored means a user message with a user behind it. */
const HUMAN_MESSAGE_SQL = "m.role = 'user' AND m.user_id IS NOT NULL";

export class ChatStore {
  private readonly db;

  constructor(
    colloquyDb: ColloquyDB,
    private readonly clock: Clock = systemClock,
  ) {
    this.db = colloquyDb.raw();
  }

  // ── Chats ──

  createChat(params: CreateChatParams): Chat {
    const id = randomUUID();
    const now = this.clock();
    const insert = this.db.transaction(() => {
      this.db
        .prepare(
          `INSERT INTO chats (id, account_id, title, model_id, manual_responses, agent_only,
             initiated_by_agent_id, initiation_reason, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          id,
          params.accountId,
          params.title ?? null,
          params.modelId ?? null,
          fromBool(params.manualResponses),
          fromBool(params.agentOnly),
          params.initiatedByAgentId ?? null,
          params.initiationReason ?? null,
          now,
          now,
        );
      this.addAgents(id, params.agentIds ?? []);
    });
    insert();
    return this.requireChat(id);
  }

  getChat(id: string): Chat | null {
    const row = this.db.prepare<[string], ChatRow>("SELECT * FROM chats WHERE id = ?").get(id);
    return row ? this.toChat(row) : null;
  }

  findInAccount(id: string, accountId: string): Chat | null {
    const row = this.db
      .prepare<[string, string], ChatRow>("SELECT * FROM chats WHERE id = ? AND account_id = ?")
      .get(id, accountId);
    return row ? this.toChat(row) : null;
  }

  addAgents(chatId: string, agentIds: string[]): void {
    const next = this.db
      .prepare<[string], { n: number }>("SELECT COUNT(*) AS n FROM chat_agents WHERE chat_id = ?")
      .get(chatId);
    let position = next?.n ?? 0;
    const stmt = this.db.prepare(
      "INSERT OR IGNORE INTO chat_agents (chat_id, agent_id, position) VALUES (?, ?, ?)",
    );
    for (const agentId of agentIds) {
      stmt.run(chatId, agentId, position++);
    }
  }

  archive(id: string): void {
    this.db.prepare("UPDATE chats SET archived_at = ? WHERE id = ?").run(this.clock(), id);
  }

  discard(id: string): void {
    this.db.prepare("UPDATE chats SET discarded_at = ? WHERE id = ?").run(this.clock(), id);
  }

  touch(id: string): void {
    this.db.prepare("UPDATE chats SET updated_at = ? WHERE id = ?").run(this.clock(), id);
  }

  markConsolidated(id: string, lastMessageId: number): void {
    this.db
      .prepare(
        "UPDATE chats SET last_consolidated_message_id = ?, last_consolidated_at = ? WHERE id = ?",
      )
      .run(lastMessageId, this.clock(), id);
  }

  /**
   * Group chats that went quiet before `idleBefore` and hold messages past
   * their consolidation watermark.
   */
  listStaleGroupChats(idleBefore: number): Chat[] {
    return this.db
      .prepare<[number], ChatRow>(
        `SELECT c.* FROM chats c
         WHERE c.manual_responses = 1
           AND c.discarded_at IS NULL
           AND (SELECT MAX(m.created_at) FROM messages m WHERE m.chat_id = c.id) < ?
           AND EXISTS (
             SELECT 1 FROM messages m
             WHERE m.chat_id = c.id AND m.id > COALESCE(c.last_consolidated_message_id, 0)
           )
         ORDER BY c.updated_at`,
      )
      .all(idleBefore)
      .map((r) => this.toChat(r));
  }

  /**
   * Respondable group chats the agent belongs to where someone else spoke
   * last, most recently active first.
   */
  listContinuable(agentId: string, limit = 10): Chat[] {
    return this.db
      .prepare<[string, string, number], ChatRow>(
        `SELECT c.* FROM chats c
         JOIN chat_agents ca ON ca.chat_id = c.id
         WHERE ca.agent_id = ?
           AND c.manual_responses = 1
           AND c.archived_at IS NULL AND c.discarded_at IS NULL
           AND COALESCE((
             SELECT m.agent_id FROM messages m WHERE m.chat_id = c.id ORDER BY m.id DESC LIMIT 1
           ), '') <> ?
         ORDER BY c.updated_at DESC
         LIMIT ?`,
      )
      .all(agentId, agentId, limit)
      .map((r) => this.toChat(r));
  }

  /** Respondable human-facing chats this agent started that no human has answered. */
  countPendingInitiations(agentId: string): number {
    const row = this.db
      .prepare<[string], { n: number }>(
        `SELECT COUNT(*) AS n FROM chats c
         WHERE c.initiated_by_agent_id = ?
           AND c.agent_only = 0
           AND c.archived_at IS NULL AND c.discarded_at IS NULL
           AND NOT EXISTS (
             SELECT 1 FROM messages m WHERE m.chat_id = c.id AND ${HUMAN_MESSAGE_SQL}
           )`,
      )
      .get(agentId);
    return row?.n ?? 0;
  }

  countAgentOnlyInitiationsSince(agentId: string, since: number): number {
    const row = this.db
      .prepare<[string, number], { n: number }>(
        `SELECT COUNT(*) AS n FROM chats c
         WHERE c.initiated_by_agent_id = ? AND c.agent_only = 1
           AND c.discarded_at IS NULL AND c.created_at >= ?`,
      )
      .get(agentId, since);
    return row?.n ?? 0;
  }

  lastInitiationAt(agentId: string): number | null {
    const row = this.db
      .prepare<[string], { at: number | null }>(
        "SELECT MAX(created_at) AS at FROM chats WHERE initiated_by_agent_id = ?",
      )
      .get(agentId);
    return row?.at ?? null;
  }

  /** Agent-initiated chats in the account since `since`, with their initiator's name. */
  listRecentInitiations(accountId: string, since: number): InitiatedChatSummary[] {
    return this.db
      .prepare<[string, number], ChatRow & { human_replies: number; initiator_name: string | null }>(
        `SELECT c.*, a.name AS initiator_name, (
           SELECT COUNT(*) FROM messages m WHERE m.chat_id = c.id AND ${HUMAN_MESSAGE_SQL}
         ) AS human_replies
         FROM chats c
         LEFT JOIN agents a ON a.id = c.initiated_by_agent_id
         WHERE c.account_id = ? AND c.initiated_by_agent_id IS NOT NULL AND c.created_at >= ?
         ORDER BY c.created_at DESC`,
      )
      .all(accountId, since)
      .map((r) => ({ chat: this.toChat(r), humanReplies: r.human_replies, initiatorName: r.initiator_name ?? "Unknown agent" }));
  }

  /** Latest message time per user with messages in the account since `since`. */
  listHumanActivity(accountId: string, since: number): { userId: string; lastActiveAt: number }[] {
    return this.db
      .prepare<[string, number], { user_id: string; at: number }>(
        `SELECT m.user_id, MAX(m.created_at) AS at FROM messages m
         JOIN chats c ON c.id = m.chat_id
         WHERE c.account_id = ? AND m.user_id IS NOT NULL AND m.created_at >= ?
         GROUP BY m.user_id
         ORDER BY at DESC`,
      )
      .all(accountId, since)
      .map((r) => ({ userId: r.user_id, lastActiveAt: r.at }));
  }

  // ── Messages ──

  createMessage(params: CreateMessageParams): Message {
    const now = this.clock();
    const result = this.db
      .prepare(
        `INSERT INTO messages (chat_id, role, agent_id, user_id, content, model_id, streaming, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        params.chatId,
        params.role,
        params.agentId ?? null,
        params.userId ?? null,
        params.content ?? "",
        params.modelId ?? null,
        fromBool(params.streaming),
        now,
      );
    this.db.prepare("UPDATE chats SET updated_at = ? WHERE id = ?").run(now, params.chatId);
    return this.requireMessage(Number(result.lastInsertRowid));
  }

  getMessage(id: number): Message | null {
    const row = this.db.prepare<[number], MessageRow>("SELECT * FROM messages WHERE id = ?").get(id);
    return row ? this.toMessage(row) : null;
  }

  appendContent(id: number, text: string): void {
    this.db.prepare("UPDATE messages SET content = content || ? WHERE id = ?").run(text, id);
  }

  appendThinking(id: number, text: string): void {
    this.db
      .prepare("UPDATE messages SET thinking = COALESCE(thinking, '') || ? WHERE id = ?")
      .run(text, id);
  }

  finalizeMessage(id: number, params: FinalizeMessageParams): Message {
    this.db
      .prepare(
        `UPDATE messages SET content = ?, thinking = ?, model_id = ?, input_tokens = ?,
           output_tokens = ?, tools_used = ?, streaming = 0
         WHERE id = ?`,
      )
      .run(
        params.content,
        params.thinking,
        params.modelId,
        params.inputTokens,
        params.outputTokens,
        JSON.stringify(params.toolsUsed),
        id,
      );
    return this.requireMessage(id);
  }

  stopStreaming(id: number): void {
    this.db.prepare("UPDATE messages SET streaming = 0 WHERE id = ?").run(id);
  }

  deleteMessage(id: number): boolean {
    return this.db.prepare("DELETE FROM messages WHERE id = ?").run(id).changes > 0;
  }

  recordModeration(id: number, flagged: boolean, scores: Record<string, number>): void {
    this.db
      .prepare("UPDATE messages SET moderation_flagged = ?, moderation_scores = ? WHERE id = ?")
      .run(fromBool(flagged), JSON.stringify(scores), id);
  }

  /** Finished messages in conversation order, with author names. */
  listTranscript(chatId: string, afterId = 0): AuthoredMessage[] {
    return this.db
      .prepare<[string, number], AuthoredMessageRow>(
        `SELECT m.*, ${AUTHOR_NAME_SQL} AS author_name
         FROM messages m
         LEFT JOIN agents a ON a.id = m.agent_id
         LEFT JOIN users u ON u.id = m.user_id
         WHERE m.chat_id = ? AND m.id > ? AND m.streaming = 0
         ORDER BY m.created_at, m.id`,
      )
      .all(chatId, afterId)
      .map((r) => ({ ...this.toMessage(r), authorName: r.author_name }));
  }

  /** Lowest id above `afterId` that is still streaming, if any. */
  firstStreamingMessageId(chatId: string, afterId = 0): number | null {
    const row = this.db
      .prepare<[string, number], { id: number | null }>(
        "SELECT MIN(id) AS id FROM messages WHERE chat_id = ? AND id > ? AND streaming = 1",
      )
      .get(chatId, afterId);
    return row?.id ?? null;
  }

  lastMessage(chatId: string): Message | null {
    const row = this.db
      .prepare<[string], MessageRow>(
        "SELECT * FROM messages WHERE chat_id = ? ORDER BY created_at DESC, id DESC LIMIT 1",
      )
      .get(chatId);
    return row ? this.toMessage(row) : null;
  }

  lastHumanMessageAt(accountId: string): number | null {
    const row = this.db
      .prepare<[string], { at: number | null }>(
        `SELECT MAX(m.created_at) AS at FROM messages m
         JOIN chats c ON c.id = m.chat_id
         WHERE c.account_id = ? AND ${HUMAN_MESSAGE_SQL}`,
      )
      .get(accountId);
    return row?.at ?? null;
  }

  private requireChat(id: string): Chat {
    const chat = this.getChat(id);
    if (!chat) throw new Error(`Chat ${id} not found`);
    return chat;
  }

  private requireMessage(id: number): Message {
    const message = this.getMessage(id);
    if (!message) throw new Error(`Message ${id} not found`);
    return message;
  }

  // ── Mappers ──

  private toChat(row: ChatRow): Chat {
    return {
      id: row.id,
      accountId: row.account_id,
      title: row.title,
      modelId: row.model_id,
      manualResponses: toBool(row.manual_responses),
      agentOnly: toBool(row.agent_only),
      initiatedByAgentId: row.initiated_by_agent_id,
      initiationReason: row.initiation_reason,
      summary: row.summary,
      archivedAt: row.archived_at,
      discardedAt: row.discarded_at,
      lastConsolidatedAt: row.last_consolidated_at,
      lastConsolidatedMessageId: row.last_consolidated_message_id,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private toMessage(row: MessageRow): Message {
    return {
      id: row.id,
      chatId: row.chat_id,
      role: row.role,
      agentId: row.agent_id,
      userId: row.user_id,
      content: row.content,
      thinking: row.thinking,
      modelId: row.model_id,
      inputTokens: row.input_tokens,
      outputTokens: row.output_tokens,
      toolsUsed: parseStringList(row.tools_used),
      streaming: toBool(row.streaming),
      moderationFlagged: toOptionalBool(row.moderation_flagged),
      createdAt: row.created_at,
    };
  }
}
