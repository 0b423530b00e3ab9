import type { ColloquyDB } from "./db.js";
import type { AuditEntry } from "./types.js";
import { parseObject } from "./rows.js";
import { systemClock, type Clock } from "../utils/clock.js";

interface AuditRow {
  id: number;
  account_id: string | null;
  agent_id: string | null;
  action: string;
  subject_type: string | null;
  subject_id: string | null;
  data: string;
  created_at: number;
}

export interface RecordAuditParams {
  action: string;
  accountId?: string | null;
  agentId?: string | null;
  subjectType?: string | null;
  subjectId?: string | null;
  data?: Record<string, unknown>;
}

export interface ListAuditParams {
  agentId?: string;
  accountId?: string;
  action?: string;
  limit?: number;
}

/** Insert-only audit trail. */
export class AuditStore {
  private readonly db;

  constructor(
    colloquyDb: ColloquyDB,
    private readonly clock: Clock = systemClock,
  ) {
    this.db = colloquyDb.raw();
  }

  record(params: RecordAuditParams): number {
    const result = this.db
      .prepare(
        `INSERT INTO audit_log (account_id, agent_id, action, subject_type, subject_id, data, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        params.accountId ?? null,
        params.agentId ?? null,
        params.action,
        params.subjectType ?? null,
        params.subjectId ?? null,
        JSON.stringify(params.data ?? {}),
        this.clock(),
      );
    return Number(result.lastInsertRowid);
  }

  list(params: ListAuditParams = {}): AuditEntry[] {
    const conditions: string[] = [];
    const values: (string | number)[] = [];

    if (params.agentId) {
      conditions.push("agent_id = ?");
      values.push(params.agentId);
    }
    if (params.accountId) {
      conditions.push("account_id = ?");
      values.push(params.accountId);
    }
    if (params.action) {
      conditions.push("action = ?");
      values.push(params.action);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    return this.db
      .prepare<(string | number)[], AuditRow>(
        `SELECT * FROM audit_log ${where} ORDER BY created_at DESC, id DESC LIMIT ?`,
      )
      .all(...values, params.limit ?? 50)
      .map((r) => this.toEntry(r));
  }

  hasEntrySince(accountId: string, since: number): boolean {
    const row = this.db
      .prepare<[string, number], { n: number }>(
        "SELECT COUNT(*) AS n FROM audit_log WHERE account_id = ? AND created_at >= ?",
      )
      .get(accountId, since);
    return (row?.n ?? 0) > 0;
  }

  private toEntry(row: AuditRow): AuditEntry {
    return {
      id: row.id,
      accountId: row.account_id,
      agentId: row.agent_id,
      action: row.action,
      subjectType: row.subject_type,
      subjectId: row.subject_id,
      data: parseObject(row.data),
      createdAt: row.created_at,
    };
  }
}
