import Database from "better-sqlite3";
import { getDatabasePath } from "../config/paths.js";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS accounts (
  id          TEXT PRIMARY KEY,
  name        TEXT NOT NULL,
  created_at  INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS users (
  id          TEXT PRIMARY KEY,
  account_id  TEXT NOT NULL REFERENCES accounts(id),
  name        TEXT,
  email       TEXT NOT NULL,
  timezone    TEXT,
  created_at  INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS agents (
  id                 TEXT PRIMARY KEY,
  account_id         TEXT NOT NULL REFERENCES accounts(id),
  name               TEXT NOT NULL,
  system_prompt      TEXT,
  reflection_prompt  TEXT,
  refinement_prompt  TEXT,
  model_id           TEXT NOT NULL,
  thinking_enabled   INTEGER NOT NULL DEFAULT 0,
  thinking_budget    INTEGER,
  enabled_tools      TEXT NOT NULL DEFAULT '[]',
  active             INTEGER NOT NULL DEFAULT 1,
  initiation_cap     INTEGER,
  last_refinement_at INTEGER,
  created_at         INTEGER NOT NULL,
  UNIQUE (account_id, name)
);

CREATE TABLE IF NOT EXISTS chats (
  id                            TEXT PRIMARY KEY,
  account_id                    TEXT NOT NULL REFERENCES accounts(id),
  title                         TEXT,
  model_id                      TEXT,
  manual_responses              INTEGER NOT NULL DEFAULT 0,
  agent_only                    INTEGER NOT NULL DEFAULT 0,
  initiated_by_agent_id         TEXT REFERENCES agents(id),
  initiation_reason             TEXT,
  summary                       TEXT,
  archived_at                   INTEGER,
  discarded_at                  INTEGER,
  last_consolidated_at          INTEGER,
  last_consolidated_message_id  INTEGER,
  created_at                    INTEGER NOT NULL,
  updated_at                    INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_chats_account ON chats(account_id, updated_at);

CREATE TABLE IF NOT EXISTS chat_agents (
  chat_id     TEXT NOT NULL REFERENCES chats(id),
  agent_id    TEXT NOT NULL REFERENCES agents(id),
  position    INTEGER NOT NULL DEFAULT 0,
  PRIMARY KEY (chat_id, agent_id)
);

CREATE TABLE IF NOT EXISTS messages (
  id                  INTEGER PRIMARY KEY AUTOINCREMENT,
  chat_id             TEXT NOT NULL REFERENCES chats(id),
  role                TEXT NOT NULL CHECK(role IN ('user','assistant','system')),
  agent_id            TEXT REFERENCES agents(id),
  user_id             TEXT REFERENCES users(id),
  content             TEXT NOT NULL DEFAULT '',
  thinking            TEXT,
  model_id            TEXT,
  input_tokens        INTEGER,
  output_tokens       INTEGER,
  tools_used          TEXT NOT NULL DEFAULT '[]',
  streaming           INTEGER NOT NULL DEFAULT 0,
  moderation_flagged  INTEGER,
  moderation_scores   TEXT,
  created_at          INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_messages_chat ON messages(chat_id, created_at, id);

CREATE TABLE IF NOT EXISTS agent_memories (
  id              TEXT PRIMARY KEY,
  agent_id        TEXT NOT NULL REFERENCES agents(id),
  memory_type     TEXT NOT NULL CHECK(memory_type IN ('journal','core')),
  constitutional  INTEGER NOT NULL DEFAULT 0,
  content         TEXT NOT NULL,
  token_estimate  INTEGER NOT NULL DEFAULT 0,
  discarded_at    INTEGER,
  created_at      INTEGER NOT NULL,
  updated_at      INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_agent_memories_agent ON agent_memories(agent_id, memory_type, created_at);

-- Monotonic memory types and permanent constitutional flags.
CREATE TRIGGER IF NOT EXISTS agent_memories_no_demotion
BEFORE UPDATE OF memory_type ON agent_memories
WHEN old.memory_type = 'core' AND new.memory_type = 'journal'
BEGIN
  SELECT RAISE(ABORT, 'core memories cannot return to journal');
END;

CREATE TRIGGER IF NOT EXISTS agent_memories_constitutional_permanent
BEFORE UPDATE OF constitutional ON agent_memories
WHEN old.constitutional = 1 AND new.constitutional = 0
BEGIN
  SELECT RAISE(ABORT, 'constitutional flag is permanent');
END;

CREATE TABLE IF NOT EXISTS audit_log (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  account_id    TEXT,
  agent_id      TEXT,
  action        TEXT NOT NULL,
  subject_type  TEXT,
  subject_id    TEXT,
  data          TEXT NOT NULL DEFAULT '{}',
  created_at    INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_audit_account ON audit_log(account_id, created_at);
CREATE INDEX IF NOT EXISTS idx_audit_agent ON audit_log(agent_id, action);

CREATE TABLE IF NOT EXISTS jobs (
  id          TEXT PRIMARY KEY,
  task        TEXT NOT NULL,
  args        TEXT NOT NULL DEFAULT '{}',
  status      TEXT NOT NULL CHECK(status IN ('pending','running','done','failed')),
  attempts    INTEGER NOT NULL DEFAULT 0,
  priority    INTEGER NOT NULL DEFAULT 0,
  run_at      INTEGER NOT NULL,
  last_error  TEXT,
  retry_policy TEXT,
  created_at  INTEGER NOT NULL,
  updated_at  INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_jobs_due ON jobs(run_at) WHERE status = 'pending';
`;

export class ColloquyDB {
  private db: Database.Database;

  /** Opens the database file inside `stateDir`, or an in-memory database for ":memory:". */
  constructor(stateDir: string) {
    this.db = new Database(getDatabasePath(stateDir));
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA_SQL);
  }

  raw(): Database.Database {
    return this.db;
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
