import { randomUUID } from "node:crypto";
import type { ColloquyDB } from "./db.js";
import type { Account, User } from "./types.js";
import { systemClock, type Clock } from "../utils/clock.js";

interface AccountRow {
  id: string;
  name: string;
}

interface UserRow {
  id: string;
  account_id: string;
  name: string | null;
  email: string;
  timezone: string | null;
}

export interface CreateUserParams {
  accountId: string;
  email: string;
  name?: string | null;
  timezone?: string | null;
}

export class AccountStore {
  private readonly db;

  constructor(
    colloquyDb: ColloquyDB,
    private readonly clock: Clock = systemClock,
  ) {
    this.db = colloquyDb.raw();
  }

  createAccount(name: string): Account {
    const id = randomUUID();
    this.db
      .prepare("INSERT INTO accounts (id, name, created_at) VALUES (?, ?, ?)")
      .run(id, name, this.clock());
    return { id, name };
  }

  getAccount(id: string): Account | null {
    const row = this.db
      .prepare<[string], AccountRow>("SELECT id, name FROM accounts WHERE id = ?")
      .get(id);
    return row ? { id: row.id, name: row.name } : null;
  }

  createUser(params: CreateUserParams): User {
    const id = randomUUID();
    this.db
      .prepare(
        `INSERT INTO users (id, account_id, name, email, timezone, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(id, params.accountId, params.name ?? null, params.email, params.timezone ?? null, this.clock());
    return {
      id,
      accountId: params.accountId,
      name: params.name ?? null,
      email: params.email,
      timezone: params.timezone ?? null,
    };
  }

  listUsers(accountId: string): User[] {
    return this.db
      .prepare<[string], UserRow>("SELECT * FROM users WHERE account_id = ? ORDER BY created_at")
      .all(accountId)
      .map((row) => ({
        id: row.id,
        accountId: row.account_id,
        name: row.name,
        email: row.email,
        timezone: row.timezone,
      }));
  }
}
