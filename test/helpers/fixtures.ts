import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseConfig } from "../../src/config/schema.js";
import type { ColloquyConfig } from "../../src/config/types.js";
import { buildComponents, type Components } from "../../src/gateway/components.js";
import { registerTasks } from "../../src/gateway/tasks.js";
import { createSilentLogger } from "../../src/logging/logger.js";
import type { ModelIdSource } from "../../src/providers/model-registry.js";
import type { ModerationClient } from "../../src/providers/types.js";
import type { CreateAgentParams } from "../../src/store/agent-store.js";
import { ColloquyDB } from "../../src/store/db.js";
import type { Account, Agent, User } from "../../src/store/types.js";
import { FakeModelClient } from "./fake-model.js";

/** 2026-03-02T12:00:00Z, a Monday noon. */
export const NOON = Date.UTC(2026, 2, 2, 12, 0, 0);
export const HOUR = 3_600_000;
export const DAY = 24 * HOUR;

export function makeConfig(raw: Record<string, unknown> = {}): ColloquyConfig {
  return parseConfig(raw);
}

export class TestClock {
  constructor(public now: number = NOON) {}
  readonly read = (): number => this.now;
  advance(ms: number): number {
    this.now += ms;
    return this.now;
  }
}

export interface TestContext {
  readonly c: Components;
  readonly models: FakeModelClient;
  readonly clock: TestClock;
  readonly dir: string;
  cleanup(): void;
}

export interface TestContextOptions {
  readonly config?: Record<string, unknown>;
  readonly models?: FakeModelClient;
  readonly moderation?: ModerationClient;
  readonly random?: () => number;
  readonly now?: number;
  readonly modelIds?: ModelIdSource;
}

/** Every component over a fresh temp-dir database, with tasks registered. */
export function createTestContext(options: TestContextOptions = {}): TestContext {
  const dir = mkdtempSync(join(tmpdir(), "colloquy-test-"));
  const db = new ColloquyDB(dir);
  const clock = new TestClock(options.now);
  const models = options.models ?? new FakeModelClient();
  const c = buildComponents(makeConfig(options.config), createSilentLogger(), db, {
    clock: clock.read,
    random: options.random ?? (() => 0),
    models,
    ...(options.moderation ? { moderation: options.moderation } : {}),
    ...(options.modelIds ? { modelIds: options.modelIds } : {}),
  });
  registerTasks(c);
  return {
    c,
    models,
    clock,
    dir,
    cleanup: () => {
      db.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

export interface Team {
  readonly account: Account;
  readonly user: User;
}

export function seedTeam(c: Components, userName: string | null = "Dana"): Team {
  const account = c.accounts.createAccount("Test Team");
  const user = c.accounts.createUser({ accountId: account.id, email: "dana@example.com", name: userName });
  return { account, user };
}

export function seedAgent(c: Components, accountId: string, overrides: Partial<CreateAgentParams> = {}): Agent {
  return c.agents.createAgent({ accountId, name: "Ada", modelId: "test/model", ...overrides });
}
