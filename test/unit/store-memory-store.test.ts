import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { Agent } from "../../src/store/types.js";
import { createTestContext, DAY, seedAgent, seedTeam, type TestContext } from "../helpers/fixtures.js";

describe("MemoryStore", () => {
  let t: TestContext;
  let agent: Agent;

  beforeEach(() => {
    t = createTestContext();
    agent = seedAgent(t.c, seedTeam(t.c).account.id);
  });

  afterEach(() => t.cleanup());

  function journal(content: string, createdAt?: number) {
    return t.c.memories.create({ agentId: agent.id, memoryType: "journal", content, createdAt });
  }

  it("creates memories with a token estimate", () => {
    const memory = journal("Dana prefers short answers");
    expect(memory).toMatchObject({ memoryType: "journal", constitutional: false, tokenEstimate: 7, discardedAt: null });
  });

  it("hides journal entries older than the window but keeps core ones", () => {
    const old = journal("last month", t.clock.now - 8 * DAY);
    const recent = journal("yesterday", t.clock.now - DAY);
    const core = t.c.memories.create({ agentId: agent.id, memoryType: "core", content: "I value candour", createdAt: t.clock.now - 30 * DAY });

    expect(t.c.memories.listLiveJournal(agent.id).map((m) => m.id)).toEqual([recent.id]);
    expect(t.c.memories.listCore(agent.id).map((m) => m.id)).toEqual([core.id]);
    expect(t.c.memories.findLive(agent.id, old.id)).toBeNull();
    expect(t.c.memories.get(old.id)?.content).toBe("last month");
  });

  it("promotes journal entries only once", () => {
    const entry = journal("worth keeping");
    expect(t.c.memories.promote([entry.id])).toBe(1);
    expect(t.c.memories.promote([entry.id])).toBe(0);
    expect(t.c.memories.get(entry.id)?.memoryType).toBe("core");
  });

  it("refuses to turn a core memory back into a journal entry", () => {
    const core = t.c.memories.create({ agentId: agent.id, memoryType: "core", content: "identity" });
    const demote = t.c.db.raw().prepare("UPDATE agent_memories SET memory_type = 'journal' WHERE id = ?");
    expect(() => demote.run(core.id)).toThrow("core memories cannot return to journal");
    expect(t.c.memories.get(core.id)?.memoryType).toBe("core");
  });

  it("refuses to clear the constitutional flag", () => {
    const core = t.c.memories.create({ agentId: agent.id, memoryType: "core", content: "be honest" });
    t.c.memories.protect(core.id);
    const unprotect = t.c.db.raw().prepare("UPDATE agent_memories SET constitutional = 0 WHERE id = ?");
    expect(() => unprotect.run(core.id)).toThrow("constitutional flag is permanent");
    expect(t.c.memories.get(core.id)?.constitutional).toBe(true);
  });

  it("searches live memories literally", () => {
    journal("grew 100% this quarter");
    journal("grew 100 points");
    expect(t.c.memories.search(agent.id, "100%").map((m) => m.content)).toEqual(["grew 100% this quarter"]);
  });

  it("merges memories into one core memory dated at the earliest source", () => {
    const a = t.c.memories.create({ agentId: agent.id, memoryType: "core", content: "likes tea", createdAt: t.clock.now - 3 * DAY });
    const b = t.c.memories.create({ agentId: agent.id, memoryType: "core", content: "likes green tea", createdAt: t.clock.now - DAY });

    const merged = t.c.memories.merge(agent.id, [a, b], "likes green tea");

    expect(merged.createdAt).toBe(t.clock.now - 3 * DAY);
    expect(t.c.memories.listCore(agent.id).map((m) => m.id)).toEqual([merged.id]);
    expect(t.c.memories.get(a.id)?.discardedAt).toBe(t.clock.now);
  });

  it("sums the token estimates of live core memories", () => {
    t.c.memories.create({ agentId: agent.id, memoryType: "core", content: "12345678" });
    const gone = t.c.memories.create({ agentId: agent.id, memoryType: "core", content: "1234" });
    t.c.memories.discard(gone.id);
    journal("not counted");
    expect(t.c.memories.coreTokenUsage(agent.id)).toBe(2);
  });
});
