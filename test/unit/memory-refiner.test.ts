import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { isConsent } from "../../src/memory/refiner.js";
import type { ModelEvent, ToolCall } from "../../src/providers/types.js";
import type { Agent } from "../../src/store/types.js";
import { makeReply } from "../helpers/fake-model.js";
import { createTestContext, DAY, NOON, seedAgent, seedTeam, type TestContext } from "../helpers/fixtures.js";

function toolRound(call: ToolCall): ModelEvent[] {
  return [
    { type: "message.start" },
    { type: "tool.call", call },
    { type: "message.end", reply: makeReply("", { toolCalls: [call] }) },
  ];
}

describe("isConsent", () => {
  it("takes a leading yes in any case", () => {
    expect(isConsent("YES, let's do it")).toBe(true);
    expect(isConsent("  yes.")).toBe(true);
    expect(isConsent("Yesterday I refined them")).toBe(false);
    expect(isConsent("No thanks")).toBe(false);
  });
});

describe("Refiner", () => {
  let t: TestContext;
  let agent: Agent;

  function setup(config: Record<string, unknown> = {}): void {
    t = createTestContext({ config });
    agent = seedAgent(t.c, seedTeam(t.c).account.id);
  }

  beforeEach(() => setup());
  afterEach(() => t.cleanup());

  function current(): Agent {
    const found = t.c.agents.getAgent(agent.id);
    if (!found) throw new Error("agent missing");
    return found;
  }

  it("wants refinement once there are core memories and the interval has passed", () => {
    expect(t.c.refiner.needsRefinement(current())).toBe(false);

    t.c.memories.create({ agentId: agent.id, memoryType: "core", content: "I like tidy notes" });
    expect(t.c.refiner.needsRefinement(current())).toBe(true);

    t.c.agents.markRefined(agent.id);
    expect(t.c.refiner.needsRefinement(current())).toBe(false);

    t.clock.advance(8 * DAY);
    expect(t.c.refiner.needsRefinement(current())).toBe(true);
  });

  it("wants refinement when core memories exceed the budget", () => {
    t.cleanup();
    setup({ memory: { coreTokenBudget: 2 } });
    t.c.memories.create({ agentId: agent.id, memoryType: "core", content: "I like tidy notes" });
    t.c.agents.markRefined(agent.id);
    expect(t.c.refiner.needsRefinement(current())).toBe(true);
  });

  it("does nothing without core memories", async () => {
    expect(await t.c.refiner.refine(current())).toEqual({ status: "no_core_memories" });
    expect(t.models.calls).toBe(0);
  });

  it("respects a declined consent", async () => {
    t.c.memories.create({ agentId: agent.id, memoryType: "core", content: "I like tidy notes" });
    t.models.replies("NO, they are fine as they are");

    expect(await t.c.refiner.refine(current())).toEqual({ status: "declined", answer: "NO, they are fine as they are" });
    expect(t.models.calls).toBe(1);
    expect(t.models.sessions[0]?.messages[0]?.content).toContain("- Core memories: 1\n- Token usage: 5\n- Token budget: 5000\n- Within budget");
    expect(current().lastRefinementAt).toBeNull();
  });

  it("runs a tool session after consent and reports its stats", async () => {
    const a = t.c.memories.create({ agentId: agent.id, memoryType: "core", content: "Dana likes brevity" });
    const b = t.c.memories.create({ agentId: agent.id, memoryType: "core", content: "Dana likes short replies" });
    t.models.replies("Yes.").enqueue([
      ...toolRound({ id: "c1", name: "memory_refinement", arguments: { action: "consolidate", ids: [a.id, b.id], content: "Dana likes brevity" } }),
      ...toolRound({ id: "c2", name: "memory_refinement", arguments: { action: "complete", summary: "Merged one duplicate" } }),
    ]);

    const outcome = await t.c.refiner.refine(current());

    expect(outcome).toEqual({
      status: "refined",
      completed: true,
      operations: 1,
      stats: { consolidated: 2, updated: 0, deleted: 0, protected: 0 },
    });
    const session = t.models.sessions[1];
    expect(session?.tools.map((tool) => tool.name)).toEqual(["memory_refinement"]);
    expect(session?.messages[0]?.content).toContain(`- #${a.id} (2026-03-02, ~5 tokens): Dana likes brevity`);
    expect(t.c.memories.listCore(agent.id).map((m) => m.content)).toEqual(["Dana likes brevity"]);
    expect(current().lastRefinementAt).toBe(NOON);
  });

  it("stamps the refinement time even when the session never completes", async () => {
    t.c.memories.create({ agentId: agent.id, memoryType: "core", content: "I like tidy notes" });
    t.models.replies("YES", "I looked and they are fine.");

    const outcome = await t.c.refiner.refine(current());

    expect(outcome).toMatchObject({ status: "refined", completed: false, operations: 0 });
    expect(current().lastRefinementAt).toBe(NOON);
  });

  it("sweeps only agents that need refinement", async () => {
    const other = seedAgent(t.c, agent.accountId, { name: "Grace" });
    t.c.memories.create({ agentId: other.id, memoryType: "core", content: "Grace keeps lists" });
    t.models.replies("YES", "done");

    expect(await t.c.refiner.sweep()).toBe(1);
    expect(t.models.calls).toBe(2);
  });
});
