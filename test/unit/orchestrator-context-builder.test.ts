import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ContextBuilder } from "../../src/orchestrator/context-builder.js";
import type { Account, Agent, User } from "../../src/store/types.js";
import { createTestContext, seedAgent, seedTeam, type TestContext } from "../helpers/fixtures.js";

describe("ContextBuilder", () => {
  let t: TestContext;
  let account: Account;
  let user: User;
  let ada: Agent;
  let builder: ContextBuilder;

  beforeEach(() => {
    t = createTestContext();
    ({ account, user } = seedTeam(t.c));
    ada = seedAgent(t.c, account.id);
    builder = new ContextBuilder(t.c.chats, t.c.memories);
  });

  afterEach(() => t.cleanup());

  it("falls back to the agent's name and appends memories and the initiation reason", () => {
    t.c.memories.create({ agentId: ada.id, memoryType: "core", content: "I value brevity" });

    expect(builder.systemPrompt(ada, "Nobody answered yesterday")).toBe(
      "You are Ada.\n\n## Your memories\n\n### Core memories\n- I value brevity\n\n" +
        "You are speaking up on your own initiative. Your reason: Nobody answered yesterday",
    );
  });

  it("uses a custom system prompt as written, trimmed", () => {
    const custom = seedAgent(t.c, account.id, { name: "Grace", systemPrompt: "  You review code.  " });
    expect(builder.systemPrompt(custom, "   ")).toBe("You review code.");
  });

  it("replays its own messages as assistant turns and labels everyone else", () => {
    const grace = seedAgent(t.c, account.id, { name: "Grace" });
    const chat = t.c.chats.createChat({ accountId: account.id, agentIds: [ada.id, grace.id] });
    t.c.chats.createMessage({ chatId: chat.id, role: "user", userId: user.id, content: "Status?" });
    t.c.chats.createMessage({ chatId: chat.id, role: "assistant", agentId: ada.id, content: "On track" });
    t.c.chats.createMessage({ chatId: chat.id, role: "assistant", agentId: grace.id, content: "" });
    t.c.chats.createMessage({ chatId: chat.id, role: "assistant", agentId: grace.id, content: "Agreed" });

    expect(builder.build(ada, chat).slice(1)).toEqual([
      { role: "user", content: "[Dana]: Status?" },
      { role: "assistant", content: "On track" },
      { role: "user", content: "[Grace]: Agreed" },
    ]);
  });
});
