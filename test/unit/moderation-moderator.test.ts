import { describe, it, expect, afterEach, vi } from "vitest";
import { chatChannel, type BroadcastEvent } from "../../src/broadcast/hub.js";
import type { ModerationClient, ModerationResult } from "../../src/providers/types.js";
import { createTestContext, seedAgent, seedTeam, type TestContext } from "../helpers/fixtures.js";

describe("Moderator", () => {
  let t: TestContext;

  afterEach(() => t.cleanup());

  function setup(result: ModerationResult, enabled = true) {
    const client: ModerationClient = { moderate: vi.fn(async () => result) };
    t = createTestContext({ config: { moderation: { enabled } }, moderation: client });
    const { account } = seedTeam(t.c);
    const agent = seedAgent(t.c, account.id);
    const chat = t.c.chats.createChat({ accountId: account.id, agentIds: [agent.id] });
    return { client, agent, chat };
  }

  it("records the verdict and broadcasts it", async () => {
    const { client, agent, chat } = setup({ flagged: true, scores: { harassment: 0.91 } });
    const message = t.c.chats.createMessage({ chatId: chat.id, role: "assistant", agentId: agent.id, content: "Rude reply" });
    const events: BroadcastEvent[] = [];
    t.c.hub.subscribe(chatChannel(chat.id), (e) => events.push(e));

    expect(await t.c.moderator?.moderate(message.id)).toBe(true);

    expect(client.moderate).toHaveBeenCalledWith("Rude reply");
    expect(t.c.chats.getMessage(message.id)?.moderationFlagged).toBe(true);
    expect(events).toEqual([{ type: "message.moderated", messageId: message.id, flagged: true }]);
  });

  it("skips blank and missing messages", async () => {
    const { client, agent, chat } = setup({ flagged: false, scores: {} });
    const blank = t.c.chats.createMessage({ chatId: chat.id, role: "assistant", agentId: agent.id, content: "  " });

    expect(await t.c.moderator?.moderate(blank.id)).toBeNull();
    expect(await t.c.moderator?.moderate(9999)).toBeNull();
    expect(client.moderate).not.toHaveBeenCalled();
  });

  it("runs from the queue", async () => {
    const { agent, chat } = setup({ flagged: false, scores: { violence: 0.01 } });
    const message = t.c.chats.createMessage({ chatId: chat.id, role: "assistant", agentId: agent.id, content: "Fine reply" });

    t.c.queue.submit("moderate-message", { messageId: message.id });
    await t.c.queue.drain();

    expect(t.c.chats.getMessage(message.id)?.moderationFlagged).toBe(false);
  });

  it("is absent when moderation is disabled, and its jobs finish without work", async () => {
    const { client } = setup({ flagged: true, scores: {} }, false);
    expect(t.c.moderator).toBeNull();

    t.c.queue.submit("moderate-message", { messageId: 1 });
    await t.c.queue.drain();

    expect(t.c.queue.stats()).toMatchObject({ done: 1, failed: 0 });
    expect(client.moderate).not.toHaveBeenCalled();
  });
});
