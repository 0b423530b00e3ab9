import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { chatChannel, type BroadcastEvent } from "../../src/broadcast/hub.js";
import { EMPTY_NOTICE, SAFETY_NOTICE, incompleteNotice } from "../../src/orchestrator/finalize.js";
import { ResponseTurn } from "../../src/orchestrator/response-turn.js";
import type { ModelEvent } from "../../src/providers/types.js";
import type { Agent, Chat } from "../../src/store/types.js";
import { makeReply, textEvents } from "../helpers/fake-model.js";
import { createTestContext, seedAgent, seedTeam, type TestContext } from "../helpers/fixtures.js";

async function* from(events: readonly ModelEvent[], error?: Error): AsyncGenerator<ModelEvent> {
  for (const event of events) yield event;
  if (error) throw error;
}

describe("ResponseTurn", () => {
  let t: TestContext;
  let chat: Chat;
  let agent: Agent;
  let events: BroadcastEvent[];

  function newTurn(): ResponseTurn {
    return new ResponseTurn(
      {
        chats: t.c.chats,
        hub: t.c.hub,
        queue: t.c.queue,
        logger: t.c.logger,
        streaming: t.c.config.streaming,
        moderationEnabled: t.c.config.moderation.enabled,
        clock: t.clock.read,
      },
      chat,
      agent,
    );
  }

  function setup(config: Record<string, unknown> = {}): void {
    t = createTestContext({ config });
    const { account } = seedTeam(t.c);
    agent = seedAgent(t.c, account.id);
    chat = t.c.chats.createChat({ accountId: account.id, agentIds: [agent.id] });
    events = [];
    t.c.hub.subscribe(chatChannel(chat.id), (event) => events.push(event));
  }

  beforeEach(() => setup());
  afterEach(() => t.cleanup());

  it("streams chunks arriving within the interval as one flush", async () => {
    const turn = newTurn();
    const [message] = await turn.run(from(textEvents(["Hel", "lo, ", "world"])));

    const streamed = events.filter((e) => e.type === "message.stream");
    expect(streamed).toEqual([{ type: "message.stream", messageId: message?.id, channel: "content", text: "Hello, world" }]);
    expect(message?.content).toBe("Hello, world");
    expect(message?.streaming).toBe(false);
    expect(turn.state).toBe("succeeded");
  });

  it("persisted content equals the concatenation of every delta", async () => {
    const chunks = ["One ", "two ", "three ", "four"];
    const script: ModelEvent[] = [{ type: "message.start" }];
    const turn = newTurn();
    const stream = (async function* (): AsyncGenerator<ModelEvent> {
      yield* script;
      for (const text of chunks) {
        t.clock.advance(150);
        yield { type: "content.delta", text };
      }
      yield { type: "message.end", reply: makeReply(chunks.join("")) };
    })();

    const [message] = await turn.run(stream);
    const streamed = events.flatMap((e) => (e.type === "message.stream" ? [e.text] : []));
    expect(streamed.join("")).toBe("One two three four");
    expect(streamed.length).toBeGreaterThan(1);
    expect(t.c.chats.getMessage(message?.id ?? -1)?.content).toBe("One two three four");
  });

  it("finalize is idempotent and queues moderation only once", async () => {
    t.cleanup();
    setup({ moderation: { enabled: true } });
    const turn = newTurn();
    const reply = makeReply("Stable answer");
    await turn.run(from([{ type: "message.start" }, { type: "content.delta", text: "Stable answer" }, { type: "message.end", reply }]));

    const again = turn.finalize(reply);
    expect(again.content).toBe("Stable answer");
    expect(turn.finalizedMessages).toHaveLength(1);
    expect(t.c.chats.listTranscript(chat.id)).toHaveLength(1);
    expect(t.c.queue.stats().pending).toBe(1);
  });

  it("uses the streamed text when the reported content is blank", async () => {
    const turn = newTurn();
    const [message] = await turn.run(
      from([
        { type: "message.start" },
        { type: "content.delta", text: "streamed only" },
        { type: "message.end", reply: makeReply("") },
      ]),
    );
    expect(message?.content).toBe("streamed only");
  });

  it("substitutes the generic notice for an empty reply with no output", async () => {
    const [message] = await newTurn().run(from(textEvents([], { outputTokens: 0 })));
    expect(message?.content).toBe(EMPTY_NOTICE);
  });

  it("substitutes the safety notice when the provider filtered the reply", async () => {
    const raw = { choices: [{ finish_reason: "content_filter" }] };
    const [message] = await newTurn().run(from(textEvents([], { outputTokens: 0, finishReason: "content_filter", raw })));
    expect(message?.content).toBe(SAFETY_NOTICE);
  });

  it("names the finish reason when the reply stopped early", async () => {
    const [message] = await newTurn().run(from(textEvents([], { outputTokens: 0, finishReason: "length" })));
    expect(message?.content).toBe(incompleteNotice("length"));
  });

  it("reuses the blank message across a tool round and records tools used", async () => {
    const call = { id: "call-1", name: "fetch_page", arguments: { url: "https://example.com/a" } };
    const quiet = { id: "call-2", name: "view_system_prompt", arguments: {} };
    const turn = newTurn();
    const finalized = await turn.run(
      from([
        { type: "message.start" },
        { type: "tool.call", call },
        { type: "tool.call", call: quiet },
        { type: "message.end", reply: makeReply("", { toolCalls: [call, quiet] }) },
        { type: "message.end", reply: makeReply("page text", { role: "tool" }) },
        { type: "message.start" },
        { type: "content.delta", text: "Done" },
        { type: "message.end", reply: makeReply("Done") },
      ]),
    );

    expect(turn.messageIds).toHaveLength(1);
    expect(finalized).toHaveLength(1);
    expect(finalized[0]?.content).toBe("Done");
    expect(finalized[0]?.toolsUsed).toEqual(["https://example.com/a", "view_system_prompt"]);
    const toolEvents = events.filter((e) => e.type === "tool.call");
    expect(toolEvents).toHaveLength(1);
    expect(toolEvents[0]).toMatchObject({ name: "fetch_page" });
  });

  it("coalesces reasoning on its own shorter interval", async () => {
    const turn = newTurn();
    const stream = (async function* (): AsyncGenerator<ModelEvent> {
      yield { type: "message.start" };
      yield { type: "reasoning.delta", text: "Let me " };
      t.clock.advance(60);
      yield { type: "reasoning.delta", text: "think" };
      t.clock.advance(40);
      yield { type: "reasoning.delta", text: " it over" };
      yield { type: "content.delta", text: "Answer" };
      yield { type: "message.end", reply: makeReply("Answer") };
    })();

    const [message] = await turn.run(stream);
    const streamed = events.flatMap((e) => (e.type === "message.stream" ? [[e.channel, e.text]] : []));
    expect(streamed).toEqual([
      ["thinking", "Let me think it over"],
      ["content", "Answer"],
    ]);
    expect(message?.thinking).toBe("Let me think it over");
  });

  it("prefers the reported reasoning over the streamed reasoning", async () => {
    const [message] = await newTurn().run(
      from([
        { type: "message.start" },
        { type: "reasoning.delta", text: "raw chain" },
        { type: "content.delta", text: "Answer" },
        { type: "message.end", reply: makeReply("Answer", { reasoning: "Condensed summary" }) },
      ]),
    );
    expect(message?.thinking).toBe("Condensed summary");
  });

  it("keeps reasoning from a tool round on the reused message", async () => {
    const call = { id: "call-1", name: "fetch_page", arguments: { url: "https://example.com/a" } };
    const turn = newTurn();
    const finalized = await turn.run(
      from([
        { type: "message.start" },
        { type: "reasoning.delta", text: "I should search first." },
        { type: "tool.call", call },
        { type: "message.end", reply: makeReply("", { toolCalls: [call] }) },
        { type: "message.end", reply: makeReply("page text", { role: "tool" }) },
        { type: "message.start" },
        { type: "content.delta", text: "Done" },
        { type: "message.end", reply: makeReply("Done") },
      ]),
    );

    const thinking = events.flatMap((e) => (e.type === "message.stream" && e.channel === "thinking" ? [e.text] : []));
    expect(thinking).toEqual(["I should search first."]);
    expect(turn.messageIds).toHaveLength(1);
    expect(finalized[0]?.thinking).toBe("I should search first.");
    expect(t.c.chats.getMessage(finalized[0]?.id ?? -1)?.thinking).toBe("I should search first.");
  });

  it("creates a separate message for each non-blank reply in the turn", async () => {
    const turn = newTurn();
    const finalized = await turn.run(from([...textEvents(["one"]), ...textEvents(["two"])]));
    expect(finalized.map((m) => m.content)).toEqual(["one", "two"]);
    expect(turn.messageIds).toHaveLength(2);
  });

  it("deletes a blank streaming message when the stream fails", async () => {
    const turn = newTurn();
    await expect(turn.run(from([{ type: "message.start" }], new Error("boom")))).rejects.toThrow("boom");

    expect(turn.state).toBe("failed");
    expect(t.c.chats.listTranscript(chat.id)).toEqual([]);
    expect(events.map((e) => e.type)).toEqual(["message.created", "message.deleted"]);
  });

  it("keeps partial content and stops streaming when the stream fails", async () => {
    const turn = newTurn();
    await expect(
      turn.run(from([{ type: "message.start" }, { type: "content.delta", text: "partial" }], new Error("boom"))),
    ).rejects.toThrow("boom");

    const [id] = turn.messageIds;
    const message = t.c.chats.getMessage(id ?? -1);
    expect(message?.content).toBe("partial");
    expect(message?.streaming).toBe(false);
  });
});
