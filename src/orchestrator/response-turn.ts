import type { BroadcastHub } from "../broadcast/hub.js";
import { chatChannel } from "../broadcast/hub.js";
import type { StreamingConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { ModelEvent, ModelReply } from "../providers/types.js";
import type { TaskQueue } from "../queue/types.js";
import type { ChatStore } from "../store/chat-store.js";
import type { Agent, Chat, Message } from "../store/types.js";
import { StreamBuffer } from "../streaming/stream-buffer.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { isBlank } from "../utils/text.js";
import { emptyResponseNotice, resolveContent } from "./finalize.js";
import { ToolUsage } from "./tool-usage.js";

export type TurnState =
  | "idle"
  | "awaiting_first_event"
  | "streaming"
  | "finalizing"
  | "succeeded"
  | "failed";

export interface ResponseTurnDeps {
  readonly chats: ChatStore;
  readonly hub: BroadcastHub;
  readonly queue: TaskQueue;
  readonly logger: Logger;
  readonly streaming: StreamingConfig;
  readonly moderationEnabled: boolean;
  readonly clock?: Clock;
}

/**
 * Drives one agent's turn from a model event stream: creates the streaming
 * message records, batches deltas through the two stream buffers and
 * finalizes each reply.
 */
export class ResponseTurn {
  private turnState: TurnState = "idle";
  private currentId: number | null = null;
  private readonly createdIds: number[] = [];
  private readonly finalized: Message[] = [];
  private readonly content: StreamBuffer;
  private readonly thinking: StreamBuffer;
  private readonly toolUsage = new ToolUsage();
  private readonly clock: Clock;
  private readonly channel: string;
  private readonly logger: Logger;

  constructor(
    private readonly deps: ResponseTurnDeps,
    private readonly chat: Chat,
    private readonly agent: Agent,
  ) {
    this.clock = deps.clock ?? systemClock;
    this.channel = chatChannel(chat.id);
    this.logger = deps.logger.child({ chatId: chat.id, agentId: agent.id });

    this.content = new StreamBuffer(
      deps.streaming.contentFlushMs,
      (text) => this.write("content", text),
      { clock: this.clock, logger: this.logger },
    );
    this.thinking = new StreamBuffer(
      deps.streaming.reasoningFlushMs,
      (text) => this.write("thinking", text),
      { clock: this.clock, logger: this.logger },
    );
  }

  get state(): TurnState {
    return this.turnState;
  }

  get messageIds(): readonly number[] {
    return this.createdIds;
  }

  get finalizedMessages(): readonly Message[] {
    return this.finalized;
  }

  get toolsUsed(): string[] {
    return this.toolUsage.list();
  }

  /**
   * Consumes the stream to its end. On failure, blank streaming messages of
   * this turn are removed before the error propagates; buffers are always
   * flushed and streaming always stopped.
   */
  async run(events: AsyncIterable<ModelEvent>): Promise<readonly Message[]> {
    this.turnState = "awaiting_first_event";
    try {
      for await (const event of events) this.handle(event);
      this.turnState = "succeeded";
      return this.finalized;
    } catch (err) {
      this.turnState = "failed";
      this.discardBlankStreaming();
      throw err;
    } finally {
      this.cleanup();
    }
  }

  handle(event: ModelEvent): void {
    if (this.deps.streaming.debug) {
      this.deps.hub.publish(this.channel, { type: "chat.debug", agentId: this.agent.id, data: { event: event.type } });
    }

    switch (event.type) {
      case "message.start":
        this.startMessage();
        break;
      case "content.delta":
        this.ensureMessage();
        this.content.enqueue(event.text);
        break;
      case "reasoning.delta":
        this.ensureMessage();
        this.thinking.enqueue(event.text);
        break;
      case "tool.call":
        this.recordToolCall(event.call.name, event.call.arguments);
        break;
      case "message.end":
        if (this.isIntermediate(event.reply)) return;
        this.finalize(event.reply);
        break;
    }
  }

  /** Persists the reply into the current message; repeat calls leave it unchanged. */
  finalize(reply: ModelReply): Message {
    const id = this.ensureMessage();
    this.turnState = "finalizing";
    this.content.flush();
    this.thinking.flush();

    const persisted = this.deps.chats.getMessage(id);
    let content = resolveContent(reply.content, this.content.accumulated, persisted?.content ?? null);
    if (content !== null && isBlank(reply.content)) {
      this.logger.warn({ messageId: id, length: content.length }, "Reported content blank, using streamed content");
    }
    if (content === null && (reply.outputTokens ?? 0) === 0) {
      content = emptyResponseNotice(reply);
      this.logger.warn({ messageId: id, finishReason: reply.finishReason }, "Model returned an empty response");
    }
    const thinking = resolveContent(reply.reasoning, this.thinking.accumulated, null);

    const message = this.deps.chats.finalizeMessage(id, {
      content: content ?? "",
      thinking,
      modelId: reply.modelId ?? persisted?.modelId ?? this.agent.modelId,
      inputTokens: reply.inputTokens,
      outputTokens: reply.outputTokens,
      toolsUsed: this.toolUsage.list(),
    });
    this.deps.hub.publish(this.channel, { type: "message.finalized", message });

    const index = this.finalized.findIndex((m) => m.id === id);
    if (index === -1) {
      this.finalized.push(message);
      if (!isBlank(message.content) && this.deps.moderationEnabled) {
        this.deps.queue.submit("moderate-message", { messageId: id });
      }
    } else {
      this.finalized[index] = message;
    }
    return message;
  }

  /** Flushes whatever is buffered and stops streaming on this turn's messages. */
  cleanup(): void {
    this.content.flush();
    this.thinking.flush();
    for (const id of this.createdIds) {
      const message = this.deps.chats.getMessage(id);
      if (message?.streaming) this.stopStreaming(id);
    }
  }

  private isIntermediate(reply: ModelReply): boolean {
    if (reply.role === "tool") return true;
    return reply.toolCalls.length > 0 && isBlank(reply.content);
  }

  private startMessage(): void {
    const current = this.currentId === null ? null : this.deps.chats.getMessage(this.currentId);
    this.turnState = "streaming";

    if (current?.streaming) {
      if (isBlank(current.content) && isBlank(this.content.accumulated)) {
        // Reasoning from the tool round stays on the reused message.
        this.content.flush();
        this.thinking.flush();
        return;
      }
      this.content.flush();
      this.thinking.flush();
      this.stopStreaming(current.id);
    }
    this.createMessage();
  }

  private ensureMessage(): number {
    return this.currentId ?? this.createMessage();
  }

  private createMessage(): number {
    const message = this.deps.chats.createMessage({
      chatId: this.chat.id,
      role: "assistant",
      agentId: this.agent.id,
      modelId: this.agent.modelId,
      streaming: true,
    });
    this.currentId = message.id;
    this.createdIds.push(message.id);
    const now = this.clock();
    this.content.reset(now);
    this.thinking.reset(now);
    this.deps.hub.publish(this.channel, { type: "message.created", message });
    return message.id;
  }

  private write(channel: "content" | "thinking", text: string): void {
    const id = this.currentId;
    if (id === null) return;
    if (channel === "content") this.deps.chats.appendContent(id, text);
    else this.deps.chats.appendThinking(id, text);
    this.deps.hub.publish(this.channel, { type: "message.stream", messageId: id, channel, text });
  }

  private recordToolCall(name: string, args: Record<string, unknown>): void {
    this.toolUsage.record(name, args);
    this.logger.info({ tool: name }, "Tool invoked");
    if (this.deps.streaming.quietTools.includes(name)) return;
    this.deps.hub.publish(this.channel, {
      type: "tool.call",
      messageId: this.currentId ?? 0,
      name,
      arguments: args,
    });
  }

  private stopStreaming(id: number): void {
    this.deps.chats.stopStreaming(id);
    this.deps.hub.publish(this.channel, { type: "message.streaming_stopped", messageId: id });
  }

  private discardBlankStreaming(): void {
    this.content.flush();
    this.thinking.flush();
    for (const id of this.createdIds) {
      const message = this.deps.chats.getMessage(id);
      if (message?.streaming && isBlank(message.content)) {
        this.deps.chats.deleteMessage(id);
        this.deps.hub.publish(this.channel, { type: "message.deleted", messageId: id });
        if (this.currentId === id) this.currentId = null;
      }
    }
  }
}
