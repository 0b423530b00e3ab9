import type { MemoryConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { ModelClient } from "../providers/types.js";
import type { TaskQueue } from "../queue/types.js";
import type { AgentStore } from "../store/agent-store.js";
import type { ChatStore } from "../store/chat-store.js";
import type { MemoryStore } from "../store/memory-store.js";
import type { Agent, AuthoredMessage } from "../store/types.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { isBlank } from "../utils/text.js";
import { chunkByTokens } from "./chunking.js";
import { EMPTY_EXTRACTION, parseExtraction, type Extraction } from "./extraction.js";
import { EXTRACTION_FORMAT, EXTRACTION_PROMPT, fillTemplate } from "./prompts.js";

export interface ConsolidatorDeps {
  readonly chats: ChatStore;
  readonly agents: AgentStore;
  readonly memories: MemoryStore;
  readonly models: ModelClient;
  readonly queue: TaskQueue;
  readonly config: MemoryConfig;
  readonly logger: Logger;
  readonly clock?: Clock;
}

export interface ConsolidationResult {
  readonly messages: number;
  readonly chunks: number;
  readonly memoriesCreated: number;
}

export function transcriptLine(message: AuthoredMessage): string {
  return `[${message.authorName}]: ${message.content}`;
}

function formatExisting(core: readonly string[]): string {
  return core.length === 0 ? "None yet." : core.map((c) => `- ${c}`).join("\n");
}

/** Turns finished group conversations into journal and core memories for each participating agent. */
export class Consolidator {
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(private readonly deps: ConsolidatorDeps) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger.child({ component: "consolidator" });
  }

  /** Queues consolidation for every group chat idle past the threshold with unconsolidated messages. */
  sweep(): number {
    const idleBefore = this.clock() - this.deps.config.idleThresholdMs;
    const chats = this.deps.chats.listStaleGroupChats(idleBefore);
    for (const chat of chats) {
      this.deps.queue.submit("consolidate-conversation", { chatId: chat.id });
    }
    this.logger.info({ chats: chats.length }, "Consolidation sweep queued chats");
    return chats.length;
  }

  async consolidate(chatId: string): Promise<ConsolidationResult> {
    const chat = this.deps.chats.getChat(chatId);
    if (!chat) {
      this.logger.warn({ chatId }, "Consolidation skipped: chat not found");
      return { messages: 0, chunks: 0, memoriesCreated: 0 };
    }

    const watermark = chat.lastConsolidatedMessageId ?? 0;
    // The batch ends before a message still streaming so the watermark never passes it.
    const streamingId = this.deps.chats.firstStreamingMessageId(chat.id, watermark);
    const messages = this.deps.chats
      .listTranscript(chat.id, watermark)
      .filter((m) => streamingId === null || m.id < streamingId);
    if (streamingId !== null) {
      this.logger.debug({ chatId, streamingId, messages: messages.length }, "Consolidation held at streaming message");
    }
    const last = messages.at(-1);
    if (!last) return { messages: 0, chunks: 0, memoriesCreated: 0 };

    const chunks = chunkByTokens(messages, transcriptLine, this.deps.config.chunkTargetTokens);
    let memoriesCreated = 0;

    for (const agent of this.deps.agents.listForChat(chat.id)) {
      try {
        memoriesCreated += await this.extractForAgent(agent, chunks);
      } catch (err) {
        this.logger.error({ err, chatId, agentId: agent.id }, "Memory extraction failed for agent");
      }
    }

    this.deps.chats.markConsolidated(chat.id, last.id);
    this.logger.info({ chatId, messages: messages.length, chunks: chunks.length, memoriesCreated }, "Conversation consolidated");
    return { messages: messages.length, chunks: chunks.length, memoriesCreated };
  }

  private async extractForAgent(agent: Agent, chunks: readonly AuthoredMessage[][]): Promise<number> {
    const knownCore = this.deps.memories.listCore(agent.id).map((m) => m.content);
    let created = 0;

    for (const chunk of chunks) {
      const extracted = await this.extract(agent, chunk, knownCore);
      for (const content of extracted.journal) {
        this.deps.memories.create({ agentId: agent.id, memoryType: "journal", content });
        created++;
      }
      for (const content of extracted.core) {
        this.deps.memories.create({ agentId: agent.id, memoryType: "core", content });
        knownCore.push(content);
        created++;
      }
    }
    return created;
  }

  private async extract(agent: Agent, chunk: readonly AuthoredMessage[], knownCore: readonly string[]): Promise<Extraction> {
    const template = isBlank(agent.reflectionPrompt) ? EXTRACTION_PROMPT : (agent.reflectionPrompt ?? "");
    const instructions = fillTemplate(template, {
      system_prompt: isBlank(agent.systemPrompt) ? `You are ${agent.name}.` : (agent.systemPrompt ?? ""),
      existing_memories: formatExisting(knownCore),
    });
    const conversation = chunk.map(transcriptLine).join("\n\n");
    const prompt = `${instructions}\n\n${EXTRACTION_FORMAT}\n\n---\n\nConversation:\n\n${conversation}`;

    try {
      const reply = await this.deps.models.ask(agent.modelId, [{ role: "user", content: prompt }]);
      const extraction = parseExtraction(reply);
      if (!extraction) {
        this.logger.warn({ agentId: agent.id }, "Unparseable memory extraction reply");
        return EMPTY_EXTRACTION;
      }
      return extraction;
    } catch (err) {
      this.logger.error({ err, agentId: agent.id }, "Memory extraction call failed");
      return EMPTY_EXTRACTION;
    }
  }
}
