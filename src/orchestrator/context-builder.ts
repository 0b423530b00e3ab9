import type { ChatStore } from "../store/chat-store.js";
import type { MemoryStore } from "../store/memory-store.js";
import type { Agent, Chat } from "../store/types.js";
import type { ChatMessage } from "../providers/types.js";
import { buildMemoryContext } from "../memory/context.js";
import { isBlank } from "../utils/text.js";

export class ContextBuilder {
  constructor(
    private readonly chats: ChatStore,
    private readonly memories: MemoryStore,
  ) {}

  systemPrompt(agent: Agent, initiationReason?: string | null): string {
    const parts = [isBlank(agent.systemPrompt) ? `You are ${agent.name}.` : (agent.systemPrompt ?? "").trim()];

    const memory = buildMemoryContext(this.memories.listCore(agent.id), this.memories.listLiveJournal(agent.id));
    if (memory) parts.push(memory);

    if (!isBlank(initiationReason)) {
      parts.push(`You are speaking up on your own initiative. Your reason: ${initiationReason}`);
    }
    return parts.join("\n\n");
  }

  /**
   * The agent's own messages are replayed as assistant turns; everyone
   * else's as user turns labelled with the author's name.
   */
  build(agent: Agent, chat: Chat, initiationReason?: string | null): ChatMessage[] {
    const messages: ChatMessage[] = [{ role: "system", content: this.systemPrompt(agent, initiationReason) }];

    for (const message of this.chats.listTranscript(chat.id)) {
      if (isBlank(message.content)) continue;
      if (message.agentId === agent.id) {
        messages.push({ role: "assistant", content: message.content });
      } else {
        messages.push({ role: "user", content: `[${message.authorName}]: ${message.content}` });
      }
    }
    return messages;
  }
}
