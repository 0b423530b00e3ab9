import { Command, Option } from "clipanion";
import { openRuntime } from "../../gateway/lifecycle.js";
import { PROVIDER_RETRY_POLICY } from "../../queue/retry-policy.js";

export class RespondCommand extends Command {
  static override paths = [["respond"]];

  static override usage = Command.Usage({
    description: "Have one or more agents reply in a chat",
    details:
      "With one agent id a single response is queued; with several they answer in the given order. " +
      "Without agent ids every agent in the chat answers in its chat order.",
    examples: [
      ["One agent replies", "colloquy respond <chat-id> <agent-id>"],
      ["Two agents reply in order", "colloquy respond <chat-id> <agent-a> <agent-b>"],
    ],
  });

  chatId = Option.String({ name: "chatId" });
  agentIds = Option.Rest({ name: "agentIds" });
  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<number> {
    const runtime = openRuntime({ configPath: this.config });
    const { chats, agents, queue, db } = runtime;
    try {
      const chat = chats.getChat(this.chatId);
      if (!chat) {
        this.context.stderr.write(`Chat not found: ${this.chatId}\n`);
        return 1;
      }

      const agentIds = this.agentIds.length > 0 ? this.agentIds : agents.listForChat(chat.id).map((a) => a.id);
      if (agentIds.length === 0) {
        this.context.stderr.write(`Chat ${chat.id} has no agents\n`);
        return 1;
      }

      const [only] = agentIds;
      if (agentIds.length === 1 && only !== undefined) {
        queue.submit("agent-response", { chatId: chat.id, agentId: only }, { retryPolicy: PROVIDER_RETRY_POLICY });
      } else {
        queue.submit("all-agents-response", { chatId: chat.id, agentIds }, { retryPolicy: PROVIDER_RETRY_POLICY });
      }
      await queue.drain();

      for (const message of chats.listTranscript(chat.id).slice(-agentIds.length)) {
        this.context.stdout.write(`[${message.authorName}]: ${message.content}\n`);
      }
      return 0;
    } finally {
      db.close();
    }
  }
}
