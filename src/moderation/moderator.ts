import { chatChannel, type BroadcastHub } from "../broadcast/hub.js";
import type { Logger } from "../logging/logger.js";
import type { ModerationClient } from "../providers/types.js";
import type { ChatStore } from "../store/chat-store.js";
import { isBlank } from "../utils/text.js";

/** Handler for `moderate-message`: scores a finalized message and records the verdict. */
export class Moderator {
  private readonly logger: Logger;

  constructor(
    private readonly chats: ChatStore,
    private readonly client: ModerationClient,
    private readonly hub: BroadcastHub,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "moderation" });
  }

  async moderate(messageId: number): Promise<boolean | null> {
    const message = this.chats.getMessage(messageId);
    if (!message || isBlank(message.content)) {
      this.logger.debug({ messageId }, "Nothing to moderate");
      return null;
    }

    const result = await this.client.moderate(message.content);
    this.chats.recordModeration(message.id, result.flagged, result.scores);
    if (result.flagged) {
      this.logger.warn({ messageId, chatId: message.chatId }, "Message flagged by moderation");
    }
    this.hub.publish(chatChannel(message.chatId), {
      type: "message.moderated",
      messageId: message.id,
      flagged: result.flagged,
    });
    return result.flagged;
  }
}
