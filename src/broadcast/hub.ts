import type { Logger } from "../logging/logger.js";
import type { Message } from "../store/types.js";

export type StreamChannel = "content" | "thinking";

export type BroadcastEvent =
  | { readonly type: "message.created"; readonly message: Message }
  | {
      readonly type: "message.stream";
      readonly messageId: number;
      readonly channel: StreamChannel;
      readonly text: string;
    }
  | { readonly type: "message.finalized"; readonly message: Message }
  | { readonly type: "message.streaming_stopped"; readonly messageId: number }
  | { readonly type: "message.deleted"; readonly messageId: number }
  | {
      readonly type: "tool.call";
      readonly messageId: number;
      readonly name: string;
      readonly arguments: Record<string, unknown>;
    }
  | { readonly type: "chat.error"; readonly agentId: string; readonly error: string }
  | { readonly type: "chat.debug"; readonly agentId: string; readonly data: Record<string, unknown> }
  | {
      readonly type: "agent.initiation_notice";
      readonly agentId: string;
      readonly action: string;
      readonly reason: string;
      readonly conversationId: string | null;
    }
  | { readonly type: "message.moderated"; readonly messageId: number; readonly flagged: boolean };

export type BroadcastListener = (event: BroadcastEvent) => void;

export function chatChannel(chatId: string): string {
  return `chat:${chatId}`;
}

export function accountChannel(accountId: string): string {
  return `account:${accountId}`;
}

/**
 * In-process pub/sub. A throwing listener is logged and does not stop
 * delivery to the others.
 */
export class BroadcastHub {
  private readonly listeners = new Map<string, Set<BroadcastListener>>();

  constructor(private readonly logger: Logger) {}

  subscribe(channel: string, listener: BroadcastListener): () => void {
    let set = this.listeners.get(channel);
    if (!set) {
      set = new Set();
      this.listeners.set(channel, set);
    }
    set.add(listener);
    return () => this.unsubscribe(channel, listener);
  }

  unsubscribe(channel: string, listener: BroadcastListener): void {
    const set = this.listeners.get(channel);
    if (!set) return;
    set.delete(listener);
    if (set.size === 0) this.listeners.delete(channel);
  }

  publish(channel: string, event: BroadcastEvent): void {
    const set = this.listeners.get(channel);
    if (!set) return;
    for (const listener of [...set]) {
      try {
        listener(event);
      } catch (err) {
        this.logger.error({ err, channel, event: event.type }, "Broadcast listener failed");
      }
    }
  }

  listenerCount(channel: string): number {
    return this.listeners.get(channel)?.size ?? 0;
  }
}
