import type { BroadcastHub } from "../broadcast/hub.js";
import { chatChannel } from "../broadcast/hub.js";
import type { StreamingConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { classifyProviderError, MissingCapabilityError, ModelNotFoundError } from "../providers/errors.js";
import type { ModelRegistry } from "../providers/model-registry.js";
import type { ProviderSelector } from "../providers/selector.js";
import type { ModelClient } from "../providers/types.js";
import type { TaskQueue } from "../queue/types.js";
import type { AgentStore } from "../store/agent-store.js";
import type { ChatStore } from "../store/chat-store.js";
import { isRespondable, type Message } from "../store/types.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { Clock } from "../utils/clock.js";
import type { ContextBuilder } from "./context-builder.js";
import { ResponseTurn } from "./response-turn.js";

export const DEFAULT_THINKING_BUDGET = 10_000;

export interface AgentResponderDeps {
  readonly chats: ChatStore;
  readonly agents: AgentStore;
  readonly context: ContextBuilder;
  readonly models: ModelClient;
  readonly selector: ProviderSelector;
  readonly registry: ModelRegistry;
  readonly tools: ToolRegistry;
  readonly hub: BroadcastHub;
  readonly queue: TaskQueue;
  readonly logger: Logger;
  readonly streaming: StreamingConfig;
  readonly moderationEnabled: boolean;
  readonly clock?: Clock;
}

export interface RespondParams {
  readonly chatId: string;
  readonly agentId: string;
  readonly initiationReason?: string;
}

/** Runs one agent's reply in one chat. */
export class AgentResponder {
  constructor(private readonly deps: AgentResponderDeps) {}

  /**
   * Resolves with the finalized messages, or an empty list when the chat or
   * agent cannot be resolved or the agent lacks a required capability.
   * Provider failures are rethrown for the queue's retry policy.
   */
  async respond(params: RespondParams): Promise<readonly Message[]> {
    const { chats, agents, logger } = this.deps;
    const chat = chats.getChat(params.chatId);
    const agent = agents.getAgent(params.agentId);

    if (!chat || !agent || agent.accountId !== chat.accountId) {
      logger.warn({ chatId: params.chatId, agentId: params.agentId }, "Response skipped: chat or agent not found");
      return [];
    }
    if (!isRespondable(chat)) {
      logger.info({ chatId: chat.id }, "Response skipped: chat is archived or discarded");
      return [];
    }

    if (!this.deps.registry.isAvailable(agent.modelId)) {
      logger.warn({ chatId: chat.id, agentId: agent.id, modelId: agent.modelId }, "Model missing from the refreshed model list");
      throw new ModelNotFoundError(`Model ${agent.modelId} is not in the model list`, 404);
    }

    const turn = new ResponseTurn(
      {
        chats,
        hub: this.deps.hub,
        queue: this.deps.queue,
        logger,
        streaming: this.deps.streaming,
        moderationEnabled: this.deps.moderationEnabled,
        clock: this.deps.clock,
      },
      chat,
      agent,
    );

    try {
      if (agent.thinkingEnabled) this.deps.selector.assertThinkingCapability(agent.modelId);

      const session = this.deps.models.session(agent.modelId);
      if (agent.thinkingEnabled) {
        this.deps.selector.configureThinking(
          session,
          agent.thinkingBudget ?? DEFAULT_THINKING_BUDGET,
          session.route.provider,
        );
      }
      const tools = this.deps.tools.forAgent(agent, chat.id);
      if (tools.length > 0) session.withTools(tools);
      for (const message of this.deps.context.build(agent, chat, params.initiationReason)) {
        session.addMessage(message);
      }

      return await turn.run(session.stream());
    } catch (raw) {
      const err = classifyProviderError(raw);
      logger.error({ err, chatId: chat.id, agentId: agent.id, state: turn.state }, "Agent response failed");

      if (err instanceof MissingCapabilityError) {
        this.deps.hub.publish(chatChannel(chat.id), { type: "chat.error", agentId: agent.id, error: err.message });
        return [];
      }
      if (err instanceof ModelNotFoundError) {
        await this.refreshRegistry();
      }
      throw err;
    }
  }

  /** Tells the chat the agent gave up after its last retry. */
  reportExhausted(params: RespondParams, err: unknown): void {
    const agent = this.deps.agents.getAgent(params.agentId);
    const name = agent?.name ?? "The agent";
    const reason = err instanceof Error ? err.message : String(err);
    this.deps.hub.publish(chatChannel(params.chatId), {
      type: "chat.error",
      agentId: params.agentId,
      error: `${name} could not respond: ${reason}`,
    });
  }

  private async refreshRegistry(): Promise<void> {
    try {
      await this.deps.registry.refresh();
    } catch (err) {
      this.deps.logger.warn({ err }, "Model registry refresh failed");
    }
  }
}
