import { BroadcastHub } from "../broadcast/hub.js";
import type { ColloquyConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { InitiationEngine } from "../initiation/engine.js";
import { Consolidator } from "../memory/consolidator.js";
import { Reflector } from "../memory/reflector.js";
import { Refiner } from "../memory/refiner.js";
import { Moderator } from "../moderation/moderator.js";
import { AgentResponder } from "../orchestrator/agent-responder.js";
import { ContextBuilder } from "../orchestrator/context-builder.js";
import { OpenAIModelClient } from "../providers/model-client.js";
import { ModelRegistry, type ModelIdSource } from "../providers/model-registry.js";
import { isKeyAvailable, ProviderSelector } from "../providers/selector.js";
import type { ModelClient, ModerationClient } from "../providers/types.js";
import { JobQueue } from "../queue/job-queue.js";
import { AgentSequencer } from "../sequencer/all-agents.js";
import { AccountStore } from "../store/account-store.js";
import { AgentStore } from "../store/agent-store.js";
import { AuditStore } from "../store/audit-store.js";
import { ChatStore } from "../store/chat-store.js";
import type { ColloquyDB } from "../store/db.js";
import { MemoryStore } from "../store/memory-store.js";
import { saveMemoryTool } from "../tools/save-memory.js";
import { ToolRegistry } from "../tools/registry.js";
import { viewSystemPromptTool } from "../tools/view-system-prompt.js";
import { systemClock, type Clock } from "../utils/clock.js";

export interface Components {
  readonly config: ColloquyConfig;
  readonly logger: Logger;
  readonly db: ColloquyDB;
  readonly queue: JobQueue;
  readonly hub: BroadcastHub;
  readonly accounts: AccountStore;
  readonly agents: AgentStore;
  readonly chats: ChatStore;
  readonly memories: MemoryStore;
  readonly audit: AuditStore;
  readonly registry: ModelRegistry;
  readonly selector: ProviderSelector;
  readonly models: ModelClient;
  readonly tools: ToolRegistry;
  readonly responder: AgentResponder;
  readonly sequencer: AgentSequencer;
  readonly consolidator: Consolidator;
  readonly reflector: Reflector;
  readonly refiner: Refiner;
  readonly initiation: InitiationEngine;
  readonly moderator: Moderator | null;
}

export interface ComponentOverrides {
  readonly clock?: Clock;
  readonly random?: () => number;
  /** Stand-ins for the OpenAI-backed clients. */
  readonly models?: ModelClient;
  readonly moderation?: ModerationClient;
  /** Replaces the OpenRouter listing the model registry refreshes from. */
  readonly modelIds?: ModelIdSource;
}

/** Wires every component over one database; starts nothing. */
export function buildComponents(
  config: ColloquyConfig,
  logger: Logger,
  db: ColloquyDB,
  overrides: ComponentOverrides = {},
): Components {
  const clock = overrides.clock ?? systemClock;
  const random = overrides.random ?? Math.random;

  const queue = new JobQueue(db, config.queue, logger, { clock, random });
  const hub = new BroadcastHub(logger);
  const accounts = new AccountStore(db, clock);
  const agents = new AgentStore(db, clock);
  const chats = new ChatStore(db, clock);
  const memories = new MemoryStore(db, config.memory.journalWindowMs, clock);
  const audit = new AuditStore(db, clock);

  const listsRemoteModels = !overrides.models && isKeyAvailable(config.providers.openrouterApiKey);
  const registry: ModelRegistry = new ModelRegistry(
    config.models,
    overrides.modelIds ?? (listsRemoteModels ? () => openai.listOpenRouterModels() : null),
    logger,
  );
  const selector: ProviderSelector = new ProviderSelector(config.providers, registry, logger);
  const openai: OpenAIModelClient = new OpenAIModelClient(config.providers, config.streaming, selector, logger);
  const models = overrides.models ?? openai;

  const tools = new ToolRegistry();
  tools.register("save_memory", saveMemoryTool(memories));
  tools.register("view_system_prompt", viewSystemPromptTool);

  const responder = new AgentResponder({
    chats,
    agents,
    context: new ContextBuilder(chats, memories),
    models,
    selector,
    registry,
    tools,
    hub,
    queue,
    logger,
    streaming: config.streaming,
    moderationEnabled: config.moderation.enabled,
    clock,
  });

  const moderator = config.moderation.enabled
    ? new Moderator(chats, overrides.moderation ?? openai, hub, logger)
    : null;

  return {
    config,
    logger,
    db,
    queue,
    hub,
    accounts,
    agents,
    chats,
    memories,
    audit,
    registry,
    selector,
    models,
    tools,
    responder,
    sequencer: new AgentSequencer(responder, queue, logger),
    consolidator: new Consolidator({ chats, agents, memories, models, queue, config: config.memory, logger, clock }),
    reflector: new Reflector({ agents, memories, models, logger }),
    refiner: new Refiner({ agents, memories, audit, models, config: config.memory, logger, clock }),
    initiation: new InitiationEngine({
      chats,
      agents,
      accounts,
      memories,
      audit,
      models,
      queue,
      hub,
      config: config.initiation,
      logger,
      clock,
      random,
    }),
    moderator,
  };
}
