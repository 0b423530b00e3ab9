import OpenAI from "openai";
import type { ProvidersConfig, StreamingConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { MissingCapabilityError } from "./errors.js";
import { OpenAISession } from "./openai-session.js";
import type { ProviderSelector } from "./selector.js";
import type { ChatMessage, ModelClient, ModelSession, ModerationClient, ModerationResult, ProviderId } from "./types.js";

export type OpenAIFactory = (options: { apiKey: string; baseURL?: string }) => OpenAI;

const DIRECT_BASE_URLS: Record<Exclude<ProviderId, "openrouter" | "openai">, string> = {
  anthropic: "https://api.anthropic.com/v1/",
  gemini: "https://generativelanguage.googleapis.com/v1beta/openai/",
  xai: "https://api.x.ai/v1",
};

const MODERATION_MODEL = "omni-moderation-latest";

const defaultFactory: OpenAIFactory = (options) => new OpenAI(options);

/** Text of the last assistant reply in a session's event stream. */
export async function collectReply(session: ModelSession): Promise<string> {
  let text = "";
  for await (const event of session.stream()) {
    if (event.type === "message.end" && event.reply.role === "assistant") {
      text = event.reply.content;
    }
  }
  return text;
}

/**
 * Builds sessions on the OpenAI SDK for every provider: OpenRouter and the
 * direct providers all speak the chat-completions protocol.
 */
export class OpenAIModelClient implements ModelClient, ModerationClient {
  private readonly clients = new Map<ProviderId, OpenAI>();

  constructor(
    private readonly providers: ProvidersConfig,
    private readonly streaming: StreamingConfig,
    private readonly selector: ProviderSelector,
    private readonly logger: Logger,
    private readonly factory: OpenAIFactory = defaultFactory,
  ) {}

  session(modelId: string): ModelSession {
    const route = this.selector.select(modelId);
    return new OpenAISession(this.client(route.provider), route, {
      maxToolRounds: this.streaming.maxToolRounds,
      logger: this.logger,
    });
  }

  async ask(modelId: string, messages: readonly ChatMessage[]): Promise<string> {
    const session = this.session(modelId);
    for (const message of messages) session.addMessage(message);
    return collectReply(session);
  }

  /** Model ids reported by OpenRouter; feeds `ModelRegistry.refresh`. */
  async listOpenRouterModels(): Promise<string[]> {
    const ids: string[] = [];
    for await (const model of this.client("openrouter").models.list()) {
      ids.push(model.id);
    }
    return ids;
  }

  /** Classifies text with OpenAI's moderation endpoint; needs an OpenAI key. */
  async moderate(input: string): Promise<ModerationResult> {
    const response = await this.client("openai").moderations.create({ model: MODERATION_MODEL, input });
    const result = response.results[0];
    if (!result) return { flagged: false, scores: {} };

    const scores: Record<string, number> = {};
    for (const [category, score] of Object.entries(result.category_scores)) {
      if (typeof score === "number") scores[category] = score;
    }
    return { flagged: result.flagged, scores };
  }

  private client(provider: ProviderId): OpenAI {
    const cached = this.clients.get(provider);
    if (cached) return cached;

    const apiKey = this.selector.apiKey(provider);
    if (!apiKey) {
      throw new MissingCapabilityError(`No API key configured for provider ${provider}`);
    }
    const baseURL =
      provider === "openrouter"
        ? this.providers.openrouterBaseUrl
        : provider === "openai"
          ? undefined
          : DIRECT_BASE_URLS[provider];

    const client = this.factory(baseURL ? { apiKey, baseURL } : { apiKey });
    this.clients.set(provider, client);
    return client;
  }
}
