import type { ProvidersConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { MissingCapabilityError, UnsupportedFeatureError } from "./errors.js";
import type { ModelRegistry } from "./model-registry.js";
import type { ModelSession, ProviderId, ProviderRoute } from "./types.js";

type DirectProvider = Exclude<ProviderId, "openrouter">;

const NAMESPACE_PROVIDERS: Partial<Record<string, DirectProvider>> = {
  anthropic: "anthropic",
  openai: "openai",
  google: "gemini",
  "x-ai": "xai",
};

const ANTHROPIC_MAX_TOKENS_HEADROOM = 8192;
const OPENAI_COMPLETION_HEADROOM = 16384;

/** Present, non-empty and not an unfilled `<placeholder>`. */
export function isKeyAvailable(key: string | undefined): key is string {
  if (!key) return false;
  const trimmed = key.trim();
  return trimmed !== "" && !/^<.*>$/.test(trimmed);
}

export function reasoningEffort(budgetTokens: number): "low" | "medium" | "high" {
  if (budgetTokens <= 2000) return "low";
  if (budgetTokens <= 15000) return "medium";
  return "high";
}

export class ProviderSelector {
  constructor(
    private readonly providers: ProvidersConfig,
    private readonly registry: ModelRegistry,
    private readonly logger: Logger,
  ) {}

  apiKey(provider: ProviderId): string | null {
    const key = {
      openrouter: this.providers.openrouterApiKey,
      anthropic: this.providers.anthropicApiKey,
      openai: this.providers.openaiApiKey,
      gemini: this.providers.geminiApiKey,
      xai: this.providers.xaiApiKey,
    }[provider];
    return isKeyAvailable(key) ? key.trim() : null;
  }

  /**
   * Direct route when the model's namespace has a provider, the catalog maps
   * it to a provider id and that provider's key is configured; OpenRouter
   * with the original id otherwise.
   */
  select(modelId: string): ProviderRoute {
    const namespace = modelId.split("/", 1)[0] ?? "";
    const provider = NAMESPACE_PROVIDERS[namespace];
    const providerModelId = this.registry.lookup(modelId)?.providerModelId;

    if (provider && providerModelId && this.apiKey(provider)) {
      return { provider, modelId: providerModelId };
    }
    return { provider: "openrouter", modelId };
  }

  /**
   * Turns on extended thinking, through the session's own API where it has
   * one and through raw request parameters where it does not.
   */
  configureThinking<S extends ModelSession>(session: S, budgetTokens: number, provider: ProviderId): S {
    try {
      return session.withThinking({ budgetTokens });
    } catch (err) {
      if (!(err instanceof UnsupportedFeatureError)) throw err;

      switch (provider) {
        case "anthropic":
          this.logger.debug({ provider, budgetTokens }, "Structured thinking unavailable, using raw parameters");
          return session.withParams({
            thinking: { type: "enabled", budget_tokens: budgetTokens },
            max_tokens: budgetTokens + ANTHROPIC_MAX_TOKENS_HEADROOM,
          });
        case "openai":
        case "openrouter":
          this.logger.debug({ provider, budgetTokens }, "Structured thinking unavailable, using raw parameters");
          return session.withParams({
            reasoning_effort: reasoningEffort(budgetTokens),
            max_completion_tokens: budgetTokens + OPENAI_COMPLETION_HEADROOM,
          });
        default:
          throw err;
      }
    }
  }

  assertThinkingCapability(modelId: string): void {
    if (modelId.startsWith("anthropic/") && !this.apiKey("anthropic")) {
      throw new MissingCapabilityError(
        `Thinking on ${modelId} requires an Anthropic API key`,
      );
    }
  }
}
