import type { AgentTool } from "../tools/types.js";

export type ProviderId = "openrouter" | "anthropic" | "openai" | "gemini" | "xai";

export interface ProviderRoute {
  readonly provider: ProviderId;
  /** Id to send to the provider; the catalog's provider id for direct routes. */
  readonly modelId: string;
}

export interface ChatMessage {
  readonly role: "system" | "user" | "assistant";
  readonly content: string;
}

export interface ToolCall {
  readonly id: string;
  readonly name: string;
  readonly arguments: Record<string, unknown>;
}

export interface ModelReply {
  readonly role: "assistant" | "tool";
  readonly content: string;
  readonly reasoning: string | null;
  readonly modelId: string | null;
  readonly inputTokens: number | null;
  readonly outputTokens: number | null;
  readonly finishReason: string | null;
  readonly toolCalls: readonly ToolCall[];
  /** Provider payload, kept for finish and block reasons. */
  readonly raw: unknown;
}

export type ModelEvent =
  | { readonly type: "message.start" }
  | { readonly type: "content.delta"; readonly text: string | null }
  | { readonly type: "reasoning.delta"; readonly text: string | null }
  | { readonly type: "tool.call"; readonly call: ToolCall }
  | { readonly type: "message.end"; readonly reply: ModelReply };

export interface ThinkingOptions {
  readonly budgetTokens: number;
}

/**
 * One configured conversation with a model. Builders mutate and return the
 * session; `stream` sends the accumulated messages.
 */
export interface ModelSession {
  readonly route: ProviderRoute;
  withThinking(options: ThinkingOptions): this;
  withParams(params: Record<string, unknown>): this;
  withTools(tools: readonly AgentTool[]): this;
  addMessage(message: ChatMessage): this;
  stream(): AsyncIterable<ModelEvent>;
}

/** Entry point the core uses to talk to models. */
export interface ModelClient {
  session(modelId: string): ModelSession;
  /** One-shot, tool-less completion; resolves to the final reply's text. */
  ask(modelId: string, messages: readonly ChatMessage[]): Promise<string>;
}

export interface ModerationResult {
  readonly flagged: boolean;
  readonly scores: Record<string, number>;
}

export interface ModerationClient {
  moderate(input: string): Promise<ModerationResult>;
}
