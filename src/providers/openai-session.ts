import type OpenAI from "openai";
import type {
  ChatCompletionChunk,
  ChatCompletionCreateParamsStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import type { Logger } from "../logging/logger.js";
import type { AgentTool } from "../tools/types.js";
import { isRecord, tryParseJson } from "../utils/json.js";
import { classifyProviderError, UnsupportedFeatureError } from "./errors.js";
import type {
  ChatMessage,
  ModelEvent,
  ModelReply,
  ModelSession,
  ProviderRoute,
  ThinkingOptions,
  ToolCall,
} from "./types.js";

interface PartialToolCall {
  id: string;
  name: string;
  arguments: string;
}

export interface OpenAISessionOptions {
  readonly maxToolRounds: number;
  readonly logger: Logger;
}

function reasoningText(delta: object): string | null {
  if (!isRecord(delta)) return null;
  const value = delta["reasoning"] ?? delta["reasoning_content"];
  return typeof value === "string" ? value : null;
}

function toolDefinition(tool: AgentTool): ChatCompletionTool {
  return {
    type: "function",
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  };
}

function parseArguments(text: string): Record<string, unknown> | null {
  if (text.trim() === "") return {};
  const parsed = tryParseJson(text);
  return parsed.ok && isRecord(parsed.value) ? parsed.value : null;
}

/**
 * Chat-completions session over the OpenAI SDK, pointed at whichever
 * OpenAI-compatible endpoint the route names. Tool calls are executed here
 * and their results fed back, up to `maxToolRounds` rounds.
 */
export class OpenAISession implements ModelSession {
  private readonly messages: ChatCompletionMessageParam[] = [];
  private params: Record<string, unknown> = {};
  private tools: readonly AgentTool[] = [];

  constructor(
    private readonly client: OpenAI,
    readonly route: ProviderRoute,
    private readonly options: OpenAISessionOptions,
  ) {}

  withThinking(_options: ThinkingOptions): this {
    throw new UnsupportedFeatureError("thinking");
  }

  withParams(params: Record<string, unknown>): this {
    this.params = { ...this.params, ...params };
    return this;
  }

  withTools(tools: readonly AgentTool[]): this {
    this.tools = tools;
    return this;
  }

  addMessage(message: ChatMessage): this {
    this.messages.push({ role: message.role, content: message.content });
    return this;
  }

  async *stream(): AsyncGenerator<ModelEvent> {
    for (let round = 0; ; round++) {
      const offerTools = this.tools.length > 0 && round < this.options.maxToolRounds;
      const chunks = await this.request(offerTools);

      yield { type: "message.start" };
      const reply = yield* this.consume(chunks);
      yield { type: "message.end", reply };

      if (reply.toolCalls.length === 0 || !offerTools) return;

      this.messages.push({
        role: "assistant",
        content: reply.content === "" ? null : reply.content,
        tool_calls: reply.toolCalls.map((call) => ({
          id: call.id,
          type: "function" as const,
          function: { name: call.name, arguments: JSON.stringify(call.arguments) },
        })),
      });

      for (const call of reply.toolCalls) {
        yield { type: "tool.call", call };
        const content = await this.runTool(call);
        this.messages.push({ role: "tool", tool_call_id: call.id, content });
        yield {
          type: "message.end",
          reply: {
            role: "tool",
            content,
            reasoning: null,
            modelId: reply.modelId,
            inputTokens: null,
            outputTokens: null,
            finishReason: null,
            toolCalls: [],
            raw: null,
          },
        };
      }
    }
  }

  private async request(offerTools: boolean): Promise<AsyncIterable<ChatCompletionChunk>> {
    const body: ChatCompletionCreateParamsStreaming & Record<string, unknown> = {
      ...this.params,
      model: this.route.modelId,
      messages: this.messages,
      stream: true,
      stream_options: { include_usage: true },
      ...(offerTools ? { tools: this.tools.map(toolDefinition) } : {}),
    };
    try {
      return await this.client.chat.completions.create(body);
    } catch (err) {
      throw classifyProviderError(err);
    }
  }

  /** Yields deltas as they arrive and returns the assembled reply. */
  private async *consume(
    chunks: AsyncIterable<ChatCompletionChunk>,
  ): AsyncGenerator<ModelEvent, ModelReply> {
    let content = "";
    let reasoning = "";
    let modelId: string | null = null;
    let finishReason: string | null = null;
    let inputTokens: number | null = null;
    let outputTokens: number | null = null;
    let raw: unknown = null;
    const partials = new Map<number, PartialToolCall>();

    try {
      for await (const chunk of chunks) {
        modelId = chunk.model || modelId;
        if (chunk.usage) {
          inputTokens = chunk.usage.prompt_tokens;
          outputTokens = chunk.usage.completion_tokens;
        }
        const choice = chunk.choices[0];
        if (!choice) {
          raw ??= chunk;
          continue;
        }
        if (choice.finish_reason) {
          finishReason = choice.finish_reason;
          raw = chunk;
        }

        const delta = choice.delta;
        if (delta.content) {
          content += delta.content;
          yield { type: "content.delta", text: delta.content };
        }
        const thought = reasoningText(delta);
        if (thought) {
          reasoning += thought;
          yield { type: "reasoning.delta", text: thought };
        }
        for (const part of delta.tool_calls ?? []) {
          const existing = partials.get(part.index) ?? { id: "", name: "", arguments: "" };
          partials.set(part.index, {
            id: part.id ?? existing.id,
            name: existing.name + (part.function?.name ?? ""),
            arguments: existing.arguments + (part.function?.arguments ?? ""),
          });
        }
      }
    } catch (err) {
      throw classifyProviderError(err);
    }

    const toolCalls: ToolCall[] = [];
    for (const [index, partial] of [...partials.entries()].sort(([a], [b]) => a - b)) {
      const args = parseArguments(partial.arguments);
      if (args === null) {
        this.options.logger.warn({ tool: partial.name, index }, "Dropping tool call with unparseable arguments");
        continue;
      }
      toolCalls.push({ id: partial.id || `call_${index}`, name: partial.name, arguments: args });
    }

    return {
      role: "assistant",
      content,
      reasoning: reasoning === "" ? null : reasoning,
      modelId,
      inputTokens,
      outputTokens,
      finishReason,
      toolCalls,
      raw,
    };
  }

  private async runTool(call: ToolCall): Promise<string> {
    const tool = this.tools.find((t) => t.name === call.name);
    if (!tool) return `Error: unknown tool "${call.name}"`;
    try {
      const result = await tool.execute(call.arguments);
      return result.content;
    } catch (err) {
      this.options.logger.warn({ err, tool: call.name }, "Tool execution failed");
      return `Error: ${err instanceof Error ? err.message : String(err)}`;
    }
  }
}
