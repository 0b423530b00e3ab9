import type { ModelReply } from "../providers/types.js";
import { isRecord } from "../utils/json.js";
import { presence } from "../utils/text.js";

export const SAFETY_NOTICE =
  "_The AI was unable to respond due to content safety filters. Try rephrasing your message or starting a new conversation._";
export const EMPTY_NOTICE =
  "_The AI returned an empty response. This may be due to content filtering or a temporary issue. Please try again._";

export function incompleteNotice(reason: string): string {
  return `_The AI was unable to complete its response (reason: ${reason}). Please try again._`;
}

const SAFETY_REASONS = new Set(["safety", "content_filter"]);

function firstOf(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : undefined;
}

function stringAt(value: unknown, key: string): string | null {
  if (!isRecord(value)) return null;
  const field = value[key];
  return typeof field === "string" && field !== "" ? field : null;
}

export interface StopReasons {
  readonly finishReason: string | null;
  readonly blockReason: string | null;
}

/** Finish and block reasons from Gemini-style or chat-completions payloads. */
export function stopReasons(reply: ModelReply): StopReasons {
  const raw = reply.raw;
  const candidateFinish = isRecord(raw) ? stringAt(firstOf(raw["candidates"]), "finishReason") : null;
  const choiceFinish = isRecord(raw) ? stringAt(firstOf(raw["choices"]), "finish_reason") : null;
  const promptBlock = isRecord(raw) ? stringAt(raw["promptFeedback"], "blockReason") : null;

  return {
    finishReason: candidateFinish ?? choiceFinish ?? reply.finishReason,
    blockReason: promptBlock ?? candidateFinish,
  };
}

/** Text shown in place of an empty reply that produced no output tokens. */
export function emptyResponseNotice(reply: ModelReply): string {
  const { finishReason, blockReason } = stopReasons(reply);
  const isSafety = [finishReason, blockReason].some(
    (reason) => reason !== null && SAFETY_REASONS.has(reason.toLowerCase()),
  );
  if (isSafety) return SAFETY_NOTICE;
  if (finishReason && finishReason.toLowerCase() !== "stop") return incompleteNotice(finishReason);
  return EMPTY_NOTICE;
}

/** First non-blank of the reported, streamed and persisted content. */
export function resolveContent(reported: string | null, accumulated: string, persisted: string | null): string | null {
  return presence(reported) ?? presence(accumulated) ?? presence(persisted);
}
