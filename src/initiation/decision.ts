import { z } from "zod";
import { findFirstJsonObject, isRecord, tryParseJson } from "../utils/json.js";
import { truncate } from "../utils/text.js";
import type { InitiationAction } from "../queue/types.js";

export const RAW_RESPONSE_LIMIT = 1000;
export const NO_DECISION_REASON = "Could not extract decision from response";
export const UNPARSEABLE_DECISION_REASON = "Could not parse extracted JSON";

export interface InitiationDecision {
  readonly action: InitiationAction;
  readonly reason: string;
  readonly conversationId?: string;
  readonly topic?: string;
  readonly message?: string;
  readonly inviteAgents?: string[];
  readonly agentOnly?: boolean;
  readonly rawResponse?: string;
}

const optionalText = z
  .unknown()
  .transform((value) => (typeof value === "string" || typeof value === "number" ? String(value) : undefined));

const decisionSchema = z.object({
  action: z.enum(["continue", "initiate", "nothing"]),
  reason: optionalText,
  conversation_id: optionalText,
  topic: optionalText,
  message: optionalText,
  invite_agents: z
    .unknown()
    .transform((value) =>
      Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : undefined,
    ),
  agent_only: z.unknown().transform((value) => value === true),
});

function nothing(reason: string, text: string): InitiationDecision {
  return { action: "nothing", reason, rawResponse: truncate(text, RAW_RESPONSE_LIMIT) };
}

function fromObject(value: Record<string, unknown>, text: string): InitiationDecision {
  const parsed = decisionSchema.safeParse(value);
  if (!parsed.success) {
    const reason = typeof value["reason"] === "string" ? value["reason"] : "Unrecognized decision action";
    return nothing(reason, text);
  }
  const d = parsed.data;
  return {
    action: d.action,
    reason: d.reason ?? "",
    ...(d.conversation_id !== undefined ? { conversationId: d.conversation_id } : {}),
    ...(d.topic !== undefined ? { topic: d.topic } : {}),
    ...(d.message !== undefined ? { message: d.message } : {}),
    ...(d.invite_agents !== undefined ? { inviteAgents: d.invite_agents } : {}),
    ...(d.agent_only ? { agentOnly: true } : {}),
  };
}

/**
 * Reads an agent's decision: the whole reply as JSON, else the first
 * balanced `{...}` in it, else a `nothing` decision naming the failure.
 * Never throws.
 */
export function parseDecision(text: string): InitiationDecision {
  const strict = tryParseJson(text.trim());
  if (strict.ok && isRecord(strict.value)) return fromObject(strict.value, text);

  const candidate = findFirstJsonObject(text);
  if (candidate === null) return nothing(NO_DECISION_REASON, text);

  const extracted = tryParseJson(candidate);
  if (!extracted.ok || !isRecord(extracted.value)) return nothing(UNPARSEABLE_DECISION_REASON, text);
  return fromObject(extracted.value, text);
}

/** Audit payload in the wire field names. */
export function auditPayload(decision: InitiationDecision): Record<string, unknown> {
  const payload: Record<string, unknown> = { reason: decision.reason };
  if (decision.topic !== undefined) payload["topic"] = decision.topic;
  if (decision.conversationId !== undefined) payload["conversation_id"] = decision.conversationId;
  if (decision.inviteAgents !== undefined) payload["invite_agents"] = decision.inviteAgents;
  if (decision.rawResponse !== undefined) payload["raw_response"] = decision.rawResponse;
  return payload;
}
