import type { Agent, Chat } from "../store/types.js";
import type { InitiatedChatSummary } from "../store/chat-store.js";
import { localTime } from "./active-hours.js";

export const AGENT_ONLY_PREFIX = "[AGENT-ONLY]";
const INACTIVE_AFTER_MS = 48 * 3_600_000;

export interface ContinuableConversation {
  readonly chat: Chat;
  readonly lastMessageAt: number | null;
}

export interface InitiationStatus {
  readonly pending: number;
  readonly cap: number;
  readonly agentOnlyRecent: number;
  readonly agentOnlyCap: number;
  readonly lastInitiationAt: number | null;
}

export interface InitiationPromptInput {
  readonly agent: Agent;
  readonly memoryContext: string | null;
  readonly now: number;
  readonly nighttime: boolean;
  readonly teamMembers: readonly { name: string; timezone: string | null }[];
  readonly conversations: readonly ContinuableConversation[];
  readonly recentInitiations: readonly InitiatedChatSummary[];
  readonly recentWindowHours: number;
  readonly humanActivity: readonly { name: string; lastActiveAt: number }[];
  readonly otherAgents: readonly Agent[];
  readonly status: InitiationStatus;
}

/** "3 hours", "2 days", "less than a minute". */
export function timeAgo(elapsedMs: number): string {
  const minutes = Math.floor(elapsedMs / 60_000);
  if (minutes < 1) return "less than a minute";
  if (minutes < 60) return minutes === 1 ? "1 minute" : `${minutes} minutes`;
  const hours = Math.floor(minutes / 60);
  if (hours < 24) return hours === 1 ? "1 hour" : `${hours} hours`;
  const days = Math.floor(hours / 24);
  return days === 1 ? "1 day" : `${days} days`;
}

function section(title: string, body: string): string {
  return `# ${title}\n${body}`;
}

function listOr(lines: string[], empty: string): string {
  return lines.length === 0 ? empty : lines.join("\n");
}

function statusLines(status: InitiationStatus, now: number): string {
  const lines: string[] = [];
  if (status.pending > 0) {
    lines.push(`You have ${status.pending} human conversation(s) awaiting a response (cap: ${status.cap}).`);
  }
  if (status.agentOnlyRecent > 0) {
    lines.push(`You started ${status.agentOnlyRecent} agent-only conversation(s) recently (cap: ${status.agentOnlyCap}).`);
  }
  lines.push(
    `Your last initiation: ${status.lastInitiationAt === null ? "never" : `${timeAgo(now - status.lastInitiationAt)} ago`}`,
  );
  if (status.pending >= status.cap) {
    lines.push("HUMAN CONVERSATION CAP REACHED: you cannot start a human conversation until one gets a reply.");
  }
  if (status.agentOnlyRecent >= status.agentOnlyCap) {
    lines.push("AGENT-ONLY CONVERSATION CAP REACHED: you cannot start another agent-only conversation for now.");
  }
  return lines.join("\n");
}

export function buildInitiationPrompt(input: InitiationPromptInput): string {
  const { agent, now } = input;
  const at = new Date(now);

  const conversations = input.conversations.map(({ chat, lastMessageAt }) => {
    const stale = lastMessageAt !== null && now - lastMessageAt > INACTIVE_AFTER_MS ? " [INACTIVE 48+ hours]" : "";
    return `- ${chat.title ?? "Untitled conversation"} (${chat.id})${stale}: ${chat.summary ?? "No summary"}`;
  });
  const initiations = input.recentInitiations.map(
    ({ chat, initiatorName, humanReplies }) =>
      `- "${chat.title ?? "Untitled"}" by ${initiatorName} (${timeAgo(now - chat.createdAt)} ago) - ${humanReplies} human response(s)`,
  );

  const parts = [
    agent.systemPrompt ?? `You are ${agent.name}.`,
    input.memoryContext ?? "",
    section(
      "Deciding on your own",
      "Nobody has prompted you. You are deciding for yourself whether to start or continue a conversation.\n" +
        "Only act if you have something worth saying. Choosing nothing costs you nothing; when unsure, choose nothing.",
    ),
    section(
      "Current time",
      `${at.toISOString().replace("T", " ").slice(0, 16)} UTC` +
        (input.nighttime
          ? `\n\nNIGHT MODE: people are asleep. You may only start or continue agent-only conversations (titled "${AGENT_ONLY_PREFIX}"). They are hidden from humans; save anything the team should see tomorrow to your memories.`
          : ""),
    ),
    section(
      "Team members",
      listOr(input.teamMembers.map((m) => `- ${m.name}: ${localTime(m.timezone, at)}`), "No team members."),
    ),
    section("Conversations you could continue", listOr(conversations, "No conversations available.")),
    section(
      `Recent agent initiations (last ${input.recentWindowHours} hours)`,
      listOr(initiations, `None in the last ${input.recentWindowHours} hours.`),
    ),
    section(
      "Human activity",
      listOr(
        input.humanActivity.map((h) => `- ${h.name}: last active ${timeAgo(now - h.lastActiveAt)} ago`),
        "No recent human activity.",
      ),
    ),
    section(
      "Other agents you can invite",
      listOr(input.otherAgents.map((a) => `- ${a.id}: ${a.name}`), "No other agents available."),
    ),
    section("Your status", statusLines(input.status, now)),
    section(
      "Guidelines",
      [
        "- Do not open many human conversations at once.",
        "- Look at human activity before starting a human conversation.",
        "- Continue a conversation only when you can add something.",
        "- Conversations idle for 48+ hours are worth reviving only for important topics.",
        "- Agent-only conversations are private threads with other agents and have their own cap.",
        ...(input.nighttime ? ["- NIGHT MODE: only agent-only conversations are allowed right now."] : []),
      ].join("\n"),
    ),
    section(
      "Your answer",
      "Reply with one JSON object and nothing else, in one of these shapes:\n" +
        '{"action": "continue", "conversation_id": "<id>", "reason": "..."}\n' +
        '{"action": "initiate", "topic": "...", "message": "...", "invite_agents": ["<agent id>"], "reason": "..."}\n' +
        '{"action": "initiate", "topic": "...", "message": "...", "invite_agents": ["<agent id>"], "agent_only": true, "reason": "..."}\n' +
        '{"action": "nothing", "reason": "..."}',
    ),
  ];

  return parts.filter((p) => p !== "").join("\n\n");
}
