export type MessageRole = "user" | "assistant" | "system";
export type MemoryType = "journal" | "core";

export interface Account {
  readonly id: string;
  readonly name: string;
}

export interface User {
  readonly id: string;
  readonly accountId: string;
  readonly name: string | null;
  readonly email: string;
  readonly timezone: string | null;
}

export interface Agent {
  readonly id: string;
  readonly accountId: string;
  readonly name: string;
  readonly systemPrompt: string | null;
  readonly reflectionPrompt: string | null;
  readonly refinementPrompt: string | null;
  readonly modelId: string;
  readonly thinkingEnabled: boolean;
  readonly thinkingBudget: number | null;
  readonly enabledTools: string[];
  readonly active: boolean;
  readonly initiationCap: number | null;
  readonly lastRefinementAt: number | null;
  readonly createdAt: number;
}

export interface Chat {
  readonly id: string;
  readonly accountId: string;
  readonly title: string | null;
  readonly modelId: string | null;
  readonly manualResponses: boolean;
  readonly agentOnly: boolean;
  readonly initiatedByAgentId: string | null;
  readonly initiationReason: string | null;
  readonly summary: string | null;
  readonly archivedAt: number | null;
  readonly discardedAt: number | null;
  readonly lastConsolidatedAt: number | null;
  readonly lastConsolidatedMessageId: number | null;
  readonly createdAt: number;
  readonly updatedAt: number;
}

export interface Message {
  readonly id: number;
  readonly chatId: string;
  readonly role: MessageRole;
  readonly agentId: string | null;
  readonly userId: string | null;
  readonly content: string;
  readonly thinking: string | null;
  readonly modelId: string | null;
  readonly inputTokens: number | null;
  readonly outputTokens: number | null;
  readonly toolsUsed: string[];
  readonly streaming: boolean;
  readonly moderationFlagged: boolean | null;
  readonly createdAt: number;
}

/** A message joined with the display name of whoever wrote it. */
export interface AuthoredMessage extends Message {
  readonly authorName: string;
}

export interface AgentMemory {
  readonly id: string;
  readonly agentId: string;
  readonly memoryType: MemoryType;
  readonly constitutional: boolean;
  readonly content: string;
  readonly tokenEstimate: number;
  readonly discardedAt: number | null;
  readonly createdAt: number;
  readonly updatedAt: number;
}

export interface AuditEntry {
  readonly id: number;
  readonly accountId: string | null;
  readonly agentId: string | null;
  readonly action: string;
  readonly subjectType: string | null;
  readonly subjectId: string | null;
  readonly data: Record<string, unknown>;
  readonly createdAt: number;
}

export function isRespondable(chat: Chat): boolean {
  return chat.archivedAt === null && chat.discardedAt === null;
}
