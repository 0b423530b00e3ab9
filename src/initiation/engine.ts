import type { BroadcastHub } from "../broadcast/hub.js";
import { accountChannel } from "../broadcast/hub.js";
import type { InitiationConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { buildMemoryContext } from "../memory/context.js";
import type { ModelClient } from "../providers/types.js";
import { PROVIDER_RETRY_POLICY } from "../queue/retry-policy.js";
import type { InitiationAction, SweepVariant, TaskArgs, TaskQueue } from "../queue/types.js";
import type { AccountStore } from "../store/account-store.js";
import type { AgentStore } from "../store/agent-store.js";
import type { AuditStore } from "../store/audit-store.js";
import type { ChatStore } from "../store/chat-store.js";
import type { MemoryStore } from "../store/memory-store.js";
import { isRespondable, type Agent, type User } from "../store/types.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { presence } from "../utils/text.js";
import { isDaytime } from "./active-hours.js";
import { auditPayload, parseDecision, type InitiationDecision } from "./decision.js";
import { AGENT_ONLY_PREFIX, buildInitiationPrompt } from "./prompt.js";

export interface InitiationEngineDeps {
  readonly chats: ChatStore;
  readonly agents: AgentStore;
  readonly accounts: AccountStore;
  readonly memories: MemoryStore;
  readonly audit: AuditStore;
  readonly models: ModelClient;
  readonly queue: TaskQueue;
  readonly hub: BroadcastHub;
  readonly config: InitiationConfig;
  readonly logger: Logger;
  readonly clock?: Clock;
  readonly random?: () => number;
}

export type InitiationOutcome =
  | { readonly action: "skipped"; readonly reason: "at_hard_cap" }
  | InitiationDecision;

export function displayName(user: User): string {
  const name = presence(user.name);
  if (name !== null) return name;
  const local = user.email.split("@", 1)[0];
  return local === undefined || local === "" ? user.email : local;
}

/**
 * Lets agents decide on their own whether to start or continue a
 * conversation. The sweep fans out one jittered decision task per eligible
 * agent; each decision is audited exactly once.
 */
export class InitiationEngine {
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(private readonly deps: InitiationEngineDeps) {
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? Math.random;
    this.logger = deps.logger.child({ component: "initiation" });
  }

  /** Queues a decision per eligible agent; returns how many were queued. */
  sweep(variant: SweepVariant): number {
    const now = this.clock();
    if (variant === "daytime" && !isDaytime(this.deps.config.daytime, new Date(now))) {
      this.logger.debug({ variant }, "Initiation sweep outside daytime window");
      return 0;
    }

    const activeAccounts = new Map<string, boolean>();
    let queued = 0;
    for (const agent of this.deps.agents.listActive()) {
      let active = activeAccounts.get(agent.accountId);
      if (active === undefined) {
        active = this.isAccountActive(agent.accountId, now);
        activeAccounts.set(agent.accountId, active);
      }
      if (!active) continue;

      const delayMs = Math.floor(this.random() * this.deps.config.jitterMs);
      this.deps.queue.submit(
        "initiation-decision",
        { agentId: agent.id, variant },
        { delayMs, retryPolicy: PROVIDER_RETRY_POLICY },
      );
      queued++;
    }
    this.logger.info({ variant, queued }, "Initiation sweep finished");
    return queued;
  }

  isAccountActive(accountId: string, now: number = this.clock()): boolean {
    const since = now - this.deps.config.activityWindowMs;
    if (this.deps.audit.hasEntrySince(accountId, since)) return true;
    const lastHuman = this.deps.chats.lastHumanMessageAt(accountId);
    return lastHuman !== null && lastHuman >= since;
  }

  humanCap(agent: Agent): number {
    return agent.initiationCap ?? this.deps.config.defaultCap;
  }

  async decide(agentId: string, variant: SweepVariant): Promise<InitiationOutcome | null> {
    const agent = this.deps.agents.getAgent(agentId);
    if (!agent || !agent.active) {
      this.logger.warn({ agentId }, "Initiation decision skipped: agent missing or inactive");
      return null;
    }

    if (this.deps.chats.countPendingInitiations(agent.id) >= this.humanCap(agent)) {
      this.deps.audit.record({
        action: "agent_initiation_skipped",
        accountId: agent.accountId,
        agentId: agent.id,
        subjectType: "agent",
        subjectId: agent.id,
        data: { reason: "at_hard_cap" },
      });
      this.logger.info({ agentId }, "Initiation skipped: at hard cap");
      return { action: "skipped", reason: "at_hard_cap" };
    }

    const nighttime = variant === "nighttime";
    const reply = await this.deps.models.ask(agent.modelId, [{ role: "user", content: this.prompt(agent, nighttime) }]);
    const decision = parseDecision(reply);
    this.logger.info({ agentId, action: decision.action, reason: decision.reason }, "Initiation decision");

    const conversationId = this.execute(agent, decision, nighttime);
    const outcome: InitiationDecision = conversationId ? { ...decision, conversationId } : decision;

    this.deps.audit.record({
      action: `agent_initiation_${outcome.action}`,
      accountId: agent.accountId,
      agentId: agent.id,
      subjectType: "agent",
      subjectId: agent.id,
      data: auditPayload(outcome),
    });
    return outcome;
  }

  /** Broadcasts an `initiation-notice` job's payload on the account channel. */
  publishNotice(args: TaskArgs<"initiation-notice">): void {
    this.deps.hub.publish(accountChannel(args.accountId), {
      type: "agent.initiation_notice",
      agentId: args.agentId,
      action: args.action,
      reason: args.reason,
      conversationId: args.conversationId ?? null,
    });
  }

  prompt(agent: Agent, nighttime: boolean): string {
    const now = this.clock();
    const { chats, memories, config } = this.deps;
    const users = this.deps.accounts.listUsers(agent.accountId);
    const usersById = new Map(users.map((u) => [u.id, u]));

    let conversations = chats.listContinuable(agent.id);
    if (nighttime) conversations = conversations.filter((c) => c.agentOnly);

    return buildInitiationPrompt({
      agent,
      memoryContext: buildMemoryContext(memories.listCore(agent.id), memories.listLiveJournal(agent.id)),
      now,
      nighttime,
      teamMembers: users.map((u) => ({ name: displayName(u), timezone: u.timezone })),
      conversations: conversations.map((chat) => ({ chat, lastMessageAt: chats.lastMessage(chat.id)?.createdAt ?? null })),
      recentInitiations: chats.listRecentInitiations(agent.accountId, now - config.recentInitiationWindowMs),
      recentWindowHours: Math.round(config.recentInitiationWindowMs / 3_600_000),
      humanActivity: chats.listHumanActivity(agent.accountId, now - config.activityWindowMs).flatMap((a) => {
        const user = usersById.get(a.userId);
        return user ? [{ name: displayName(user), lastActiveAt: a.lastActiveAt }] : [];
      }),
      otherAgents: this.deps.agents.listInAccount(agent.accountId).filter((a) => a.active && a.id !== agent.id),
      status: {
        pending: chats.countPendingInitiations(agent.id),
        cap: this.humanCap(agent),
        agentOnlyRecent: chats.countAgentOnlyInitiationsSince(agent.id, now - config.recentInitiationWindowMs),
        agentOnlyCap: config.agentOnlyCap,
        lastInitiationAt: chats.lastInitiationAt(agent.id),
      },
    });
  }

  /** Carries out the decision; returns the id of a chat it created. */
  private execute(agent: Agent, decision: InitiationDecision, nighttime: boolean): string | null {
    switch (decision.action) {
      case "continue":
        this.continueConversation(agent, decision, nighttime);
        return null;
      case "initiate":
        return this.initiate(agent, decision, nighttime);
      case "nothing":
        this.notify(agent, "nothing", decision.reason, nighttime);
        return null;
    }
  }

  private continueConversation(agent: Agent, decision: InitiationDecision, nighttime: boolean): void {
    const ref = decision.conversationId;
    const chat = ref ? this.deps.chats.findInAccount(ref, agent.accountId) : null;
    if (!chat || !isRespondable(chat)) {
      this.logger.info({ agentId: agent.id, conversationId: ref }, "Chosen conversation is not respondable");
      this.notify(agent, "continue", `Chose to continue conversation ${ref ?? "(none)"} but it is not respondable`, nighttime);
      return;
    }
    if (nighttime && !chat.agentOnly) return;

    this.deps.queue.submit(
      "agent-response",
      { chatId: chat.id, agentId: agent.id, initiationReason: decision.reason },
      { retryPolicy: PROVIDER_RETRY_POLICY },
    );
  }

  private initiate(agent: Agent, decision: InitiationDecision, nighttime: boolean): string | null {
    const { chats, config } = this.deps;
    const agentOnly = nighttime || decision.agentOnly === true;
    const topic = presence(decision.topic)?.trim() ?? "New conversation";

    if (agentOnly) {
      const recent = chats.countAgentOnlyInitiationsSince(agent.id, this.clock() - config.recentInitiationWindowMs);
      if (recent >= config.agentOnlyCap) {
        this.notify(agent, "initiate", `Wanted to start agent-only conversation '${topic}' but is at the agent-only cap (${config.agentOnlyCap})`, nighttime);
        return null;
      }
    } else if (chats.countPendingInitiations(agent.id) >= this.humanCap(agent)) {
      this.notify(agent, "initiate", `Wanted to initiate '${topic}' but is at the initiation cap (${this.humanCap(agent)}+ conversations awaiting a human reply)`, nighttime);
      return null;
    }

    const invited = [...new Set(decision.inviteAgents ?? [])].filter((id) => {
      if (id === agent.id) return false;
      return this.deps.agents.findInAccount(id, agent.accountId)?.active === true;
    });
    const title = agentOnly && !topic.startsWith(AGENT_ONLY_PREFIX) ? `${AGENT_ONLY_PREFIX} ${topic}` : topic;

    const chat = chats.createChat({
      accountId: agent.accountId,
      title,
      manualResponses: true,
      agentOnly,
      initiatedByAgentId: agent.id,
      initiationReason: decision.reason,
      agentIds: [agent.id, ...invited],
    });
    chats.createMessage({
      chatId: chat.id,
      role: "assistant",
      agentId: agent.id,
      modelId: agent.modelId,
      content: presence(decision.message)?.trim() ?? topic,
    });
    if (invited.length > 0) {
      this.deps.queue.submit(
        "all-agents-response",
        { chatId: chat.id, agentIds: invited },
        { retryPolicy: PROVIDER_RETRY_POLICY },
      );
    }
    this.logger.info({ agentId: agent.id, chatId: chat.id, agentOnly, invited: invited.length }, "Conversation initiated");
    return chat.id;
  }

  private notify(agent: Agent, action: InitiationAction, reason: string, nighttime: boolean): void {
    if (nighttime) return;
    this.deps.queue.submit(
      "initiation-notice",
      { accountId: agent.accountId, agentId: agent.id, action, reason },
      { priority: -1 },
    );
  }
}
