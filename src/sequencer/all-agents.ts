import type { Logger } from "../logging/logger.js";
import type { AgentResponder } from "../orchestrator/agent-responder.js";
import { PROVIDER_RETRY_POLICY } from "../queue/retry-policy.js";
import type { TaskArgs, TaskQueue } from "../queue/types.js";

/**
 * Runs several agents over one chat in order. Only the head agent runs per
 * job; the tail is queued once the head returns, so a retry re-runs the
 * failing agent and never the ones before it.
 */
export class AgentSequencer {
  private readonly logger: Logger;

  constructor(
    private readonly responder: Pick<AgentResponder, "respond">,
    private readonly queue: TaskQueue,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "sequencer" });
  }

  async run(args: TaskArgs<"all-agents-response">): Promise<void> {
    const [head, ...tail] = args.agentIds;
    if (head === undefined) return;

    await this.responder.respond({ chatId: args.chatId, agentId: head });

    if (tail.length === 0) {
      this.logger.debug({ chatId: args.chatId }, "Agent sequence complete");
      return;
    }
    this.queue.submit(
      "all-agents-response",
      { chatId: args.chatId, agentIds: tail },
      { retryPolicy: PROVIDER_RETRY_POLICY },
    );
  }
}
