import { PROVIDER_RETRY_POLICY } from "../queue/retry-policy.js";
import { taskSchemas } from "../queue/types.js";
import type { Components } from "./components.js";

/** Registers a handler for every task the runtime submits. */
export function registerTasks(c: Components): void {
  const { queue, logger } = c;

  queue.register("agent-response", taskSchemas["agent-response"], {
    retryPolicy: PROVIDER_RETRY_POLICY,
    handler: async (args) => {
      await c.responder.respond(args);
    },
    onExhausted: (args, err) => c.responder.reportExhausted(args, err),
  });

  queue.register("all-agents-response", taskSchemas["all-agents-response"], {
    retryPolicy: PROVIDER_RETRY_POLICY,
    handler: (args) => c.sequencer.run(args),
    onExhausted: (args, err) => {
      const [head] = args.agentIds;
      if (head !== undefined) c.responder.reportExhausted({ chatId: args.chatId, agentId: head }, err);
    },
  });

  queue.register("consolidate-conversation", taskSchemas["consolidate-conversation"], {
    handler: async ({ chatId }) => {
      await c.consolidator.consolidate(chatId);
    },
  });

  queue.register("consolidate-stale", taskSchemas["consolidate-stale"], {
    handler: async () => {
      c.consolidator.sweep();
    },
  });

  queue.register("memory-reflection", taskSchemas["memory-reflection"], {
    handler: async () => {
      await c.reflector.sweep();
    },
  });

  queue.register("memory-refinement", taskSchemas["memory-refinement"], {
    handler: async ({ agentId }) => {
      if (agentId) await c.refiner.refineById(agentId);
      else await c.refiner.sweep();
    },
  });

  queue.register("initiation-sweep", taskSchemas["initiation-sweep"], {
    handler: async ({ variant }) => {
      c.initiation.sweep(variant);
    },
  });

  queue.register("initiation-decision", taskSchemas["initiation-decision"], {
    retryPolicy: PROVIDER_RETRY_POLICY,
    handler: async ({ agentId, variant }) => {
      await c.initiation.decide(agentId, variant);
    },
  });

  queue.register("initiation-notice", taskSchemas["initiation-notice"], {
    handler: async (args) => {
      c.initiation.publishNotice(args);
    },
  });

  queue.register("moderate-message", taskSchemas["moderate-message"], {
    retryPolicy: PROVIDER_RETRY_POLICY,
    handler: async ({ messageId }) => {
      if (!c.moderator) {
        logger.debug({ messageId }, "Moderation disabled; job ignored");
        return;
      }
      await c.moderator.moderate(messageId);
    },
  });
}
