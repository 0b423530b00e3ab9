import { z } from "zod";
import type { RetryPolicy } from "./retry-policy.js";

export const sweepVariantSchema = z.enum(["daytime", "nighttime"]);
export type SweepVariant = z.infer<typeof sweepVariantSchema>;

export const initiationActionSchema = z.enum(["continue", "initiate", "nothing"]);
export type InitiationAction = z.infer<typeof initiationActionSchema>;

export const taskSchemas = {
  "agent-response": z.object({
    chatId: z.string(),
    agentId: z.string(),
    initiationReason: z.string().optional(),
  }),
  "all-agents-response": z.object({
    chatId: z.string(),
    agentIds: z.array(z.string()),
  }),
  "consolidate-conversation": z.object({ chatId: z.string() }),
  "consolidate-stale": z.object({}),
  "memory-reflection": z.object({}),
  "memory-refinement": z.object({ agentId: z.string().optional() }),
  "initiation-sweep": z.object({ variant: sweepVariantSchema }),
  "initiation-decision": z.object({ agentId: z.string(), variant: sweepVariantSchema }),
  "initiation-notice": z.object({
    accountId: z.string(),
    agentId: z.string(),
    action: initiationActionSchema,
    reason: z.string(),
    conversationId: z.string().optional(),
  }),
  "moderate-message": z.object({ messageId: z.number().int() }),
};

export type TaskName = keyof typeof taskSchemas;
export type TaskArgs<N extends TaskName> = z.infer<(typeof taskSchemas)[N]>;

export interface SubmitOptions {
  readonly delayMs?: number;
  /** Overrides the task's default policy for this job. */
  readonly retryPolicy?: RetryPolicy;
  /** Higher runs first among due jobs. */
  readonly priority?: number;
}

/** The only queue surface the core depends on. */
export interface TaskQueue {
  submit<N extends TaskName>(task: N, args: TaskArgs<N>, options?: SubmitOptions): string;
}

export interface TaskContext {
  readonly jobId: string;
  /** 1-based. */
  readonly attempt: number;
}

export interface TaskDefinition<A> {
  handler(args: A, ctx: TaskContext): Promise<void>;
  retryPolicy?: RetryPolicy;
  /** Runs once when a job fails for the last time. */
  onExhausted?(args: A, err: unknown): Promise<void> | void;
}

export type JobStatus = "pending" | "running" | "done" | "failed";

export type QueueStats = Record<JobStatus, number>;
