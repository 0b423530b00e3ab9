import { z } from "zod";
import type { ColloquyConfig } from "./types.js";

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const providersSchema = z.object({
  openrouterApiKey: z.string().optional(),
  openrouterBaseUrl: z.string().url().default("https://openrouter.ai/api/v1"),
  anthropicApiKey: z.string().optional(),
  openaiApiKey: z.string().optional(),
  geminiApiKey: z.string().optional(),
  xaiApiKey: z.string().optional(),
});

const modelSchema = z.object({
  modelId: z.string().min(1),
  label: z.string().optional(),
  providerModelId: z.string().min(1).optional(),
});

const streamingSchema = z.object({
  contentFlushMs: z.number().int().positive().default(200),
  reasoningFlushMs: z.number().int().positive().default(100),
  quietTools: z.array(z.string()).default(["view_system_prompt", "update_system_prompt"]),
  maxToolRounds: z.number().int().positive().default(10),
  debug: z.boolean().default(false),
});

const queueSchema = z.object({
  pollIntervalMs: z.number().int().positive().default(1_000),
  concurrency: z.number().int().positive().default(4),
  batchSize: z.number().int().positive().default(10),
});

const memorySchema = z.object({
  idleThresholdMs: z.number().positive().default(6 * HOUR_MS),
  chunkTargetTokens: z.number().int().positive().default(100_000),
  journalWindowMs: z.number().positive().default(7 * DAY_MS),
  coreTokenBudget: z.number().int().positive().default(5_000),
  refinementIntervalMs: z.number().positive().default(7 * DAY_MS),
  refinementOperationCap: z.number().int().positive().default(25),
  schedules: z.object({
    consolidation: z.string().min(1).default("15 * * * *"),
    reflection: z.string().min(1).default("0 3 * * *"),
    refinement: z.string().min(1).default("0 4 * * *"),
  }).default({}),
});

const initiationSchema = z.object({
  enabled: z.boolean().default(false),
  activityWindowMs: z.number().positive().default(7 * DAY_MS),
  recentInitiationWindowMs: z.number().positive().default(48 * HOUR_MS),
  defaultCap: z.number().int().min(0).default(2),
  agentOnlyCap: z.number().int().min(0).default(2),
  jitterMs: z.number().int().min(0).default(600_000),
  daytime: z.object({
    start: z.number().int().min(0).max(23).default(9),
    end: z.number().int().min(0).max(24).default(21),
    timezone: z.string().min(1).default("GMT"),
  }).default({}),
  schedules: z.object({
    daytime: z.string().min(1).default("0 * * * *"),
    nighttime: z.string().min(1).optional(),
  }).default({}),
});

const healthSchema = z.object({
  enabled: z.boolean().default(false),
  port: z.number().int().positive().default(19890),
  hostname: z.string().default("127.0.0.1"),
});

export const colloquyConfigSchema = z.object({
  logging: loggingSchema.default({}),
  providers: providersSchema.default({}),
  models: z.array(modelSchema).default([]),
  streaming: streamingSchema.default({}),
  queue: queueSchema.default({}),
  memory: memorySchema.default({}),
  initiation: initiationSchema.default({}),
  moderation: z.object({ enabled: z.boolean().default(false) }).default({}),
  health: healthSchema.default({}),
});

export function parseConfig(raw: unknown): ColloquyConfig {
  return colloquyConfigSchema.parse(raw);
}
