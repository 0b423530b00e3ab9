import { z } from "zod";
import type { MemoryStore } from "../store/memory-store.js";
import type { ToolFactory } from "./registry.js";

const saveMemorySchema = z.object({
  content: z.string().trim().min(1),
  memory_type: z.enum(["journal", "core"]).default("journal"),
});

export function saveMemoryTool(memories: MemoryStore): ToolFactory {
  return ({ agent }) => ({
    name: "save_memory",
    description:
      "Save something worth remembering. Use journal for recent impressions and core for lasting facts about yourself or the people you talk to.",
    parameters: {
      type: "object",
      properties: {
        content: { type: "string", description: "What to remember" },
        memory_type: { type: "string", enum: ["journal", "core"] },
      },
      required: ["content"],
    },
    async execute(args) {
      const parsed = saveMemorySchema.safeParse(args);
      if (!parsed.success) {
        return { content: `Invalid arguments: ${parsed.error.issues.map((i) => i.message).join("; ")}` };
      }
      const memory = memories.create({
        agentId: agent.id,
        memoryType: parsed.data.memory_type,
        content: parsed.data.content,
      });
      return { content: `Saved ${memory.memoryType} memory ${memory.id}` };
    },
  });
}
