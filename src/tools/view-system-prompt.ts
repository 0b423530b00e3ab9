import type { ToolFactory } from "./registry.js";

export const viewSystemPromptTool: ToolFactory = ({ agent }) => ({
  name: "view_system_prompt",
  description: "Show your own current system prompt.",
  parameters: { type: "object", properties: {} },
  async execute() {
    return { content: agent.systemPrompt ?? "(no system prompt set)" };
  },
});
