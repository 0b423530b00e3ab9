import type { Agent } from "../store/types.js";
import type { AgentTool } from "./types.js";

export interface ToolContext {
  readonly agent: Agent;
  readonly chatId: string | null;
}

export type ToolFactory = (ctx: ToolContext) => AgentTool;

/** Named tool factories; each turn gets fresh instances bound to its agent. */
export class ToolRegistry {
  private readonly factories = new Map<string, ToolFactory>();

  register(name: string, factory: ToolFactory): void {
    if (this.factories.has(name)) {
      throw new Error(`Tool "${name}" is already registered`);
    }
    this.factories.set(name, factory);
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return [...this.factories.keys()];
  }

  /** Tools listed in the agent's `enabledTools`; unknown names are skipped. */
  forAgent(agent: Agent, chatId: string | null = null): AgentTool[] {
    const tools: AgentTool[] = [];
    for (const name of agent.enabledTools) {
      const factory = this.factories.get(name);
      if (factory) tools.push(factory({ agent, chatId }));
    }
    return tools;
  }
}
