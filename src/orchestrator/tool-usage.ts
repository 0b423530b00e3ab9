/** Tools used during a turn: the `url` argument when given, else the tool name, first-seen order. */
export class ToolUsage {
  private readonly seen = new Set<string>();

  record(name: string, args: Record<string, unknown>): void {
    const url = args["url"];
    this.seen.add(typeof url === "string" && url !== "" ? url : name);
  }

  list(): string[] {
    return [...this.seen];
  }
}
