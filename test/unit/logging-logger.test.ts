import { describe, it, expect } from "vitest";
import { createLogger } from "../../src/logging/logger.js";

function capture(): { stream: { write(line: string): void }; lines: () => Record<string, unknown>[] } {
  const raw: string[] = [];
  return {
    stream: { write: (line: string) => void raw.push(line) },
    lines: () => raw.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

describe("createLogger", () => {
  it("writes named JSON lines to an explicit destination", () => {
    const { stream, lines } = capture();
    createLogger({ level: "info" }, stream).info({ chatId: "chat-1" }, "Conversation consolidated");

    expect(lines()).toHaveLength(1);
    expect(lines()[0]).toMatchObject({ name: "colloquy", level: 30, chatId: "chat-1", msg: "Conversation consolidated" });
  });

  it("masks provider keys wherever they are logged", () => {
    const { stream, lines } = capture();
    createLogger({ level: "info" }, stream).warn(
      { apiKey: "test-key", session: { apiKey: "test-key", model: "test/model" }, providers: { openaiApiKey: "test-key" } },
      "Session retried",
    );

    expect(lines()[0]).toMatchObject({
      apiKey: "***REDACTED***",
      session: { apiKey: "***REDACTED***", model: "test/model" },
      providers: { openaiApiKey: "***REDACTED***" },
    });
  });

  it("drops entries below the configured level", () => {
    const { stream, lines } = capture();
    const logger = createLogger({ level: "warn" }, stream);
    logger.info("quiet");
    logger.error("loud");
    expect(lines().map((line) => line["msg"])).toEqual(["loud"]);
  });
});
