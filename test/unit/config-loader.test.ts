import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ConfigError, loadConfig, parseConfigText, substituteEnv } from "../../src/config/loader.js";
import { parseConfig } from "../../src/config/schema.js";

describe("substituteEnv", () => {
  beforeEach(() => {
    process.env["COLLOQUY_TEST_KEY"] = "test-key";
    process.env["COLLOQUY_TEST_PORT"] = "9999";
  });

  afterEach(() => {
    delete process.env["COLLOQUY_TEST_KEY"];
    delete process.env["COLLOQUY_TEST_PORT"];
  });

  it("substitutes every reference", () => {
    expect(substituteEnv("${env:COLLOQUY_TEST_KEY}:${env:COLLOQUY_TEST_PORT}")).toBe("test-key:9999");
  });

  it("throws for a missing variable", () => {
    expect(() => substituteEnv("${env:COLLOQUY_MISSING}")).toThrow("Missing environment variable: COLLOQUY_MISSING");
  });

  it("only matches uppercase names", () => {
    expect(substituteEnv("${env:lowercase}")).toBe("${env:lowercase}");
  });

  it("uses the fallback only when the variable is unset", () => {
    expect(substituteEnv("${env:COLLOQUY_UNSET:-4000}", {})).toBe("4000");
    expect(substituteEnv("${env:COLLOQUY_TEST_PORT:-4000}")).toBe("9999");
  });

  it("reports every missing variable at once", () => {
    expect(() => substituteEnv("${env:FIRST_MISSING}/${env:SECOND_MISSING}", {})).toThrow(
      "Missing environment variables: FIRST_MISSING, SECOND_MISSING",
    );
  });
});

describe("parseConfig", () => {
  it("fills defaults for an empty config", () => {
    const config = parseConfig({});
    expect(config.logging.level).toBe("info");
    expect(config.providers.openrouterBaseUrl).toBe("https://openrouter.ai/api/v1");
    expect(config.streaming).toMatchObject({ contentFlushMs: 200, reasoningFlushMs: 100, maxToolRounds: 10 });
    expect(config.queue).toEqual({ pollIntervalMs: 1_000, concurrency: 4, batchSize: 10 });
    expect(config.memory).toMatchObject({
      idleThresholdMs: 6 * 3_600_000,
      journalWindowMs: 7 * 86_400_000,
      coreTokenBudget: 5_000,
      refinementOperationCap: 25,
    });
    expect(config.initiation).toMatchObject({ enabled: false, defaultCap: 2, agentOnlyCap: 2, jitterMs: 600_000 });
    expect(config.initiation.daytime).toEqual({ start: 9, end: 21, timezone: "GMT" });
    expect(config.initiation.schedules.nighttime).toBeUndefined();
    expect(config.moderation.enabled).toBe(false);
    expect(config.health).toEqual({ enabled: false, port: 19890, hostname: "127.0.0.1" });
  });

  it("keeps nested overrides next to defaults", () => {
    const config = parseConfig({ memory: { schedules: { reflection: "0 5 * * *" } } });
    expect(config.memory.schedules).toEqual({ consolidation: "15 * * * *", reflection: "0 5 * * *", refinement: "0 4 * * *" });
  });

  it("rejects invalid values", () => {
    expect(() => parseConfig({ streaming: { contentFlushMs: -1 } })).toThrow();
    expect(() => parseConfig({ initiation: { daytime: { start: 25 } } })).toThrow();
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "colloquy-config-"));
    process.env["COLLOQUY_TEST_KEY"] = "test-key";
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    delete process.env["COLLOQUY_TEST_KEY"];
  });

  it("uses defaults when the file does not exist", () => {
    expect(loadConfig(join(dir, "absent.json")).logging.level).toBe("info");
  });

  it("reads the file with environment references resolved", () => {
    const path = join(dir, "colloquy.config.json");
    writeFileSync(path, JSON.stringify({ providers: { openrouterApiKey: "${env:COLLOQUY_TEST_KEY}" }, logging: { level: "debug" } }));

    const config = loadConfig(path);

    expect(config.providers.openrouterApiKey).toBe("test-key");
    expect(config.logging.level).toBe("debug");
  });

  it("substitutes values that are not valid JSON on their own", () => {
    const path = join(dir, "quoted.json");
    writeFileSync(path, JSON.stringify({ providers: { openrouterApiKey: "${env:COLLOQUY_QUOTED}" } }));

    expect(loadConfig(path, { COLLOQUY_QUOTED: 'test"key' }).providers.openrouterApiKey).toBe('test"key');
  });
});

describe("parseConfigText", () => {
  it("names the path of each invalid value", () => {
    let caught: unknown = null;
    try {
      parseConfigText('{"logging": {"level": "loud"}}', "team.json", {});
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues).toHaveLength(1);
    expect(issues[0]?.startsWith("logging.level: ")).toBe(true);
  });

  it("rejects malformed JSON with the source name", () => {
    expect(() => parseConfigText("{", "team.json", {})).toThrow("Invalid JSON in team.json");
  });
});
