import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ZodError } from "zod";
import { isRecord } from "../utils/json.js";
import type { ColloquyConfig } from "./types.js";
import { getConfigPath, type Env } from "./paths.js";
import { parseConfig } from "./schema.js";

/** `${env:NAME}` or `${env:NAME:-fallback}`. */
const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/g;

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly source: string,
    readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

function replaceRefs(text: string, env: Env, missing: Set<string>): string {
  return text.replace(ENV_PATTERN, (match, name: string, fallback: string | undefined) => {
    const value = env[name] ?? fallback;
    if (value === undefined) {
      missing.add(name);
      return match;
    }
    return value;
  });
}

function missingError(missing: ReadonlySet<string>, source: string): ConfigError {
  const names = [...missing];
  return new ConfigError(
    `Missing environment variable${names.length > 1 ? "s" : ""}: ${names.join(", ")}`,
    source,
  );
}

export function substituteEnv(raw: string, env: Env = process.env): string {
  const missing = new Set<string>();
  const result = replaceRefs(raw, env, missing);
  if (missing.size > 0) throw missingError(missing, "inline");
  return result;
}

/**
 * Resolves references inside every string of a parsed document, so a
 * substituted value never has to be valid JSON itself. All unset names
 * are reported together.
 */
export function resolveEnvRefs(value: unknown, env: Env = process.env, source = "inline"): unknown {
  const missing = new Set<string>();
  const walk = (node: unknown): unknown => {
    if (typeof node === "string") return replaceRefs(node, env, missing);
    if (Array.isArray(node)) return node.map(walk);
    if (isRecord(node)) return Object.fromEntries(Object.entries(node).map(([k, v]) => [k, walk(v)]));
    return node;
  };
  const resolved = walk(value);
  if (missing.size > 0) throw missingError(missing, source);
  return resolved;
}

export function formatIssues(err: ZodError): string[] {
  return err.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`);
}

export function parseConfigText(content: string, source: string, env: Env = process.env): ColloquyConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${source}: ${err instanceof Error ? err.message : String(err)}`, source);
  }

  try {
    return parseConfig(resolveEnvRefs(raw, env, source));
  } catch (err) {
    if (err instanceof ZodError) throw new ConfigError(`Invalid config in ${source}`, source, formatIssues(err));
    throw err;
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Reads the config file; a missing file means every default. */
export function loadConfig(path?: string, env: Env = process.env): ColloquyConfig {
  const configPath = resolve(path ?? getConfigPath(env));

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      return parseConfig({});
    }
    throw err;
  }
  return parseConfigText(content, configPath, env);
}
