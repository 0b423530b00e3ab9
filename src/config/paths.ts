import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";

export const CONFIG_FILE = "colloquy.config.json";
export const DATABASE_FILE = "colloquy.db";

export type Env = Readonly<Record<string, string | undefined>>;

export interface RuntimePaths {
  readonly stateDir: string;
  readonly configPath: string;
  readonly databasePath: string;
}

/** Expands a leading `~` to the home directory. */
export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

function fromEnv(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? resolve(expandHome(value)) : null;
}

export function getStateDir(env: Env = process.env): string {
  return fromEnv(env, "COLLOQUY_STATE_DIR") ?? join(homedir(), ".colloquy");
}

/** `COLLOQUY_CONFIG_PATH`, else the config file in the working directory. */
export function getConfigPath(env: Env = process.env): string {
  return fromEnv(env, "COLLOQUY_CONFIG_PATH") ?? CONFIG_FILE;
}

export function getDatabasePath(stateDir: string): string {
  return stateDir === ":memory:" ? ":memory:" : join(stateDir, DATABASE_FILE);
}

/** Paths for one runtime; explicit values win over the environment. */
export function resolvePaths(
  explicit: { readonly configPath?: string; readonly stateDir?: string } = {},
  env: Env = process.env,
): RuntimePaths {
  const stateDir = explicit.stateDir ? expandHome(explicit.stateDir) : getStateDir(env);
  return {
    stateDir,
    configPath: explicit.configPath ?? getConfigPath(env),
    databasePath: getDatabasePath(stateDir),
  };
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
