import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export const REDACTED = "***REDACTED***";

// Provider keys travel in session params and SDK error payloads.
const REDACT_PATHS = [
  "apiKey",
  "*.apiKey",
  "headers.authorization",
  "err.headers.authorization",
  "providers.openrouterApiKey",
  "providers.anthropicApiKey",
  "providers.openaiApiKey",
  "providers.geminiApiKey",
  "providers.xaiApiKey",
];

function baseOptions(level: string): pino.LoggerOptions {
  return {
    name: "colloquy",
    level,
    redact: { paths: REDACT_PATHS, censor: REDACTED },
  };
}

/**
 * Pretty output on a terminal, JSON lines in production or to a file.
 * An explicit destination always gets JSON lines.
 */
export function createLogger(config?: LoggingConfig, destination?: pino.DestinationStream): Logger {
  const options = baseOptions(config?.level ?? "info");
  if (destination) return pino(options, destination);
  if (config?.file) return pino(options, pino.destination({ dest: config.file, mkdir: true }));

  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";
  if (isJson) return pino(options);

  return pino({
    ...options,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname,name" },
    },
  });
}

/** Logger that discards everything; for one-shot tooling and tests. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
