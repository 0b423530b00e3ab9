import { loadConfig } from "../config/loader.js";
import { ensureDir, resolvePaths } from "../config/paths.js";
import { createLogger } from "../logging/logger.js";
import { SweepScheduler, sweepSchedules } from "../scheduler/scheduler.js";
import { ColloquyDB } from "../store/db.js";
import { buildComponents, type ComponentOverrides, type Components } from "./components.js";
import { HealthServer } from "./health.js";
import { registerTasks } from "./tasks.js";

export interface RuntimeOptions {
  readonly configPath?: string;
  readonly stateDir?: string;
  readonly overrides?: ComponentOverrides;
}

export interface RuntimeContext {
  readonly components: Components;
  readonly scheduler: SweepScheduler;
  readonly healthServer: HealthServer | null;
  stop(): Promise<void>;
}

const SHUTDOWN_TIMEOUT_MS = 15_000;

/**
 * Loads config, opens the database and wires every component with all
 * tasks registered. Nothing polls or listens yet; one-shot commands drain
 * the queue themselves.
 */
export function openRuntime(options: RuntimeOptions = {}): Components {
  const paths = resolvePaths(options);
  const config = loadConfig(paths.configPath);
  const logger = createLogger(config.logging);

  const db = new ColloquyDB(ensureDir(paths.stateDir));
  const components = buildComponents(config, logger, db, options.overrides);
  registerTasks(components);
  logger.debug({ ...paths }, "Runtime opened");
  return components;
}

/** Opens the runtime and starts the queue loop, the scheduler and the health server. */
export function startRuntime(options: RuntimeOptions = {}): RuntimeContext {
  const components = openRuntime(options);
  const { config, logger, queue, db } = components;
  logger.info("Starting colloquy runtime...");

  queue.start();

  const scheduler = new SweepScheduler(queue, logger);
  scheduler.start(sweepSchedules(config));

  let healthServer: HealthServer | null = null;
  if (config.health.enabled) {
    healthServer = new HealthServer(
      {
        queueStats: () => queue.stats(),
        databaseOpen: () => db.isOpen(),
        schedules: () => scheduler.names(),
      },
      config.health.port,
      config.health.hostname,
    );
    healthServer.start();
    logger.info({ port: config.health.port }, "Health server started");
  }

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    stopping ??= (async () => {
      logger.info("Shutting down gracefully...");
      scheduler.stop();
      healthServer?.stop();
      await queue.stop();
      db.close();
      logger.info("Shutdown complete");
    })();
    return stopping;
  };

  const onSignal = (): void => {
    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();
    stop()
      .then(() => clearTimeout(forceExit))
      .catch((err: unknown) => {
        logger.error({ err }, "Error during shutdown");
      });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  logger.info("Colloquy runtime started");
  return { components, scheduler, healthServer, stop };
}
