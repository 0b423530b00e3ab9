import { Hono } from "hono";
import { serve } from "@hono/node-server";
import type { QueueStats } from "../queue/types.js";

const VERSION = "0.1.0";

export interface HealthProbe {
  queueStats(): QueueStats;
  databaseOpen(): boolean;
  schedules(): string[];
}

export class HealthServer {
  readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private readonly startedAt = Date.now();

  constructor(
    private readonly probe: HealthProbe,
    private readonly port: number,
    private readonly hostname: string,
  ) {
    this.app = new Hono();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get("/health", (c) => {
      const dbOpen = this.probe.databaseOpen();
      const mem = process.memoryUsage();
      return c.json({
        status: dbOpen ? "ok" : "degraded",
        version: VERSION,
        uptime: Date.now() - this.startedAt,
        uptimeHuman: formatUptime(Date.now() - this.startedAt),
        database: { open: dbOpen },
        queue: this.probe.queueStats(),
        schedules: this.probe.schedules(),
        system: {
          memoryMB: {
            rss: Math.round(mem.rss / 1024 / 1024),
            heapUsed: Math.round(mem.heapUsed / 1024 / 1024),
          },
          nodeVersion: process.version,
          pid: process.pid,
        },
      });
    });

    this.app.get("/ready", (c) => {
      if (!this.probe.databaseOpen()) {
        return c.json({ ready: false, reason: "database closed" }, 503);
      }
      return c.json({ ready: true });
    });

    this.app.get("/metrics", (c) => {
      const stats = this.probe.queueStats();
      const lines = [
        `# HELP colloquy_uptime_seconds Runtime uptime in seconds`,
        `# TYPE colloquy_uptime_seconds gauge`,
        `colloquy_uptime_seconds ${Math.round((Date.now() - this.startedAt) / 1000)}`,
        `# HELP colloquy_jobs Jobs in the task queue by status`,
        `# TYPE colloquy_jobs gauge`,
        ...Object.entries(stats).map(([status, n]) => `colloquy_jobs{status="${status}"} ${n}`),
        `# HELP colloquy_memory_rss_bytes RSS memory in bytes`,
        `# TYPE colloquy_memory_rss_bytes gauge`,
        `colloquy_memory_rss_bytes ${process.memoryUsage().rss}`,
      ];
      c.header("Content-Type", "text/plain; charset=utf-8");
      return c.text(lines.join("\n") + "\n");
    });
  }

  start(): void {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.port,
      hostname: this.hostname,
    });
  }

  stop(): void {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}

export function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h`;
  if (hours > 0) return `${hours}h ${minutes % 60}m`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}
