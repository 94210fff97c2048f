import { Hono } from "hono";
import type { ProcessStatusBody } from "@agentrun/api-types";
import type { Logger } from "../logger.ts";

export function processStatus(): ProcessStatusBody {
  const uptime = process.uptime();
  const cpu = process.cpuUsage();
  const cpuMs = (cpu.user + cpu.system) / 1000;
  return {
    pid: process.pid,
    status: "running",
    memory_usage: process.memoryUsage().rss,
    cpu_percent: uptime > 0 ? Math.round((cpuMs / (uptime * 1000)) * 10000) / 100 : 0,
    uptime,
    started_at: Math.floor(Date.now() / 1000 - uptime),
  };
}

/** Routes only a detached service process exposes. */
export function adminRoutes(
  requestShutdown: () => void,
  shutdownDelayMs: number,
  logger: Logger,
): Hono {
  const app = new Hono();

  app.post("/shutdown", (c) => {
    logger.info({ delayMs: shutdownDelayMs }, "shutdown requested over HTTP");
    // respond first, then go down
    setTimeout(requestShutdown, shutdownDelayMs);
    return c.json({ message: "Shutdown initiated" });
  });

  app.get("/status", (c) => c.json(processStatus()));

  return app;
}
