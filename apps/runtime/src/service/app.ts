import { Hono } from "hono";
import { cors } from "hono/cors";
import type { DeploymentMode, ResponseType, ServiceMetadata } from "@agentrun/api-types";
import type { Runner } from "../runner.ts";
import { createLogger, type Logger } from "../logger.ts";
import { healthRoutes, type ServiceReadiness } from "./health-routes.ts";
import { processRoutes } from "./process-routes.ts";
import { adminRoutes } from "./admin-routes.ts";

export interface ServiceAppOptions {
  endpointPath?: string;
  responseType?: ResponseType;
  mode?: DeploymentMode;
  serviceName?: string;
  logger?: Logger;
  readiness?: ServiceReadiness;
  /** Called by `POST /admin/shutdown` (detached mode only). Defaults to SIGTERM to self. */
  requestShutdown?: () => void;
  shutdownDelayMs?: number;
}

function signalSelf(): void {
  process.kill(process.pid, "SIGTERM");
}

/**
 * The HTTP surface in front of a Runner. The admin routes exist only in
 * `detached_process` mode, where the service owns its whole process.
 */
export function createServiceApp(runner: Runner, options: ServiceAppOptions = {}): Hono {
  const endpointPath = options.endpointPath ?? "/process";
  const responseType = options.responseType ?? "sse";
  const mode = options.mode ?? "daemon_thread";
  const serviceName = options.serviceName ?? "agent-service";
  const logger = options.logger ?? createLogger({ name: serviceName });
  const readiness = options.readiness ?? { ready: true, healthy: true };
  const detached = mode === "detached_process";

  const app = new Hono();

  app.use("*", cors());

  app.use("*", async (c, next) => {
    const started = Date.now();
    await next();
    if (detached) {
      c.header("X-Process-Mode", "detached");
    } else if (mode === "standalone") {
      c.header("X-Deployment-Mode", "standalone");
    }
    logger.debug(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        durationMs: Date.now() - started,
      },
      "request",
    );
  });

  app.onError((err, c) => {
    logger.error({ err, path: c.req.path }, "unhandled request error");
    return c.json({ error: { code: "internal_error", message: err.message } }, 500);
  });

  app.get("/", (c) => {
    const metadata: ServiceMetadata = {
      service: serviceName,
      mode,
      endpoints: {
        process: endpointPath,
        health: "/health",
        readiness: "/readiness",
        liveness: "/liveness",
        ...(detached ? { admin_shutdown: "/admin/shutdown", admin_status: "/admin/status" } : {}),
      },
    };
    return c.json(metadata);
  });

  app.route("/", healthRoutes(serviceName, mode, readiness));
  app.route("/", processRoutes(runner, endpointPath, responseType, logger));
  if (detached) {
    app.route(
      "/admin",
      adminRoutes(options.requestShutdown ?? signalSelf, options.shutdownDelayMs ?? 1000, logger),
    );
  }

  return app;
}
