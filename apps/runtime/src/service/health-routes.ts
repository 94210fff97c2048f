import { Hono } from "hono";
import type { DeploymentMode, HealthBody } from "@agentrun/api-types";

/** Flipped by whoever hosts the app; read by the probe routes on every request. */
export interface ServiceReadiness {
  ready: boolean;
  healthy: boolean;
}

export function healthRoutes(
  serviceName: string,
  mode: DeploymentMode,
  readiness: ServiceReadiness,
): Hono {
  const app = new Hono();

  app.get("/health", (c) => {
    const body: HealthBody = {
      status: "healthy",
      timestamp: Math.floor(Date.now() / 1000),
      service: serviceName,
      mode,
    };
    return c.json(body);
  });

  app.get("/readiness", (c) => {
    if (!readiness.ready) {
      return c.json({ detail: "Service not ready" }, 500);
    }
    return c.text("success");
  });

  app.get("/liveness", (c) => {
    if (!readiness.healthy) {
      return c.json({ detail: "Service not healthy" }, 500);
    }
    return c.text("success");
  });

  return app;
}
