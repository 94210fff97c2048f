import http from "node:http";
import type net from "node:net";
import { serve, type ServerType } from "@hono/node-server";
import type { Hono } from "hono";

export type { ServerType };

/** Starts listening and resolves once bound; rejects on a listen error such as EADDRINUSE. */
export function listen(app: Hono, host: string, port: number): Promise<ServerType> {
  return new Promise((resolve, reject) => {
    const server = serve({ fetch: app.fetch, hostname: host, port }, () => {
      emitter.off("error", reject);
      resolve(server);
    });
    const emitter: net.Server = server;
    emitter.once("error", reject);
  });
}

export function boundPort(server: net.Server, fallback: number): number {
  const address = server.address();
  return typeof address === "object" && address !== null ? address.port : fallback;
}

/**
 * Stops accepting connections and waits for in-flight responses to drain,
 * at most `timeoutMs`. Remaining connections are then dropped and the
 * promise resolves false.
 */
export async function closeServer(server: net.Server, timeoutMs: number): Promise<boolean> {
  const closed = new Promise<boolean>((resolve) => {
    server.close(() => resolve(true));
  });
  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });

  const drained = await Promise.race([closed, timedOut]);
  clearTimeout(timer);
  if (!drained && server instanceof http.Server) {
    server.closeAllConnections();
  }
  return drained;
}
