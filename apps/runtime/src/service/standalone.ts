import type { DeploymentMode, ResponseType } from "@agentrun/api-types";
import type { Runner } from "../runner.ts";
import { ShutdownTimeoutError } from "../errors/shutdown-timeout-error.ts";
import { createLogger, type Logger } from "../logger.ts";
import { createServiceApp } from "./app.ts";
import type { ServiceReadiness } from "./health-routes.ts";
import { boundPort, closeServer, listen } from "./server.ts";

export interface StandaloneOptions {
  host: string;
  port: number;
  endpointPath: string;
  responseType: ResponseType;
  mode: Extract<DeploymentMode, "standalone" | "detached_process">;
  serviceName: string;
  shutdownTimeoutMs: number;
  logger?: Logger;
  /** Aborting it shuts the service down, like SIGINT / SIGTERM. */
  signal?: AbortSignal;
  onListening?: (address: { host: string; port: number }) => void;
  shutdownDelayMs?: number;
}

function waitForShutdown(signal: AbortSignal | undefined, logger: Logger): Promise<void> {
  return new Promise((resolve) => {
    const done = (reason: string) => {
      process.off("SIGINT", onSigint);
      process.off("SIGTERM", onSigterm);
      signal?.removeEventListener("abort", onAbort);
      logger.info({ reason }, "shutting down");
      resolve();
    };
    const onSigint = () => done("SIGINT");
    const onSigterm = () => done("SIGTERM");
    const onAbort = () => done("stop requested");

    if (signal?.aborted) {
      done("stop requested");
      return;
    }
    process.once("SIGINT", onSigint);
    process.once("SIGTERM", onSigterm);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Serves the runner in the calling process until SIGINT, SIGTERM or
 * `signal` asks it to stop. The runner's init and shutdown hooks bracket
 * the whole serving period.
 */
export async function serveStandalone(runner: Runner, options: StandaloneOptions): Promise<void> {
  const logger = options.logger ?? createLogger({ name: options.serviceName });
  const readiness: ServiceReadiness = { ready: false, healthy: true };
  const stopper = new AbortController();
  const signal = options.signal ? AbortSignal.any([options.signal, stopper.signal]) : stopper.signal;

  await runner.use(async () => {
    const app = createServiceApp(runner, {
      endpointPath: options.endpointPath,
      responseType: options.responseType,
      mode: options.mode,
      serviceName: options.serviceName,
      logger,
      readiness,
      requestShutdown: () => stopper.abort(),
      shutdownDelayMs: options.shutdownDelayMs,
    });

    const server = await listen(app, options.host, options.port);
    const port = boundPort(server, options.port);
    readiness.ready = true;
    logger.info(
      { host: options.host, port, endpoint: options.endpointPath, mode: options.mode, pid: process.pid },
      "service listening",
    );
    options.onListening?.({ host: options.host, port });

    await waitForShutdown(signal, logger);

    readiness.ready = false;
    if (!(await closeServer(server, options.shutdownTimeoutMs))) {
      logger.warn(
        { err: new ShutdownTimeoutError("HTTP server", options.shutdownTimeoutMs) },
        "dropped connections that did not drain in time",
      );
    }
    logger.info("service stopped");
  });
}
