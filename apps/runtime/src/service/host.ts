import { Runner } from "../runner.ts";
import { readManifest } from "../deployers/manifest.ts";
import { createLogger } from "../logger.ts";
import { serveStandalone } from "./standalone.ts";

/** Entry point of a detached service process, started from a generated project. */
export async function runDetachedHost(manifestPath: string): Promise<void> {
  const manifest = readManifest(manifestPath);
  const logger = createLogger({ name: manifest.serviceName });
  try {
    const runner = await Runner.fromModule(manifest.agentModule, logger);
    await serveStandalone(runner, {
      host: manifest.host,
      port: manifest.port,
      endpointPath: manifest.endpointPath,
      responseType: manifest.responseType,
      mode: "detached_process",
      serviceName: manifest.serviceName,
      shutdownTimeoutMs: manifest.shutdownTimeoutMs,
      logger,
    });
  } catch (err) {
    logger.fatal({ err, manifestPath }, "detached service failed");
    process.exitCode = 1;
  }
}
