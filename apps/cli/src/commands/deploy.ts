import { defineCommand } from "citty";
import { LocalDeployManager, Runner, createLogger } from "@agentrun/runtime";
import { loadConfig } from "@agentrun/config";
import { parsePort, parseResponseType, serviceArgs } from "./shared.ts";

export const deployCommand = defineCommand({
  meta: { name: "deploy", description: "Start an agent module as a detached background service" },
  args: {
    ...serviceArgs,
    "health-check": {
      type: "boolean",
      description: "Wait for /health as well as the open port",
    },
  },
  async run({ args }) {
    const settings = loadConfig();
    const logger = createLogger({ name: "agentrun", level: settings.logLevel });
    const runner = await Runner.fromModule(args.module, logger);
    const manager = new LocalDeployManager({
      host: args.host ?? settings.service.host,
      port: parsePort(args.port, settings.service.port),
      startupTimeoutMs: settings.deploy.startupTimeoutMs,
      shutdownTimeoutMs: settings.deploy.shutdownTimeoutMs,
      pidDir: settings.deploy.pidDir,
      healthCheck: args["health-check"] ?? settings.deploy.healthCheck,
      logger,
    });

    const record = await manager.deploy(runner, {
      mode: "detached_process",
      endpointPath: args.endpoint ?? settings.service.endpointPath,
      responseType: parseResponseType(args["response-type"], settings.service.responseType),
      serviceName: args.name ?? settings.service.name,
    });
    console.log(`Deployed ${record.deploy_id}`);
    console.log(`  url: ${record.url}`);
    console.log(`  pid: ${record.pid ?? "-"}`);
  },
});
