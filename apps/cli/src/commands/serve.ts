import { defineCommand } from "citty";
import { LocalDeployManager, Runner, createLogger } from "@agentrun/runtime";
import { loadConfig } from "@agentrun/config";
import { parsePort, parseResponseType, serviceArgs } from "./shared.ts";

export const serveCommand = defineCommand({
  meta: { name: "serve", description: "Serve an agent module in the foreground" },
  args: serviceArgs,
  async run({ args }) {
    const settings = loadConfig();
    const logger = createLogger({ name: "agentrun", level: settings.logLevel });
    const runner = await Runner.fromModule(args.module, logger);
    const manager = new LocalDeployManager({
      host: args.host ?? settings.service.host,
      port: parsePort(args.port, settings.service.port),
      shutdownTimeoutMs: settings.deploy.shutdownTimeoutMs,
      logger,
    });

    const record = await manager.deploy(runner, {
      mode: "standalone",
      endpointPath: args.endpoint ?? settings.service.endpointPath,
      responseType: parseResponseType(args["response-type"], settings.service.responseType),
      serviceName: args.name ?? settings.service.name,
    });
    console.log(`Stopped ${record.deploy_id}`);
  },
});
