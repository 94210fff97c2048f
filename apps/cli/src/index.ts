#!/usr/bin/env -S node --import tsx
import { defineCommand, runMain } from "citty";
import { loadConfig } from "@agentrun/config";
import { setBaseUrl } from "./api-client.ts";
import { serveCommand } from "./commands/serve.ts";
import { deployCommand } from "./commands/deploy.ts";
import { queryCommand } from "./commands/query.ts";
import { healthCommand } from "./commands/health.ts";
import { statusCommand } from "./commands/status.ts";
import { shutdownCommand } from "./commands/shutdown.ts";

const config = loadConfig();
setBaseUrl(`http://${config.service.host}:${config.service.port}`);

const main = defineCommand({
  meta: {
    name: "agentrun",
    description: "Run agents as local HTTP services",
    version: "0.1.0",
  },
  subCommands: {
    serve: serveCommand,
    deploy: deployCommand,
    query: queryCommand,
    health: healthCommand,
    status: statusCommand,
    shutdown: shutdownCommand,
  },
});

await runMain(main);
