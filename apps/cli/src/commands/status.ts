import { defineCommand } from "citty";
import { getProcessStatus } from "../api-client.ts";
import { urlArg, useUrl } from "./shared.ts";

export const statusCommand = defineCommand({
  meta: { name: "status", description: "Show process status of a detached service" },
  args: urlArg,
  async run({ args }) {
    useUrl(args.url);
    const status = await getProcessStatus();
    console.log(`pid:     ${status.pid}`);
    console.log(`status:  ${status.status}`);
    console.log(`memory:  ${(status.memory_usage / 1024 / 1024).toFixed(1)} MiB`);
    console.log(`cpu:     ${status.cpu_percent}%`);
    console.log(`uptime:  ${Math.round(status.uptime)}s`);
    console.log(`started: ${new Date(status.started_at * 1000).toISOString()}`);
  },
});
