import { defineCommand } from "citty";
import { getHealth } from "../api-client.ts";
import { urlArg, useUrl } from "./shared.ts";

export const healthCommand = defineCommand({
  meta: { name: "health", description: "Check a running service" },
  args: urlArg,
  async run({ args }) {
    useUrl(args.url);
    const health = await getHealth();
    console.log(`${health.service} (${health.mode}): ${health.status}`);
  },
});
