import { defineCommand } from "citty";
import { shutdownService } from "../api-client.ts";
import { urlArg, useUrl } from "./shared.ts";

export const shutdownCommand = defineCommand({
  meta: { name: "shutdown", description: "Ask a detached service to shut down" },
  args: urlArg,
  async run({ args }) {
    useUrl(args.url);
    const { message } = await shutdownService();
    console.log(message);
  },
});
