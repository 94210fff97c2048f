import { defineCommand } from "citty";
import { streamQuery } from "../api-client.ts";
import { renderEvent } from "../output/log-stream.ts";
import { loadConfig } from "@agentrun/config";
import { urlArg, useUrl } from "./shared.ts";

export const queryCommand = defineCommand({
  meta: { name: "query", description: "Send a message and print the streamed events" },
  args: {
    text: {
      type: "string",
      description: "User message",
      required: true,
    },
    session: {
      type: "string",
      description: "Session id to continue",
    },
    endpoint: {
      type: "string",
      description: "Path of the processing endpoint",
    },
    ...urlArg,
  },
  async run({ args }) {
    useUrl(args.url);
    const ac = new AbortController();

    process.on("SIGINT", () => {
      ac.abort();
    });

    try {
      await streamQuery(
        {
          input: [{ role: "user", content: [{ type: "text", text: args.text }] }],
          session_id: args.session,
        },
        renderEvent,
        { endpointPath: args.endpoint ?? loadConfig().service.endpointPath, signal: ac.signal },
      );
    } catch (err) {
      if (err instanceof DOMException && err.name === "AbortError") {
        return;
      }
      throw err;
    }
  },
});
