import type { Content } from "@agentrun/api-types";
import { defineAgent } from "./agent-module.ts";
import { dataMessage, textMessage } from "./events.ts";
import { fromAsyncGenerator } from "./handler-adapter.ts";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function firstText(content: readonly Content[]): string {
  for (const part of content) {
    if (part.type === "text") {
      return part.text;
    }
  }
  return "";
}

/** Echo agent used by the CLI demos and the end-to-end tests. */
export default defineAgent({
  name: "mock-agent",
  handler: fromAsyncGenerator(async function* (_runner, request) {
    const last = request.input[request.input.length - 1];
    const text = last ? firstText(last.content) : "";

    yield dataMessage("reasoning", { text: `Received: ${text}` });
    await delay(10);
    yield textMessage(`Echo: ${text}`);
  }),
});
