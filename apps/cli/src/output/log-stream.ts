import type { Content, StreamEvent } from "@agentrun/api-types";

function renderContent(content: Content[]): string {
  return content
    .map((part) => (part.type === "text" ? part.text : JSON.stringify(part.data)))
    .join(" ");
}

export function formatEvent(event: StreamEvent): string {
  if (event.object === "response") {
    if (event.status === "failed") {
      return `[response] failed: ${event.error?.message ?? "unknown error"}`;
    }
    if (event.status === "completed") {
      const count = event.output.length;
      return `[response] completed (${count} message${count === 1 ? "" : "s"})`;
    }
    return `[response] ${event.status}`;
  }

  const suffix = event.status === "completed" ? "" : ` (${event.status})`;
  return `[${event.type}] ${renderContent(event.content)}${suffix}`;
}

export function renderEvent(event: StreamEvent): void {
  console.log(formatEvent(event));
}
