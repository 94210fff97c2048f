import type {
  AgentRequestInput,
  HealthBody,
  ProcessStatusBody,
  StreamEvent,
} from "@agentrun/api-types";
import { createFrameParser, decodeFrame, isStreamEvent } from "@agentrun/protocol";

let baseUrl = "http://127.0.0.1:8090";

export function setBaseUrl(url: string): void {
  baseUrl = url.replace(/\/+$/, "");
}

export function getBaseUrl(): string {
  return baseUrl;
}

async function request<T>(path: string, init?: RequestInit): Promise<T> {
  const res = await fetch(`${baseUrl}${path}`, init);
  if (!res.ok) {
    const body = await res.text();
    throw new Error(`HTTP ${res.status}: ${body}`);
  }
  return res.json() as Promise<T>;
}

export async function getHealth(): Promise<HealthBody> {
  return request<HealthBody>("/health");
}

export async function getProcessStatus(): Promise<ProcessStatusBody> {
  return request<ProcessStatusBody>("/admin/status");
}

export async function shutdownService(): Promise<{ message: string }> {
  return request<{ message: string }>("/admin/shutdown", { method: "POST" });
}

export interface StreamQueryOptions {
  endpointPath?: string;
  signal?: AbortSignal;
}

/** POSTs a request and hands every event of the SSE response to `onEvent` as it arrives. */
export async function streamQuery(
  body: AgentRequestInput,
  onEvent: (event: StreamEvent) => void,
  options: StreamQueryOptions = {},
): Promise<void> {
  const res = await fetch(`${baseUrl}${options.endpointPath ?? "/process"}`, {
    method: "POST",
    headers: { "Content-Type": "application/json", Accept: "text/event-stream" },
    body: JSON.stringify(body),
    signal: options.signal,
  });
  if (!res.ok) {
    const text = await res.text();
    throw new Error(`HTTP ${res.status}: ${text}`);
  }
  if (!res.body) throw new Error("No response body");

  const parse = createFrameParser((frame) => {
    const event = decodeFrame(frame.data);
    if (isStreamEvent(event)) {
      onEvent(event);
    }
  });

  const reader = res.body.getReader();
  const decoder = new TextDecoder();
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      parse(decoder.decode(value, { stream: true }));
    }
  } finally {
    reader.releaseLock();
  }
}
