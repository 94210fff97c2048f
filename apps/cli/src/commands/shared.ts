import { responseTypeSchema, type ResponseType } from "@agentrun/api-types";
import { setBaseUrl } from "../api-client.ts";

export const urlArg = {
  url: {
    type: "string",
    description: "Service base URL (defaults to the configured host and port)",
  },
} as const;

export const serviceArgs = {
  module: {
    type: "positional",
    description: "Path of the agent module",
    required: true,
  },
  host: {
    type: "string",
    description: "Interface to bind",
  },
  port: {
    type: "string",
    description: "Port to listen on",
  },
  endpoint: {
    type: "string",
    description: "Path of the processing endpoint",
  },
  "response-type": {
    type: "string",
    description: "sse or json",
  },
  name: {
    type: "string",
    description: "Service name reported by /health",
  },
} as const;

export function useUrl(url: string | undefined): void {
  if (url) {
    setBaseUrl(url);
  }
}

export function parsePort(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: '${value}'`);
  }
  return port;
}

export function parseResponseType(value: string | undefined, fallback: ResponseType): ResponseType {
  if (value === undefined) return fallback;
  const parsed = responseTypeSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid response type: '${value}' (expected sse or json)`);
  }
  return parsed.data;
}
