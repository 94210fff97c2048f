import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import {
  deploymentModeSchema,
  responseTypeSchema,
  type DeploymentMode,
  type ResponseType,
} from "@agentrun/api-types";

export interface RuntimeConfig {
  service: {
    name: string;
    host: string;
    port: number;
    endpointPath: string;
    responseType: ResponseType;
    mode: DeploymentMode;
  };
  deploy: {
    startupTimeoutMs: number;
    shutdownTimeoutMs: number;
    healthCheck: boolean;
    pidDir: string;
  };
  logLevel: string;
}

const configFileSchema = z.object({
  serviceName: z.string().optional(),
  host: z.string().optional(),
  port: z.number().int().optional(),
  endpointPath: z.string().optional(),
  responseType: responseTypeSchema.optional(),
  mode: deploymentModeSchema.optional(),
  startupTimeoutMs: z.number().optional(),
  shutdownTimeoutMs: z.number().optional(),
  healthCheck: z.boolean().optional(),
  pidDir: z.string().optional(),
  logLevel: z.string().optional(),
});

type ConfigFile = z.infer<typeof configFileSchema>;

function readConfigFile(path: string): ConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch {
    return {};
  }
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid config file ${path}: ${issue?.path.join(".")} ${issue?.message}`);
  }
  return parsed.data;
}

function envEnum<T extends string>(key: string, options: readonly T[]): T | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return undefined;
  }
  const match = options.find((option) => option === value);
  if (match === undefined) {
    throw new Error(`Invalid ${key}: '${value}' (expected one of ${options.join(", ")})`);
  }
  return match;
}

function envNumber(key: string): number | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return undefined;
  }
  const number = Number(value);
  if (value.trim() === "" || !Number.isFinite(number)) {
    throw new Error(`Invalid ${key}: '${value}' (expected a number)`);
  }
  return number;
}

function envBoolean(key: string): boolean | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return undefined;
  }
  return value === "1" || value.toLowerCase() === "true";
}

export function loadConfig(configPath?: string): RuntimeConfig {
  const file = readConfigFile(configPath ?? resolve(".agentrun", "config.json"));

  return {
    service: {
      name: process.env["AGENTRUN_SERVICE_NAME"] ?? file.serviceName ?? "agent-service",
      host: process.env["AGENTRUN_HOST"] ?? file.host ?? "127.0.0.1",
      port: envNumber("AGENTRUN_PORT") ?? file.port ?? 8090,
      endpointPath: process.env["AGENTRUN_ENDPOINT"] ?? file.endpointPath ?? "/process",
      responseType:
        envEnum("AGENTRUN_RESPONSE_TYPE", responseTypeSchema.options) ?? file.responseType ?? "sse",
      mode: envEnum("AGENTRUN_MODE", deploymentModeSchema.options) ?? file.mode ?? "daemon_thread",
    },
    deploy: {
      startupTimeoutMs:
        envNumber("AGENTRUN_STARTUP_TIMEOUT_MS") ?? file.startupTimeoutMs ?? 30_000,
      shutdownTimeoutMs:
        envNumber("AGENTRUN_SHUTDOWN_TIMEOUT_MS") ?? file.shutdownTimeoutMs ?? 10_000,
      healthCheck: envBoolean("AGENTRUN_HEALTH_CHECK") ?? file.healthCheck ?? false,
      pidDir: process.env["AGENTRUN_PID_DIR"] ?? file.pidDir ?? ".agentrun/pids",
    },
    logLevel: process.env["AGENTRUN_LOG_LEVEL"] ?? file.logLevel ?? "info",
  };
}
