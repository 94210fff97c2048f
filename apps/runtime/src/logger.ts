import { pino, type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  name?: string;
  level?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? "agentrun",
    level: options.level ?? process.env["AGENTRUN_LOG_LEVEL"] ?? "info",
  });
}
