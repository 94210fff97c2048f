import path from "node:path";
import { pathToFileURL } from "node:url";
import type { QueryHandler } from "./handler-adapter.ts";
import type { LifecycleHook } from "./runner.ts";

/**
 * What an agent module default-exports. The detached deployment mode
 * re-imports the module in a child process, so everything the agent needs
 * must be reachable from this definition.
 */
export interface AgentDefinition {
  name?: string;
  handler: QueryHandler;
  onInit?: LifecycleHook;
  onShutdown?: LifecycleHook;
}

export function defineAgent(definition: AgentDefinition): AgentDefinition {
  return definition;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isOptionalFunction(value: unknown): boolean {
  return value === undefined || typeof value === "function";
}

function isQueryHandler(value: unknown): value is QueryHandler {
  return (
    isRecord(value) &&
    (value["kind"] === "function" || value["kind"] === "generator") &&
    typeof value["stream"] === "function"
  );
}

export function isAgentDefinition(value: unknown): value is AgentDefinition {
  return (
    isRecord(value) &&
    isQueryHandler(value["handler"]) &&
    (value["name"] === undefined || typeof value["name"] === "string") &&
    isOptionalFunction(value["onInit"]) &&
    isOptionalFunction(value["onShutdown"])
  );
}

export async function loadAgentModule(
  modulePath: string,
): Promise<{ definition: AgentDefinition; path: string }> {
  const resolved = path.resolve(modulePath);
  const mod: unknown = await import(pathToFileURL(resolved).href);
  const definition = isRecord(mod) ? mod["default"] : undefined;
  if (!isAgentDefinition(definition)) {
    throw new Error(
      `Agent module ${resolved} must default-export defineAgent({ handler }) with a handler built by fromFunction, fromAsyncFunction, fromGenerator or fromAsyncGenerator`,
    );
  }
  return { definition, path: resolved };
}
