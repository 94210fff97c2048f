import type { AgentRequest } from "@agentrun/api-types";
import type { HandlerOutput } from "./events.ts";
import type { Runner } from "./runner.ts";

/** A request after the runner has backfilled its identifiers. */
export type HandlerRequest = Readonly<AgentRequest & { session_id: string; user_id: string }>;

/**
 * `function` handlers produce one final result per request; `generator`
 * handlers stream every element they produce.
 */
export type HandlerKind = "function" | "generator";

export interface QueryHandler {
  readonly kind: HandlerKind;
  stream(runner: Runner, request: HandlerRequest): AsyncIterable<HandlerOutput>;
}

export type QueryFunction = (runner: Runner, request: HandlerRequest) => HandlerOutput;
export type AsyncQueryFunction = (runner: Runner, request: HandlerRequest) => Promise<HandlerOutput>;
export type QueryGenerator = (runner: Runner, request: HandlerRequest) => Iterable<HandlerOutput>;
export type AsyncQueryGenerator = (
  runner: Runner,
  request: HandlerRequest,
) => AsyncIterable<HandlerOutput>;

export function fromFunction(fn: QueryFunction): QueryHandler {
  return {
    kind: "function",
    async *stream(runner, request) {
      yield fn(runner, request);
    },
  };
}

export function fromAsyncFunction(fn: AsyncQueryFunction): QueryHandler {
  return {
    kind: "function",
    async *stream(runner, request) {
      yield await fn(runner, request);
    },
  };
}

export function fromGenerator(fn: QueryGenerator): QueryHandler {
  return {
    kind: "generator",
    async *stream(runner, request) {
      for (const item of fn(runner, request)) {
        yield item;
      }
    },
  };
}

export function fromAsyncGenerator(fn: AsyncQueryGenerator): QueryHandler {
  return {
    kind: "generator",
    async *stream(runner, request) {
      for await (const item of fn(runner, request)) {
        yield item;
      }
    },
  };
}
