import crypto from "node:crypto";
import { parseAgentRequest } from "@agentrun/api-types";
import type { AgentResponse, DeploymentRecord, StreamEvent } from "@agentrun/api-types";
import { Sequencer } from "./sequencer.ts";
import { ResponseEnvelope, isCompletedMessage, toMessage } from "./events.ts";
import type { HandlerRequest, QueryHandler } from "./handler-adapter.ts";
import { loadAgentModule } from "./agent-module.ts";
import { ValidationError } from "./errors/validation-error.ts";
import { HandlerError } from "./errors/handler-error.ts";
import type { DeployManager, DeployOptions } from "./deployers/deploy-manager.ts";
import { DeploymentRegistry } from "./deployers/registry.ts";
import { createLogger, type Logger } from "./logger.ts";

export type LifecycleHook = (runner: Runner) => void | Promise<void>;

export interface RunnerOptions {
  handler: QueryHandler;
  onInit?: LifecycleHook;
  onShutdown?: LifecycleHook;
  /** Path of the agent module this runner was built from; required for detached deployments. */
  agentModule?: string;
  logger?: Logger;
}

export interface StreamQueryOptions {
  /** Takes precedence over the request's own user_id. */
  userId?: string;
}

export class Runner {
  readonly agentModule: string | undefined;
  readonly logger: Logger;
  private handler: QueryHandler;
  private onInit: LifecycleHook | undefined;
  private onShutdown: LifecycleHook | undefined;
  private deployments = new DeploymentRegistry();
  private started = false;
  private closed = false;

  constructor(options: RunnerOptions) {
    this.handler = options.handler;
    this.onInit = options.onInit;
    this.onShutdown = options.onShutdown;
    this.agentModule = options.agentModule;
    this.logger = options.logger ?? createLogger({ name: "runner" });
  }

  static async fromModule(modulePath: string, logger?: Logger): Promise<Runner> {
    const { definition, path } = await loadAgentModule(modulePath);
    return new Runner({
      handler: definition.handler,
      onInit: definition.onInit,
      onShutdown: definition.onShutdown,
      agentModule: path,
      logger: logger ?? createLogger({ name: definition.name ?? "runner" }),
    });
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;
    if (this.onInit) {
      await this.onInit(this);
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (!this.onShutdown) {
      return;
    }
    try {
      await this.onShutdown(this);
    } catch (err) {
      this.logger.error({ err }, "shutdown hook failed");
    }
  }

  /** Runs `fn` between the init and shutdown hooks; shutdown runs on every path. */
  async use<T>(fn: (runner: Runner) => T | Promise<T>): Promise<T> {
    try {
      await this.start();
      return await fn(this);
    } finally {
      await this.close();
    }
  }

  normalize(request: unknown, options: StreamQueryOptions = {}): HandlerRequest {
    const parsed = parseAgentRequest(request);
    if (!parsed.success) {
      throw new ValidationError("Invalid request", parsed.issues);
    }
    return {
      ...parsed.data,
      session_id: parsed.data.session_id || crypto.randomUUID(),
      user_id: options.userId ?? parsed.data.user_id ?? "",
    };
  }

  async *streamQuery(
    request: unknown,
    options: StreamQueryOptions = {},
  ): AsyncGenerator<StreamEvent, void, undefined> {
    const resolved = this.normalize(request, options);
    const seq = new Sequencer();
    const envelope = new ResponseEnvelope(resolved.session_id);

    yield seq.stamp(envelope.snapshot());
    yield seq.stamp(envelope.inProgress());

    try {
      for await (const output of this.handler.stream(this, resolved)) {
        const message = toMessage(output);
        if (this.handler.kind === "function") {
          if (isCompletedMessage(message)) {
            envelope.addMessage(message);
          }
          continue;
        }
        const event = seq.stamp(message);
        if (isCompletedMessage(event)) {
          envelope.addMessage(event);
        }
        yield event;
      }
    } catch (err) {
      const error = new HandlerError(err);
      this.logger.error({ err, sessionId: resolved.session_id }, "query handler failed");
      yield seq.stamp(envelope.fail({ code: "handler_error", message: error.message }));
      return;
    }

    yield seq.stamp(envelope.complete());
  }

  /** Drains the stream and returns its terminal response envelope. */
  async query(request: unknown, options: StreamQueryOptions = {}): Promise<AgentResponse> {
    let last: AgentResponse | undefined;
    for await (const event of this.streamQuery(request, options)) {
      if (event.object === "response") {
        last = event;
      }
    }
    if (!last) {
      throw new Error("Stream ended without a response envelope");
    }
    return last;
  }

  async deploy(manager: DeployManager, options: DeployOptions = {}): Promise<DeploymentRecord> {
    const record = await manager.deploy(this, options);
    // standalone deployments return only after they have already stopped
    if (manager.isRunning) {
      this.deployments.register(record.deploy_id, manager);
    }
    return record;
  }

  async stop(deployId: string): Promise<void> {
    const manager = this.deployments.find(deployId);
    if (!manager) {
      this.logger.debug({ deployId }, "no tracked deployment to stop");
      return;
    }
    await manager.stop();
    this.deployments.delete(deployId);
  }

  get deploymentIds(): string[] {
    return this.deployments.ids();
  }
}
