export { Runner, type RunnerOptions, type LifecycleHook, type StreamQueryOptions } from "./runner.ts";
export {
  fromFunction,
  fromAsyncFunction,
  fromGenerator,
  fromAsyncGenerator,
  type HandlerKind,
  type HandlerRequest,
  type QueryHandler,
} from "./handler-adapter.ts";
export { defineAgent, loadAgentModule, type AgentDefinition } from "./agent-module.ts";
export { textMessage, dataMessage, ResponseEnvelope, type HandlerOutput } from "./events.ts";
export { Sequencer } from "./sequencer.ts";
export type { DeployManager, DeployOptions } from "./deployers/deploy-manager.ts";
export { LocalDeployManager, type LocalDeployManagerOptions } from "./deployers/local-deploy-manager.ts";
export { isProcessRunning, stopProcessGracefully, type Launcher } from "./deployers/process-manager.ts";
export { createServiceApp, type ServiceAppOptions } from "./service/app.ts";
export type { ServiceReadiness } from "./service/health-routes.ts";
export { serveStandalone, type StandaloneOptions } from "./service/standalone.ts";
export { runDetachedHost } from "./service/host.ts";
export { createLogger, type Logger } from "./logger.ts";
export * from "./errors/index.ts";
