import path from "node:path";
import type { ChildProcess } from "node:child_process";
import type {
  DeploymentInfo,
  DeploymentMode,
  DeploymentRecord,
  ServiceState,
} from "@agentrun/api-types";
import type { Runner } from "../runner.ts";
import type { DeployManager, DeployOptions } from "./deploy-manager.ts";
import { delay, probePort, waitForReady } from "./readiness.ts";
import {
  createPidFile,
  defaultLauncher,
  removePidFile,
  startDetachedProcess,
  stopProcessGracefully,
  type Launcher,
} from "./process-manager.ts";
import { createDetachedProject } from "./template-manager.ts";
import { createServiceApp } from "../service/app.ts";
import { boundPort, closeServer, listen, type ServerType } from "../service/server.ts";
import { serveStandalone } from "../service/standalone.ts";
import { AlreadyRunningError } from "../errors/already-running-error.ts";
import { DeploymentError } from "../errors/deployment-error.ts";
import { DeploymentTimeoutError } from "../errors/deployment-timeout-error.ts";
import { InvalidTransitionError } from "../errors/invalid-transition-error.ts";
import { ProcessNotRespondingError } from "../errors/process-not-responding-error.ts";
import { ShutdownTimeoutError } from "../errors/shutdown-timeout-error.ts";
import { createLogger, type Logger } from "../logger.ts";

const VALID_TRANSITIONS: Record<ServiceState, ServiceState[]> = {
  idle: ["starting"],
  starting: ["running", "idle"],
  running: ["stopping"],
  stopping: ["idle"],
};

export interface LocalDeployManagerOptions {
  host?: string;
  port?: number;
  startupTimeoutMs?: number;
  shutdownTimeoutMs?: number;
  probeIntervalMs?: number;
  pidDir?: string;
  /** Where detached deployments get their generated project directories. */
  projectsDir?: string;
  healthCheck?: boolean;
  launcher?: Launcher;
  workingDir?: string;
  logger?: Logger;
}

type ActiveDeployment =
  | { mode: "daemon_thread"; record: DeploymentRecord; server: ServerType }
  | { mode: "detached_process"; record: DeploymentRecord; pid: number; pidFile: string }
  | {
      mode: "standalone";
      record: DeploymentRecord;
      controller: AbortController;
      done: Promise<void>;
    };

/** Wildcard binds are probed over loopback. */
function probeHost(host: string): string {
  if (host === "0.0.0.0") return "127.0.0.1";
  if (host === "::") return "::1";
  return host;
}

function describeExit(code: number | null, signal: NodeJS.Signals | null): string {
  return signal ? `signal ${signal}` : `code ${code ?? "unknown"}`;
}

/**
 * Deploys a Runner on this machine in one of three modes:
 *
 * - `daemon_thread`: the service runs inside the calling process, on its
 *   event loop, and the call returns once it is ready.
 * - `detached_process`: a generated project is launched as its own process
 *   group, tracked through a PID file, and survives the caller.
 * - `standalone`: the calling process becomes the service; `deploy()`
 *   resolves only after it has shut down.
 *
 * One instance holds at most one deployment at a time.
 */
export class LocalDeployManager implements DeployManager {
  readonly host: string;
  readonly port: number;
  private readonly startupTimeoutMs: number;
  private readonly shutdownTimeoutMs: number;
  private readonly probeIntervalMs: number;
  private readonly pidDir: string;
  private readonly projectsDir: string;
  private readonly healthCheck: boolean;
  private readonly launcher: Launcher;
  private readonly workingDir: string;
  private readonly logger: Logger;
  private currentState: ServiceState = "idle";
  private active: ActiveDeployment | null = null;

  constructor(options: LocalDeployManagerOptions = {}) {
    this.host = options.host ?? "127.0.0.1";
    this.port = options.port ?? 8090;
    this.startupTimeoutMs = options.startupTimeoutMs ?? 30_000;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? 10_000;
    this.probeIntervalMs = options.probeIntervalMs ?? 100;
    this.pidDir = options.pidDir ?? ".agentrun/pids";
    this.projectsDir = options.projectsDir ?? ".agentrun/projects";
    this.healthCheck = options.healthCheck ?? false;
    this.launcher = options.launcher ?? defaultLauncher;
    this.workingDir = options.workingDir ?? process.cwd();
    this.logger = options.logger ?? createLogger({ name: "deploy-manager" });
  }

  get state(): ServiceState {
    return this.currentState;
  }

  get isRunning(): boolean {
    return this.currentState === "running" && this.active !== null;
  }

  get deployId(): string | null {
    return this.isRunning && this.active ? this.active.record.deploy_id : null;
  }

  get serviceUrl(): string | null {
    return this.isRunning && this.active ? this.active.record.url : null;
  }

  getDeploymentInfo(): DeploymentInfo {
    const record = this.isRunning && this.active ? this.active.record : null;
    return {
      deploy_id: record?.deploy_id ?? null,
      mode: record?.mode ?? null,
      host: record?.host ?? this.host,
      port: record?.port ?? this.port,
      pid: record?.pid ?? null,
      url: record?.url ?? null,
      is_running: record !== null,
      state: this.currentState,
    };
  }

  async deploy(runner: Runner, options: DeployOptions = {}): Promise<DeploymentRecord> {
    if (this.currentState !== "idle") {
      throw new AlreadyRunningError(this.currentState);
    }
    const mode: DeploymentMode = options.mode ?? "daemon_thread";
    this.transition("starting");
    this.logger.info({ mode, host: this.host, port: this.port }, "deploying service");

    try {
      switch (mode) {
        case "daemon_thread":
          return await this.deployDaemon(runner, options);
        case "detached_process":
          return await this.deployDetached(runner, options);
        case "standalone":
          return await this.deployStandalone(runner, options);
      }
    } catch (err) {
      this.active = null;
      if (this.state === "starting") {
        this.transition("idle");
      }
      this.logger.error({ err, mode }, "deployment failed");
      throw err;
    }
  }

  /** Idempotent: stopping while nothing runs only logs a warning. */
  async stop(): Promise<void> {
    const active = this.active;
    if (this.currentState !== "running" || !active) {
      this.logger.warn({ state: this.currentState }, "stop called while no service is running");
      return;
    }
    this.transition("stopping");
    this.logger.info({ deployId: active.record.deploy_id }, "stopping service");

    try {
      switch (active.mode) {
        case "daemon_thread":
          if (!(await closeServer(active.server, this.shutdownTimeoutMs))) {
            this.logShutdownTimeout("embedded server");
          }
          break;
        case "detached_process":
          try {
            if (!(await stopProcessGracefully(active.pid, this.shutdownTimeoutMs))) {
              this.logShutdownTimeout(`process ${active.pid}`);
            }
          } finally {
            removePidFile(active.pidFile);
          }
          break;
        case "standalone":
          active.controller.abort();
          await active.done;
          break;
      }
    } finally {
      this.active = null;
      this.transition("idle");
      this.logger.info({ deployId: active.record.deploy_id }, "service stopped");
    }
  }

  private transition(to: ServiceState): void {
    if (!VALID_TRANSITIONS[this.currentState].includes(to)) {
      throw new InvalidTransitionError(this.currentState, to);
    }
    this.currentState = to;
  }

  private logShutdownTimeout(target: string): void {
    this.logger.warn({ err: new ShutdownTimeoutError(target, this.shutdownTimeoutMs) }, "forced shutdown");
  }

  private record(mode: DeploymentMode, deployId: string, port: number, pid: number | null): DeploymentRecord {
    return {
      deploy_id: deployId,
      mode,
      host: this.host,
      port,
      pid,
      url: `http://${this.host}:${port}`,
    };
  }

  private async listenWithin(
    runner: Runner,
    options: DeployOptions,
    timeoutMs: number,
  ): Promise<ServerType> {
    const app = createServiceApp(runner, {
      endpointPath: options.endpointPath,
      responseType: options.responseType,
      mode: "daemon_thread",
      serviceName: options.serviceName,
      logger: this.logger,
    });
    const listening = listen(app, this.host, this.port);
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), timeoutMs);
    });

    try {
      const server = await Promise.race([listening, timedOut]);
      if (server === null) {
        // a late bind must not leak a server nobody can stop
        void listening.then(
          (late) => closeServer(late, this.shutdownTimeoutMs),
          () => undefined,
        );
        throw new DeploymentTimeoutError(this.host, this.port, timeoutMs);
      }
      return server;
    } catch (err) {
      if (err instanceof DeploymentTimeoutError) {
        throw err;
      }
      throw new DeploymentTimeoutError(this.host, this.port, timeoutMs, { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }

  private async deployDaemon(runner: Runner, options: DeployOptions): Promise<DeploymentRecord> {
    const timeoutMs = options.deployTimeoutMs ?? this.startupTimeoutMs;
    const deadline = Date.now() + timeoutMs;

    await runner.start();
    const server = await this.listenWithin(runner, options, timeoutMs);
    const port = boundPort(server, this.port);

    const ready = await waitForReady({
      host: probeHost(this.host),
      port,
      timeoutMs: Math.max(deadline - Date.now(), 0),
      intervalMs: this.probeIntervalMs,
      healthCheck: options.healthCheck ?? this.healthCheck,
    });
    if (!ready) {
      if (!(await closeServer(server, this.shutdownTimeoutMs))) {
        this.logShutdownTimeout("embedded server");
      }
      throw new DeploymentTimeoutError(this.host, port, timeoutMs);
    }

    const record = this.record("daemon_thread", `daemon_${this.host}_${port}`, port, null);
    this.active = { mode: "daemon_thread", record, server };
    this.transition("running");
    this.logger.info({ deployId: record.deploy_id, url: record.url }, "service ready");
    return record;
  }

  private async deployDetached(runner: Runner, options: DeployOptions): Promise<DeploymentRecord> {
    if (!runner.agentModule) {
      throw new DeploymentError(
        "Detached deployment needs a runner loaded from an agent module (Runner.fromModule)",
      );
    }
    const timeoutMs = options.deployTimeoutMs ?? this.startupTimeoutMs;
    if (await probePort(probeHost(this.host), this.port)) {
      throw new DeploymentError(`Port ${this.port} on ${this.host} is already in use`);
    }
    const project = createDetachedProject({
      baseDir: path.resolve(this.workingDir, this.projectsDir),
      manifest: {
        agentModule: runner.agentModule,
        serviceName: options.serviceName ?? "agent-service",
        host: this.host,
        port: this.port,
        endpointPath: options.endpointPath ?? "/process",
        responseType: options.responseType ?? "sse",
        shutdownTimeoutMs: this.shutdownTimeoutMs,
        requirements: options.requirements ?? [],
      },
      extraPackages: options.extraPackages,
    });
    this.logger.debug({ projectDir: project.projectDir }, "generated detached project");

    const child = startDetachedProcess({
      script: project.entry,
      cwd: this.workingDir,
      logFile: project.logFile,
      env: options.environment,
      launcher: this.launcher,
    });
    const pid = await this.spawned(child);
    let exit: string | undefined;
    child.once("exit", (code, signal) => {
      exit = describeExit(code, signal);
    });

    const deployId = `detached_${pid}`;
    const pidFile = path.resolve(this.workingDir, this.pidDir, `${deployId}.pid`);
    createPidFile(pidFile, pid);

    const ready = await waitForReady({
      host: probeHost(this.host),
      port: this.port,
      timeoutMs,
      intervalMs: this.probeIntervalMs,
      healthCheck: options.healthCheck ?? this.healthCheck,
      isFailed: () => exit !== undefined,
    });
    if (ready) {
      // the port may belong to someone else if the child lost a bind race
      await delay(this.probeIntervalMs);
    }
    if (!ready || exit !== undefined) {
      if (exit === undefined) {
        child.kill("SIGKILL");
      }
      removePidFile(pidFile);
      if (exit !== undefined) {
        throw new ProcessNotRespondingError(
          pid,
          `exited with ${exit} while starting on port ${this.port} (see ${project.logFile})`,
        );
      }
      throw new DeploymentTimeoutError(this.host, this.port, timeoutMs);
    }

    const record = this.record("detached_process", deployId, this.port, pid);
    this.active = { mode: "detached_process", record, pid, pidFile };
    this.transition("running");
    this.logger.info({ deployId, url: record.url, pid, log: project.logFile }, "service ready");
    return record;
  }

  /** Resolves with the pid, or rejects when the launcher could not be spawned at all. */
  private spawned(child: ChildProcess): Promise<number> {
    return new Promise((resolve, reject) => {
      if (child.pid !== undefined) {
        resolve(child.pid);
        return;
      }
      child.once("error", (err) => {
        reject(new DeploymentError(`Failed to launch ${this.launcher.command}`, { cause: err }));
      });
    });
  }

  private async deployStandalone(runner: Runner, options: DeployOptions): Promise<DeploymentRecord> {
    const controller = new AbortController();
    let record: DeploymentRecord | undefined;

    const done = serveStandalone(runner, {
      host: this.host,
      port: this.port,
      endpointPath: options.endpointPath ?? "/process",
      responseType: options.responseType ?? "sse",
      mode: "standalone",
      serviceName: options.serviceName ?? "agent-service",
      shutdownTimeoutMs: this.shutdownTimeoutMs,
      logger: this.logger,
      signal: controller.signal,
      onListening: ({ port }) => {
        record = this.record("standalone", `standalone_${this.host}_${port}`, port, null);
        this.active = { mode: "standalone", record, controller, done };
        this.transition("running");
      },
    });

    await done;
    // shut down by a signal rather than through stop()
    if (this.currentState === "running") {
      this.transition("stopping");
      this.active = null;
      this.transition("idle");
    }
    if (!record) {
      throw new DeploymentError("Standalone service stopped before it started listening");
    }
    return record;
  }
}
