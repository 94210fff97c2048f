import type { DeploymentMode, DeploymentRecord, ResponseType } from "@agentrun/api-types";
import type { Runner } from "../runner.ts";

export interface DeployOptions {
  mode?: DeploymentMode;
  endpointPath?: string;
  responseType?: ResponseType;
  serviceName?: string;
  /** Extra environment for the child process (detached mode). */
  environment?: Record<string, string>;
  /** Passed through to the generated project as opaque data. */
  requirements?: string[];
  /** Files or directories copied into the generated project (detached mode). */
  extraPackages?: string[];
  /** Overrides the manager's startup timeout for this call. */
  deployTimeoutMs?: number;
  healthCheck?: boolean;
}

/**
 * Turns a Runner into a running network service. One manager holds at most
 * one active deployment; `stop()` is idempotent.
 */
export interface DeployManager {
  readonly deployId: string | null;
  readonly isRunning: boolean;
  readonly serviceUrl: string | null;
  deploy(runner: Runner, options?: DeployOptions): Promise<DeploymentRecord>;
  stop(): Promise<void>;
}
