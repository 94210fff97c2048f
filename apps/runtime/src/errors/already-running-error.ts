import type { ServiceState } from "@agentrun/api-types";
import { DeploymentError } from "./deployment-error.ts";

export class AlreadyRunningError extends DeploymentError {
  constructor(state: ServiceState) {
    super(`Service is already running (state '${state}')`);
    this.name = "AlreadyRunningError";
  }
}
