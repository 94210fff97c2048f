import { DeploymentError } from "./deployment-error.ts";

export class DeploymentTimeoutError extends DeploymentError {
  constructor(host: string, port: number, timeoutMs: number, options?: ErrorOptions) {
    super(`Service at ${host}:${port} did not become ready within ${timeoutMs}ms`, options);
    this.name = "DeploymentTimeoutError";
  }
}
