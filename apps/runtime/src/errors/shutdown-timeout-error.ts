import { DeploymentError } from "./deployment-error.ts";

export class ShutdownTimeoutError extends DeploymentError {
  constructor(target: string, timeoutMs: number) {
    super(`${target} did not terminate within ${timeoutMs}ms`);
    this.name = "ShutdownTimeoutError";
  }
}
