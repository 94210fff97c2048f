import { DeploymentError } from "./deployment-error.ts";

export class ProcessNotRespondingError extends DeploymentError {
  constructor(pid: number, detail: string) {
    super(`Process ${pid} is not responding: ${detail}`);
    this.name = "ProcessNotRespondingError";
  }
}
