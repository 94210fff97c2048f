import type { ServiceState } from "@agentrun/api-types";

export class InvalidTransitionError extends Error {
  constructor(from: ServiceState, to: ServiceState) {
    super(`Cannot transition service from '${from}' to '${to}'`);
    this.name = "InvalidTransitionError";
  }
}
