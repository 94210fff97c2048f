export { ValidationError, type ValidationIssue } from "./validation-error.ts";
export { HandlerError } from "./handler-error.ts";
export { DeploymentError } from "./deployment-error.ts";
export { AlreadyRunningError } from "./already-running-error.ts";
export { DeploymentTimeoutError } from "./deployment-timeout-error.ts";
export { ShutdownTimeoutError } from "./shutdown-timeout-error.ts";
export { ProcessNotRespondingError } from "./process-not-responding-error.ts";
export { InvalidTransitionError } from "./invalid-transition-error.ts";
