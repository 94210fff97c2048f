export type RunStatus = "created" | "in_progress" | "completed" | "failed";

export type MessageType = "message" | "function_call" | "function_call_output" | "reasoning";

export type Role = "user" | "assistant" | "system" | "tool";

export interface TextContent {
  type: "text";
  text: string;
}

export interface DataContent {
  type: "data";
  data: Record<string, unknown>;
}

export type Content = TextContent | DataContent;

export interface Message {
  object: "message";
  id: string;
  type: MessageType;
  role?: Role;
  content: Content[];
  status: RunStatus;
  sequence_number?: number;
}

export interface ErrorDetail {
  code: string;
  message: string;
}

/** Aggregate event wrapping every child event of one request. */
export interface AgentResponse {
  object: "response";
  id: string;
  session_id: string;
  status: RunStatus;
  created_at: number;
  completed_at?: number;
  output: Message[];
  error?: ErrorDetail;
  sequence_number?: number;
}

export type Sequenced<T> = T & { sequence_number: number };

export type StreamEvent = Sequenced<Message> | Sequenced<AgentResponse>;

export type DeploymentMode = "daemon_thread" | "detached_process" | "standalone";

export type ResponseType = "sse" | "json";

export type ServiceState = "idle" | "starting" | "running" | "stopping";

export interface DeploymentRecord {
  deploy_id: string;
  mode: DeploymentMode;
  host: string;
  port: number;
  pid: number | null;
  url: string;
}

export interface DeploymentInfo {
  deploy_id: string | null;
  mode: DeploymentMode | null;
  host: string;
  port: number;
  pid: number | null;
  url: string | null;
  is_running: boolean;
  state: ServiceState;
}

export interface HealthBody {
  status: "healthy";
  timestamp: number;
  service: string;
  mode: DeploymentMode;
}

export interface ProcessStatusBody {
  pid: number;
  status: "running";
  memory_usage: number;
  cpu_percent: number;
  uptime: number;
  started_at: number;
}

export interface ServiceMetadata {
  service: string;
  mode: DeploymentMode;
  endpoints: {
    process: string;
    health: string;
    readiness: string;
    liveness: string;
    admin_shutdown?: string;
    admin_status?: string;
  };
}

export interface ErrorBody {
  error: {
    code: "invalid_request" | "validation_error" | "internal_error";
    message: string;
    issues?: { path: string; message: string }[];
  };
}

export {
  agentRequestSchema,
  inputMessageSchema,
  contentSchema,
  deploymentModeSchema,
  responseTypeSchema,
  parseAgentRequest,
  type AgentRequest,
  type AgentRequestInput,
  type InputMessage,
  type ParseResult,
} from "./schema.ts";
