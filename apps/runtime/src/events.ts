import crypto from "node:crypto";
import type {
  AgentResponse,
  ErrorDetail,
  Message,
  MessageType,
  Role,
  RunStatus,
} from "@agentrun/api-types";

/** What a handler may produce: a full message, or plain text. */
export type HandlerOutput = Message | string;

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export function textMessage(text: string, role: Role = "assistant"): Message {
  return {
    object: "message",
    id: `msg_${crypto.randomUUID()}`,
    type: "message",
    role,
    content: [{ type: "text", text }],
    status: "completed",
  };
}

export function dataMessage(
  type: MessageType,
  data: Record<string, unknown>,
  status: RunStatus = "completed",
): Message {
  return {
    object: "message",
    id: `msg_${crypto.randomUUID()}`,
    type,
    role: "assistant",
    content: [{ type: "data", data }],
    status,
  };
}

export function toMessage(output: HandlerOutput): Message {
  return typeof output === "string" ? textMessage(output) : output;
}

export function isCompletedMessage(message: Message): boolean {
  return message.object === "message" && message.status === "completed";
}

/**
 * The response envelope of one request: created → in_progress → exactly one
 * of completed / failed. Every accessor returns a snapshot, so events already
 * handed downstream never change afterwards.
 */
export class ResponseEnvelope {
  private readonly response: AgentResponse;

  constructor(sessionId: string, id = `response_${crypto.randomUUID()}`) {
    this.response = {
      object: "response",
      id,
      session_id: sessionId,
      status: "created",
      created_at: nowSeconds(),
      output: [],
    };
  }

  get status(): RunStatus {
    return this.response.status;
  }

  get isTerminal(): boolean {
    return this.response.status === "completed" || this.response.status === "failed";
  }

  snapshot(): AgentResponse {
    return { ...this.response, output: [...this.response.output] };
  }

  inProgress(): AgentResponse {
    this.assertOpen("start");
    this.response.status = "in_progress";
    return this.snapshot();
  }

  addMessage(message: Message): void {
    this.assertOpen("add a message to");
    this.response.output.push(message);
  }

  complete(): AgentResponse {
    this.assertOpen("complete");
    this.response.status = "completed";
    this.response.completed_at = nowSeconds();
    return this.snapshot();
  }

  fail(error: ErrorDetail): AgentResponse {
    this.assertOpen("fail");
    this.response.status = "failed";
    this.response.completed_at = nowSeconds();
    this.response.error = error;
    return this.snapshot();
  }

  private assertOpen(action: string): void {
    if (this.isTerminal) {
      throw new Error(`Cannot ${action} response ${this.response.id}: already ${this.response.status}`);
    }
  }
}
