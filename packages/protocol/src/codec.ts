import type { StreamEvent } from "@agentrun/api-types";

export interface Frame {
  event: string;
  data: string;
  id?: string;
}

export type FrameCallback = (frame: Frame) => void;

export function encodeFrame(event: StreamEvent | Record<string, unknown>): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

export function decodeFrame(data: string): unknown {
  return JSON.parse(data);
}

/** Shallow check of a decoded frame payload. */
export function isStreamEvent(value: unknown): value is StreamEvent {
  return (
    typeof value === "object" &&
    value !== null &&
    "object" in value &&
    (value.object === "message" || value.object === "response") &&
    "sequence_number" in value &&
    typeof value.sequence_number === "number"
  );
}

export function isTerminalEvent(event: StreamEvent): boolean {
  return event.object === "response" && (event.status === "completed" || event.status === "failed");
}

/**
 * Incremental Server-Sent-Events parser. Chunks may split lines or frames
 * anywhere; a frame is emitted on the blank line that ends it. Frames
 * without a data field are dropped.
 */
export function createFrameParser(onFrame: FrameCallback): (chunk: string) => void {
  let buffer = "";
  let event = "message";
  let data: string[] = [];
  let id: string | undefined;

  const dispatch = () => {
    if (data.length > 0) {
      const frame: Frame = { event, data: data.join("\n") };
      if (id !== undefined) {
        frame.id = id;
      }
      onFrame(frame);
    }
    event = "message";
    data = [];
    id = undefined;
  };

  return (chunk: string) => {
    buffer += chunk;
    let newlineIndex: number;
    while ((newlineIndex = buffer.indexOf("\n")) !== -1) {
      let line = buffer.slice(0, newlineIndex);
      buffer = buffer.slice(newlineIndex + 1);
      if (line.endsWith("\r")) {
        line = line.slice(0, -1);
      }

      if (line === "") {
        dispatch();
        continue;
      }
      if (line.startsWith(":")) {
        continue;
      }

      const colon = line.indexOf(":");
      const field = colon === -1 ? line : line.slice(0, colon);
      let value = colon === -1 ? "" : line.slice(colon + 1);
      if (value.startsWith(" ")) {
        value = value.slice(1);
      }

      switch (field) {
        case "event":
          event = value;
          break;
        case "data":
          data.push(value);
          break;
        case "id":
          id = value;
          break;
        // retry and unknown fields carry nothing we use
      }
    }
  };
}
