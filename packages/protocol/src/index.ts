export {
  encodeFrame,
  decodeFrame,
  createFrameParser,
  isTerminalEvent,
  isStreamEvent,
  type Frame,
  type FrameCallback,
} from "./codec.ts";
