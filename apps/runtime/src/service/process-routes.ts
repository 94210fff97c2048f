import { Hono } from "hono";
import type { Context } from "hono";
import { streamSSE } from "hono/streaming";
import { responseTypeSchema } from "@agentrun/api-types";
import type { ErrorBody, ResponseType } from "@agentrun/api-types";
import { encodeFrame } from "@agentrun/protocol";
import type { Runner } from "../runner.ts";
import type { HandlerRequest } from "../handler-adapter.ts";
import { ResponseEnvelope } from "../events.ts";
import { ValidationError } from "../errors/validation-error.ts";
import type { Logger } from "../logger.ts";

function errorBody(
  code: ErrorBody["error"]["code"],
  message: string,
  issues?: ErrorBody["error"]["issues"],
): ErrorBody {
  return issues ? { error: { code, message, issues } } : { error: { code, message } };
}

function pickResponseType(
  c: Context,
  request: HandlerRequest,
  configured: ResponseType,
): ResponseType | null {
  const override = c.req.query("response_type");
  if (override !== undefined) {
    const parsed = responseTypeSchema.safeParse(override);
    return parsed.success ? parsed.data : null;
  }
  return request.stream === false ? "json" : configured;
}

export function processRoutes(
  runner: Runner,
  endpointPath: string,
  responseType: ResponseType,
  logger: Logger,
): Hono {
  const app = new Hono();

  app.post(endpointPath, async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(errorBody("invalid_request", "Request body must be valid JSON"), 400);
    }

    let request: HandlerRequest;
    try {
      request = runner.normalize(body);
    } catch (e) {
      if (e instanceof ValidationError) {
        return c.json(errorBody("validation_error", e.message, e.issues), 400);
      }
      throw e;
    }

    const mode = pickResponseType(c, request, responseType);
    if (mode === null) {
      return c.json(
        errorBody("validation_error", "response_type must be one of: sse, json"),
        400,
      );
    }

    if (mode === "json") {
      return c.json(await runner.query(request));
    }

    return streamSSE(c, async (stream) => {
      let next = 0;
      try {
        for await (const event of runner.streamQuery(request)) {
          next = event.sequence_number + 1;
          await stream.write(encodeFrame(event));
        }
      } catch (err) {
        // headers are committed: the failure can only travel as a final frame
        logger.error({ err, sessionId: request.session_id }, "stream aborted");
        const failed = new ResponseEnvelope(request.session_id).fail({
          code: "internal_error",
          message: err instanceof Error ? err.message : String(err),
        });
        await stream.write(encodeFrame({ ...failed, sequence_number: next }));
      }
    });
  });

  return app;
}
